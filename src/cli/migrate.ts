import { getConfig } from "../config.js";
import { closePool } from "../db/client.js";
import { runMigrations } from "../db/migrate.js";
import { SqliteAuditStore } from "../db/sqlite-audit-store.js";

async function main(): Promise<string[]> {
  const config = getConfig();
  if (config.AUDIT_STORE_DRIVER === "postgres") {
    return runMigrations();
  }

  const store = SqliteAuditStore.open(config.AUDIT_DB_PATH, {
    maxRetries: config.AUDIT_WRITE_MAX_RETRIES,
    retryBaseMs: config.AUDIT_WRITE_RETRY_MS,
  });
  const applied = store.appliedMigrations;
  await store.close();
  return applied;
}

main()
  .then(async (applied) => {
    await closePool();
    // eslint-disable-next-line no-console
    console.log(
      applied.length > 0 ? `Applied migrations: ${applied.join(", ")}` : "No pending migrations.",
    );
  })
  .catch(async (error: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Migration failed.", error);
    await closePool();
    process.exitCode = 1;
  });
