import type { AppConfig } from "../config.js";
import type { AuditStore } from "./audit-store.js";
import { PostgresAuditStore } from "./postgres-audit-store.js";
import { SqliteAuditStore } from "./sqlite-audit-store.js";

export function openAuditStore(config: AppConfig): AuditStore {
  const retryPolicy = {
    maxRetries: config.AUDIT_WRITE_MAX_RETRIES,
    retryBaseMs: config.AUDIT_WRITE_RETRY_MS,
  };
  if (config.AUDIT_STORE_DRIVER === "postgres") {
    return new PostgresAuditStore(retryPolicy);
  }
  return SqliteAuditStore.open(config.AUDIT_DB_PATH, retryPolicy);
}
