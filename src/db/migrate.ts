import { readdirSync, readFileSync } from "node:fs";
import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type Database from "better-sqlite3";
import { getPool } from "./client.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export type MigrationDriver = "sqlite" | "postgres";

export function migrationDir(driver: MigrationDriver): string {
  return path.join(__dirname, "migrations", driver);
}

function isMigrationFile(file: string): boolean {
  return file.endsWith(".sql");
}

/** Applies pending postgres migrations, one transaction per file. */
export async function runMigrations(): Promise<string[]> {
  const pool = getPool();
  const appliedNow: string[] = [];

  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id text PRIMARY KEY,
      executed_at timestamptz NOT NULL DEFAULT NOW()
    )
  `);

  const directory = migrationDir("postgres");
  const files = (await readdir(directory)).filter(isMigrationFile).sort();

  for (const file of files) {
    const applied = await pool.query<{ id: string }>(
      "SELECT id FROM schema_migrations WHERE id = $1",
      [file],
    );
    if (applied.rowCount && applied.rowCount > 0) {
      continue;
    }

    const sql = await readFile(path.join(directory, file), "utf8");
    const client = await pool.connect();
    try {
      await client.query("BEGIN");
      await client.query(sql);
      await client.query("INSERT INTO schema_migrations (id) VALUES ($1)", [file]);
      await client.query("COMMIT");
      appliedNow.push(file);
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  return appliedNow;
}

/** Same bookkeeping for the embedded store; runs synchronously on open. */
export function runSqliteMigrations(db: Database.Database): string[] {
  const appliedNow: string[] = [];

  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id TEXT PRIMARY KEY,
      executed_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const directory = migrationDir("sqlite");
  const files = readdirSync(directory).filter(isMigrationFile).sort();
  const isApplied = db.prepare("SELECT id FROM schema_migrations WHERE id = ?");
  const markApplied = db.prepare("INSERT INTO schema_migrations (id) VALUES (?)");

  for (const file of files) {
    if (isApplied.get(file)) {
      continue;
    }
    const sql = readFileSync(path.join(directory, file), "utf8");
    db.transaction(() => {
      db.exec(sql);
      markApplied.run(file);
    })();
    appliedNow.push(file);
  }

  return appliedNow;
}
