import { Pool } from "pg";
import { getConfig } from "../config.js";

let pool: Pool | null = null;

export function getPool(): Pool {
  if (pool) {
    return pool;
  }

  const config = getConfig();
  pool = new Pool({ connectionString: config.DATABASE_URL });
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
