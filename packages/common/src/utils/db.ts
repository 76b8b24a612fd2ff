// ============================================
// Database Connection Pool
// ============================================

import pg from "pg";
import { loadConfig } from "./config.js";

const { Pool } = pg;

let pool: pg.Pool | null = null;

export function getDbPool(): pg.Pool {
  if (!pool) {
    const { postgres } = loadConfig();
    pool = new Pool({
      ...postgres,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });
  }
  return pool;
}

export async function closeDbPool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

export async function query<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<pg.QueryResult<T>> {
  return getDbPool().query<T>(text, params);
}

export type QueryFn = typeof query;
