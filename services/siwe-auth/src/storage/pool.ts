// Database connection pool

import pg from "pg";
import type { DbConfig } from "@walletgate/shared";
const { Pool } = pg;

/**
 * Parameterized query function the repositories run on
 */
export type QueryFn = <T extends pg.QueryResultRow>(
  text: string,
  params?: unknown[]
) => Promise<pg.QueryResult<T>>;

let pool: pg.Pool | null = null;

export function getPool(config: DbConfig): pg.Pool {
  if (!pool) {
    pool = new Pool(config);

    pool.on("error", (err) => {
      console.error("[Storage] Unexpected error on idle client", err);
    });
  }
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/**
 * Bind a QueryFn to a pool
 */
export function poolQuery(client: pg.Pool): QueryFn {
  return <T extends pg.QueryResultRow>(text: string, params?: unknown[]) =>
    client.query<T>(text, params);
}
