import pg from "pg";
import type { Pool as PoolType } from "pg";
import { getConfig } from "./config.js";
import { getAppLogger } from "../logging/logger.js";

const { Pool } = pg;

let pool: PoolType | null = null;

const parseInteger = (value: string): number => Number.parseInt(value, 10);

pg.types.setTypeParser(20, parseInteger); // int8
pg.types.setTypeParser(21, parseInteger); // int2
pg.types.setTypeParser(23, parseInteger); // int4

export async function initializePostgres(): Promise<PoolType> {
  if (pool) {
    return pool;
  }

  const config = getConfig();
  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is not configured");
  }

  const created = new Pool({
    connectionString: config.databaseUrl,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000
  });

  const logger = getAppLogger().child?.({ module: "postgres" });
  created.on("error", (error) => {
    logger?.error?.({ err: error }, "postgres.pool_error");
  });

  try {
    const client = await created.connect();
    await client.query("SELECT 1");
    client.release();
  } catch (error) {
    await created.end();
    throw new Error(`Failed to connect to PostgreSQL: ${String(error)}`);
  }

  pool = created;
  return pool;
}

export async function healthCheckPostgres(): Promise<boolean> {
  try {
    if (!pool) {
      return false;
    }

    await pool.query("SELECT 1");
    return true;
  } catch {
    return false;
  }
}

export async function closePostgres(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
