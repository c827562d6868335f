import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "../packages/shared/schema/index";
import type { Env } from "./config/env";
import logger from "./logger";

const { Pool } = pg;

type DatabaseSchema = typeof schema;
export type Database = NodePgDatabase<DatabaseSchema>;

export interface DatabaseHandle {
  db: Database;
  pool: pg.Pool;
}

/**
 * Create the connection pool and Drizzle instance. Connections are opened
 * lazily, so this succeeds even while PostgreSQL is still starting.
 */
export function createDatabase(config: Env): DatabaseHandle {
  const pool = new Pool({
    connectionString: config.DATABASE_URL,
    max: config.DB_POOL_MAX,
    idleTimeoutMillis: config.DB_POOL_IDLE_TIMEOUT_MS,
    connectionTimeoutMillis: config.DB_POOL_CONNECTION_TIMEOUT_MS,
  });

  // Prevent unhandled rejections from idle clients disconnecting
  pool.on("error", (err) => {
    logger.error("Unexpected error on idle database client", {
      error: err instanceof Error ? err.message : String(err),
    });
  });

  logger.info("Database connection pool created", {
    max: config.DB_POOL_MAX,
    idleTimeoutMillis: config.DB_POOL_IDLE_TIMEOUT_MS,
    connectionTimeoutMillis: config.DB_POOL_CONNECTION_TIMEOUT_MS,
  });

  return { db: drizzle(pool, { schema }), pool };
}
