/**
 * PostgreSQL connection pool.
 *
 * Created on first use so that processes running on the in-memory backend
 * never configure a pool. Configuration comes from the config module only.
 */
import { Pool } from "pg";

import { config } from "@config/index";
import { logger } from "@infrastructure/logging/Logger";

let pool: Pool | null = null;

export function getPool(): Pool {
  if (pool) {
    return pool;
  }

  pool = new Pool({
    host: config.db.host,
    port: config.db.port,
    user: config.db.user,
    password: config.db.password,
    database: config.db.database,
    max: config.db.max,
    idleTimeoutMillis: config.db.idleTimeoutMs,
    connectionTimeoutMillis: config.db.connectionTimeoutMs,
  });

  pool.on("error", (err) => {
    logger.log("error", "Unexpected PG pool error", { message: err.message });
  });

  return pool;
}

export async function closePool(): Promise<void> {
  if (!pool) {
    return;
  }
  const current = pool;
  pool = null;
  await current.end();
}
