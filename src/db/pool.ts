import { Pool, type PoolConfig } from "pg";
import type { Logger } from "pino";

export interface PoolSettings {
  databaseUrl: string;
  poolMax: number;
}

export function createPool(settings: PoolSettings, logger: Logger): Pool {
  const poolConfig: PoolConfig = {
    connectionString: settings.databaseUrl,
    max: settings.poolMax,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  };

  const pool = new Pool(poolConfig);

  // Idle client errors must not crash the process; the next query reconnects.
  pool.on("error", (err) => {
    logger.error({ err }, "Unexpected error on idle database client");
  });

  return pool;
}
