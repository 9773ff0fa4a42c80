/**
 * Owns the token store and the access log. Built once at start-up and
 * handed explicitly to the dispatcher, the access manager and the console.
 */

import type { Logger } from "pino";
import type { DataConfig } from "../config";
import type { Token } from "../models/token";
import { InMemoryAccessLog, type AccessLog } from "../repositories/accessLog";
import { InMemoryTokenStore, type TokenStore } from "../repositories/tokenStore";
import { PgAccessLog } from "../repositories/pgAccessLog";
import { PgTokenStore } from "../repositories/pgTokenStore";
import { runMigrations } from "./migrate";
import { createPool } from "./pool";

export class DataAccessLayer {
  constructor(
    readonly tokenStore: TokenStore,
    readonly accessLogs: AccessLog,
    private readonly release: () => Promise<void> = async () => undefined
  ) {}

  static inMemory(tokens: Iterable<Token> = []): DataAccessLayer {
    return new DataAccessLayer(new InMemoryTokenStore(tokens), new InMemoryAccessLog());
  }

  static async open(config: DataConfig, logger: Logger): Promise<DataAccessLayer> {
    switch (config.driver) {
      case "memory":
        logger.warn("Using in-memory token store and access log; nothing survives a restart");
        return DataAccessLayer.inMemory();
      case "postgres": {
        const pool = createPool(config, logger);
        try {
          if (config.migrate) {
            await runMigrations(pool, logger);
          }
        } catch (error) {
          await pool.end();
          throw error;
        }
        return new DataAccessLayer(new PgTokenStore(pool), new PgAccessLog(pool), () => pool.end());
      }
    }
  }

  async close(): Promise<void> {
    await this.release();
  }
}
