import { z } from "zod";
import type { Queryable } from "../db/queryable";
import type { AccessRecord } from "../models/access";
import type { AccessLog } from "./accessLog";

const AccessRowSchema = z.object({
  token_id: z.string(),
  remote_address: z.string(),
  path: z.string(),
  method: z.string(),
  status_code: z.coerce.number().int(),
  // BIGINT arrives as a string from pg.
  timestamp_ms: z.coerce.number(),
});

export class PgAccessLog implements AccessLog {
  constructor(private readonly db: Queryable) {}

  async append(record: AccessRecord): Promise<void> {
    await this.db.query(
      `INSERT INTO access_logs (token_id, remote_address, path, method, status_code, timestamp_ms)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [record.tokenId, record.remoteAddress, record.path, record.method, record.statusCode, record.timestamp]
    );
  }

  async recent(limit: number): Promise<AccessRecord[]> {
    if (limit <= 0) {
      return [];
    }
    const { rows } = await this.db.query(
      `SELECT token_id, remote_address, path, method, status_code, timestamp_ms
       FROM access_logs ORDER BY id DESC LIMIT $1`,
      [limit]
    );
    return rows
      .map((row) => AccessRowSchema.parse(row))
      .map((row) => ({
        tokenId: row.token_id,
        remoteAddress: row.remote_address,
        path: row.path,
        method: row.method,
        statusCode: row.status_code,
        timestamp: row.timestamp_ms,
      }))
      .reverse();
  }
}
