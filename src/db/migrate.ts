import { promises as fs } from "fs";
import path from "path";
import type { Logger } from "pino";
import type { Queryable } from "./queryable";

export const MIGRATIONS_DIR = path.resolve(__dirname, "../../database/migrations");

/**
 * Applies every `.sql` file in `dir` in lexical order. The scripts are
 * idempotent (`IF NOT EXISTS`), so re-running on start-up is safe.
 */
export async function runMigrations(db: Queryable, logger: Logger, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  const files = (await fs.readdir(dir)).filter((file) => file.endsWith(".sql")).sort();

  for (const file of files) {
    const sql = await fs.readFile(path.join(dir, file), "utf8");
    await db.query(sql);
    logger.info({ migration: file }, "Applied migration");
  }

  return files;
}
