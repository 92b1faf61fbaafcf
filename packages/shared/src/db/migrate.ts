import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type pg from "pg";

import { createLogger } from "../utils/logger.js";

const logger = createLogger("db-migrate");

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Create the log tables if they are missing. Every statement in
 * `sql/log_records.sql` is idempotent, so this runs on every start.
 */
export async function ensureSchema(pool: Pick<pg.Pool, "query">): Promise<void> {
  const file = path.resolve(__dirname, "sql", "log_records.sql");
  const ddl = await readFile(file, "utf8");

  await pool.query(ddl);

  logger.info({ file }, "Database schema ensured");
}
