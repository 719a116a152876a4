/**
 * Cronus — src/db/db.ts
 * WHAT: SQLite connection bootstrap and schema creation for the lookup history.
 * WHY: Centralizes better-sqlite3 setup, PRAGMAs and tables so stores can just import `db`.
 * FLOWS:
 *  - Open DB → set PRAGMAs → create tables → closeDatabase() on shutdown
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite PRAGMA: https://sqlite.org/pragma.html
 *
 * NOTE: better-sqlite3 is synchronous; keep statements small and quick.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";

const DB_BUSY_TIMEOUT_MS = 5000;
const IN_MEMORY = ":memory:";

const dbPath = env.DB_PATH;
if (dbPath !== IN_MEMORY) {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
}
export const db = new Database(dbPath, { fileMustExist: false });

// WAL lets /about read history while a lookup writes its row
if (dbPath !== IN_MEMORY) {
  db.pragma("journal_mode = WAL");
}
db.pragma("synchronous = NORMAL");
db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);
logger.info({ dbPath }, "SQLite opened");

/**
 * issue_lookup: one row per finished /sentry run.
 * created_at is epoch seconds so window queries compare integers.
 */
db.exec(`
  CREATE TABLE IF NOT EXISTS issue_lookup (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    search_key TEXT NOT NULL,
    outcome TEXT NOT NULL CHECK (outcome IN ('resolved', 'exhausted', 'cancelled')),
    attempts INTEGER NOT NULL,
    elapsed_ms INTEGER NOT NULL,
    issue_title TEXT,
    requested_by TEXT NOT NULL,
    guild_id TEXT,
    created_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_issue_lookup_created_at ON issue_lookup(created_at);
`);

let closed = false;

/**
 * Idempotent; gracefulShutdown and tests may both call it.
 */
export function closeDatabase(): void {
  if (closed) return;
  closed = true;
  try {
    db.close();
    logger.info("Database closed successfully");
  } catch (err) {
    logger.error({ err }, "Failed to close database");
  }
}
