/**
 * Cronus — src/store/lookupHistoryStore.ts
 * WHAT: Storage layer for finished /sentry lookups.
 * WHY: /about reports how many lookups resolved or ran out of attempts recently.
 * FLOWS:
 *  - recordLookup({ searchKey, outcome, attempts, elapsedMs, ... }) → row id
 *  - summarizeLookupsSince(epochSec) → counts per outcome
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { db } from "../db/db.js";
import { logger } from "../lib/logger.js";

export type LookupOutcomeKind = "resolved" | "exhausted" | "cancelled";

/** One issue_lookup row as stored */
export interface LookupHistoryRow {
  id: number;
  search_key: string;
  outcome: LookupOutcomeKind;
  attempts: number;
  elapsed_ms: number;
  issue_title: string | null;
  requested_by: string;
  guild_id: string | null;
  created_at: number;
}

export type LookupSummary = {
  total: number;
  resolved: number;
  exhausted: number;
  cancelled: number;
};

export const INSERT_LOOKUP_SQL = `INSERT INTO issue_lookup
   (search_key, outcome, attempts, elapsed_ms, issue_title, requested_by, guild_id, created_at)
   VALUES (?, ?, ?, ?, ?, ?, ?, ?)`;

/*
 * Prepared at import; db.ts has already created the table by then.
 */
const insertStmt = db.prepare(INSERT_LOOKUP_SQL);

const summaryStmt = db.prepare<[number], { outcome: string; n: number }>(
  `SELECT outcome, COUNT(*) AS n
   FROM issue_lookup
   WHERE created_at >= ?
   GROUP BY outcome`
);

function isOutcome(value: unknown): value is LookupOutcomeKind {
  return value === "resolved" || value === "exhausted" || value === "cancelled";
}

/**
 * Insert one finished lookup. Throws on DB failure; callers decide whether a
 * lost history row matters (the /sentry command logs and moves on).
 */
export function recordLookup(params: {
  searchKey: string;
  outcome: LookupOutcomeKind;
  attempts: number;
  elapsedMs: number;
  issueTitle?: string | null;
  requestedBy: string;
  guildId?: string | null;
  createdAt?: number;
}): number {
  const createdAt = params.createdAt ?? Math.floor(Date.now() / 1000);
  try {
    const result = insertStmt.run(
      params.searchKey,
      params.outcome,
      params.attempts,
      Math.round(params.elapsedMs),
      params.issueTitle ?? null,
      params.requestedBy,
      params.guildId ?? null,
      createdAt
    );
    logger.debug(
      { evt: "lookup_recorded", searchKey: params.searchKey, outcome: params.outcome, attempts: params.attempts },
      "[lookupHistoryStore] recorded lookup"
    );
    return Number(result.lastInsertRowid);
  } catch (err) {
    logger.error({ err, searchKey: params.searchKey }, "[lookupHistoryStore] Failed to record lookup");
    throw err;
  }
}

export function summarizeLookupsSince(sinceEpochSec: number): LookupSummary {
  const summary: LookupSummary = { total: 0, resolved: 0, exhausted: 0, cancelled: 0 };
  for (const { outcome, n } of summaryStmt.all(sinceEpochSec)) {
    // CHECK constraint keeps outcome in range; skip anything else rather than miscount
    if (!isOutcome(outcome)) continue;
    summary[outcome] = n;
    summary.total += n;
  }
  return summary;
}
