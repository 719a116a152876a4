/**
 * Cronus — src/features/issueLookup/normalize.ts
 * WHAT: Turns the raw issue search payload into one IssueRecord (or null for "nothing yet").
 * WHY: The search endpoint returns a list of loosely typed objects; the panel needs fixed fields with defaults.
 * FLOWS: normalizeIssues(payload, { issueUrlTemplate }) → IssueRecord | null
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { parseIsoInstant, toDiscordRel } from "../../lib/timefmt.js";
import type { IssueRecord, NormalizeOptions, Unhandled } from "./types.js";

export const TITLE_FALLBACK = "Title not available";
export const DESCRIPTION_FALLBACK = "Value not available";
export const LAST_SEEN_FALLBACK = "Last seen not available";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}

function unhandledFrom(value: unknown): Unhandled {
  return typeof value === "boolean" ? value : "not_available";
}

function lastSeenFrom(value: unknown): string {
  const ms = parseIsoInstant(value);
  if (ms === null) return LAST_SEEN_FALLBACK;
  return toDiscordRel(Math.floor(ms / 1000));
}

/**
 * Substitute the record id into the `{id}` placeholder. Numeric ids are
 * accepted as the API has returned both over time.
 */
export function issueDetailUrl(id: unknown, template: string | undefined): string | null {
  if (!template || !template.includes("{id}")) return null;
  if (typeof id === "number" && Number.isFinite(id)) {
    return template.replaceAll("{id}", String(id));
  }
  if (typeof id === "string" && id.length > 0) {
    return template.replaceAll("{id}", encodeURIComponent(id));
  }
  return null;
}

/**
 * First element wins. Returns null when the payload isn't a non-empty list or
 * its first element isn't an object; the caller treats that as "not found".
 * Individual bad fields fall back to their defaults instead of failing.
 */
export function normalizeIssues(payload: unknown, options: NormalizeOptions = {}): IssueRecord | null {
  if (!Array.isArray(payload) || payload.length === 0) return null;
  const first: unknown = payload[0];
  if (!isRecord(first)) return null;

  const metadata = isRecord(first.metadata) ? first.metadata : {};

  return Object.freeze({
    title: stringOr(first.title, TITLE_FALLBACK),
    description: stringOr(metadata.value, DESCRIPTION_FALLBACK),
    isUnhandled: unhandledFrom(first.isUnhandled),
    lastSeenRelative: lastSeenFrom(first.lastSeen),
    detailUrl: issueDetailUrl(first.id, options.issueUrlTemplate),
  });
}
