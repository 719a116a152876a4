/**
 * Cronus — src/features/issueLookup/types.ts
 * WHAT: Shared types for the /sentry issue lookup: fetch results, records, policy, progress events, outcomes.
 * WHY: The adapter, normalizer, step machine and reporter only meet through these shapes.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/** Caller-supplied error id; opaque and immutable for one invocation */
export type SearchKey = string;

/**
 * Why a fetch produced no payload. Both kinds fold into the retry path;
 * they only differ in logs.
 */
export type FetchError =
  | { kind: "transport"; message: string; code?: string }
  | { kind: "bad_status"; status: number };

export type FetchResult = { ok: true; payload: unknown } | { ok: false; error: FetchError };

export interface IssueFetcher {
  fetchIssues(searchKey: SearchKey, signal?: AbortSignal): Promise<FetchResult>;
}

export type IssueClientConfig = {
  /** e.g. https://sentry.io/api/0 (no trailing slash needed) */
  baseUrl: string;
  orgSlug: string;
  projectSlug: string;
  apiKey: string;
  timeoutMs: number;
};

export type Unhandled = boolean | "not_available";

export type IssueRecord = Readonly<{
  title: string;
  description: string;
  isUnhandled: Unhandled;
  /** `<t:SECONDS:R>` or "Last seen not available" */
  lastSeenRelative: string;
  detailUrl: string | null;
}>;

export type NormalizeOptions = {
  /** URL with an `{id}` placeholder; absent means no detail link */
  issueUrlTemplate?: string;
};

/**
 * Retry policy. Interval after failed attempt n is
 * initialIntervalMs * backoffMultiplier^(n-1).
 */
export type LookupPolicy = Readonly<{
  maxAttempts: number;
  initialIntervalMs: number;
  backoffMultiplier: number;
}>;

export type ProgressEvent =
  | { type: "fetching"; searchKey: SearchKey }
  | { type: "retrying"; searchKey: SearchKey; attempt: number; intervalMs: number }
  | { type: "resolved"; searchKey: SearchKey; record: IssueRecord; attempts: number }
  | { type: "exhausted"; searchKey: SearchKey; attempts: number };

export type LookupOutcome =
  | { kind: "resolved"; record: IssueRecord; attempts: number; elapsedMs: number }
  | { kind: "exhausted"; attempts: number; elapsedMs: number }
  | { kind: "cancelled"; attempts: number; elapsedMs: number };

export interface ProgressSink {
  report(event: ProgressEvent): Promise<void>;
}
