/**
 * Cronus — src/features/issueLookup/index.ts
 * WHAT: Entry point for the /sentry issue lookup: config builders plus runIssueLookup().
 * WHY: Commands hand over a search key and a message surface; wiring of client, reporter,
 *      orchestrator and cancellation stays in one place.
 * FLOWS:
 *  runIssueLookup({ searchKey, surface })
 *    → issueClientConfigFromEnv() → createIssueClient
 *    → createProgressReporter(surface, onOpen: register in inflight)
 *    → createLookupOrchestrator(lookupPolicyFromEnv()).run(key, signal)
 *    → release in-flight entry → LookupOutcome
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { env, type Env } from "../../lib/env.js";
import { MissingConfigError } from "../../lib/errors.js";
import { createIssueClient } from "./client.js";
import { createLookupOrchestrator, type Sleeper } from "./orchestrator.js";
import { createProgressReporter, type ProgressSurface } from "./progress.js";
import { inflightLookups, type InflightLookups } from "./inflight.js";
import type { IssueClientConfig, IssueFetcher, LookupOutcome, LookupPolicy, SearchKey } from "./types.js";

export type { IssueRecord, LookupOutcome, LookupPolicy, ProgressEvent, SearchKey } from "./types.js";
export type { ProgressHandle, ProgressPayload, ProgressSurface } from "./progress.js";
export { inflightLookups } from "./inflight.js";

type PolicyEnv = Pick<
  Env,
  "SENTRY_LOOKUP_MAX_ATTEMPTS" | "SENTRY_LOOKUP_INITIAL_INTERVAL_SEC" | "SENTRY_LOOKUP_BACKOFF_MULTIPLIER"
>;

type ClientEnv = Pick<
  Env,
  "SENTRY_API_URL" | "SENTRY_ORG_SLUG" | "SENTRY_PROJECT_SLUG" | "SENTRY_API_KEY" | "SENTRY_LOOKUP_TIMEOUT_MS"
>;

/**
 * The orchestrator never reads the environment; this is the one place that does.
 */
export function lookupPolicyFromEnv(source: PolicyEnv = env): LookupPolicy {
  return {
    maxAttempts: source.SENTRY_LOOKUP_MAX_ATTEMPTS,
    initialIntervalMs: Math.round(source.SENTRY_LOOKUP_INITIAL_INTERVAL_SEC * 1000),
    backoffMultiplier: source.SENTRY_LOOKUP_BACKOFF_MULTIPLIER,
  };
}

/**
 * Throws MissingConfigError naming the first unset variable; the error card
 * shows it so whoever deploys the bot knows what to add.
 */
export function issueClientConfigFromEnv(source: ClientEnv = env): IssueClientConfig {
  if (!source.SENTRY_ORG_SLUG) throw new MissingConfigError("SENTRY_ORG_SLUG");
  if (!source.SENTRY_PROJECT_SLUG) throw new MissingConfigError("SENTRY_PROJECT_SLUG");
  if (!source.SENTRY_API_KEY) throw new MissingConfigError("SENTRY_API_KEY");
  return {
    baseUrl: source.SENTRY_API_URL,
    orgSlug: source.SENTRY_ORG_SLUG,
    projectSlug: source.SENTRY_PROJECT_SLUG,
    apiKey: source.SENTRY_API_KEY,
    timeoutMs: source.SENTRY_LOOKUP_TIMEOUT_MS,
  };
}

export type IssueLookupRequest = {
  searchKey: SearchKey;
  surface: ProgressSurface;
};

/** Everything runIssueLookup would otherwise build from env; tests swap these */
export type IssueLookupOverrides = {
  fetcher?: IssueFetcher;
  policy?: LookupPolicy;
  issueUrlTemplate?: string;
  registry?: InflightLookups;
  sleep?: Sleeper;
  now?: () => number;
};

/**
 * One /sentry invocation. Each call owns its controller, reporter and attempt
 * state; concurrent calls for the same key run independently.
 */
export async function runIssueLookup(
  request: IssueLookupRequest,
  overrides: IssueLookupOverrides = {}
): Promise<LookupOutcome> {
  const fetcher = overrides.fetcher ?? createIssueClient(issueClientConfigFromEnv());
  const policy = overrides.policy ?? lookupPolicyFromEnv();
  const registry = overrides.registry ?? inflightLookups;
  const controller = new AbortController();
  let messageId: string | null = null;

  const progress = createProgressReporter(request.surface, {
    onOpen: (handle) => {
      messageId = handle.id;
      registry.register(handle.id, controller);
    },
  });

  const orchestrator = createLookupOrchestrator(policy, {
    fetcher,
    progress,
    normalizeOptions: { issueUrlTemplate: overrides.issueUrlTemplate ?? env.SENTRY_ISSUE_URL_TEMPLATE },
    sleep: overrides.sleep,
    now: overrides.now,
  });

  try {
    return await orchestrator.run(request.searchKey, controller.signal);
  } finally {
    if (messageId) registry.release(messageId, controller);
  }
}
