/**
 * Cronus — src/features/issueLookup/orchestrator.ts
 * WHAT: Drives the lookup state machine: runs fetches, progress reports and backoff sleeps.
 * WHY: machine.ts decides, this file does. Cancellation lives here: the signal is
 *      checked before every effect and every transition, and the sleep rejects on abort.
 * FLOWS:
 *  createLookupOrchestrator(policy, deps).run(searchKey, signal)
 *    → step(begin) → [report, fetch] → step(attempt_finished) → [report, wait] → ... → LookupOutcome
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { setTimeout as sleepFor } from "node:timers/promises";
import { logger } from "../../lib/logger.js";
import { addBreadcrumb } from "../../lib/sentry.js";
import { ctx as reqCtx } from "../../lib/reqctx.js";
import { normalizeIssues } from "./normalize.js";
import {
  initialState,
  isTerminal,
  step,
  validatePolicy,
  type AttemptResult,
  type MachineInput,
  type MachineParams,
  type MachineState,
  type Transition,
} from "./machine.js";
import type {
  FetchResult,
  IssueFetcher,
  LookupOutcome,
  LookupPolicy,
  NormalizeOptions,
  ProgressEvent,
  ProgressSink,
  SearchKey,
} from "./types.js";

/** Rejects when the signal aborts mid-sleep */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleeper = async (ms, signal) => {
  await sleepFor(ms, undefined, { signal });
};

export type LookupDeps = {
  fetcher: IssueFetcher;
  progress: ProgressSink;
  normalizeOptions?: NormalizeOptions;
  sleep?: Sleeper;
  /** Clock for elapsed time; tests pass a fake one alongside a fake sleep */
  now?: () => number;
};

export interface LookupOrchestrator {
  readonly policy: LookupPolicy;
  run(searchKey: SearchKey, signal?: AbortSignal): Promise<LookupOutcome>;
}

/**
 * Throws InvalidLookupPolicyError for a policy the machine can't run.
 * One orchestrator serves every invocation; each run() owns its own state.
 */
export function createLookupOrchestrator(policy: LookupPolicy, deps: LookupDeps): LookupOrchestrator {
  validatePolicy(policy);
  const sleep = deps.sleep ?? defaultSleep;
  const now = deps.now ?? Date.now;

  async function report(event: ProgressEvent): Promise<void> {
    try {
      await deps.progress.report(event);
    } catch (err) {
      // A broken progress message must not stop the lookup
      logger.warn({ evt: "issue_lookup_report_fail", event: event.type, err }, "[issueLookup] progress report failed");
    }
  }

  async function attempt(searchKey: SearchKey, n: number, signal?: AbortSignal): Promise<AttemptResult> {
    let result: FetchResult;
    try {
      result = await deps.fetcher.fetchIssues(searchKey, signal);
    } catch (err) {
      // Fetchers return errors as values; a throw is folded into the same path
      const message = err instanceof Error ? err.message : String(err);
      logger.warn({ evt: "issue_lookup_fetch_threw", searchKey, attempt: n, err }, "[issueLookup] fetcher threw");
      return { kind: "fetch_failed", error: { kind: "transport", message } };
    }

    if (!result.ok) {
      logger.warn(
        { evt: "issue_lookup_fetch_failed", searchKey, attempt: n, errorKind: result.error.kind, error: result.error },
        "[issueLookup] attempt failed to fetch"
      );
      return { kind: "fetch_failed", error: result.error };
    }

    try {
      const record = normalizeIssues(result.payload, deps.normalizeOptions);
      return record ? { kind: "found", record } : { kind: "not_found" };
    } catch (err) {
      logger.error({ evt: "issue_lookup_normalize_error", searchKey, attempt: n, err }, "[issueLookup] normalize failed");
      return { kind: "not_found" };
    }
  }

  async function run(searchKey: SearchKey, signal?: AbortSignal): Promise<LookupOutcome> {
    const params: MachineParams = { searchKey, policy };
    const startedAt = now();
    const traceId = reqCtx().traceId;
    let attemptsMade = 0;

    const elapsed = () => now() - startedAt;
    const cancelled = (): LookupOutcome => {
      logger.info(
        { evt: "issue_lookup_cancelled", traceId, searchKey, attempts: attemptsMade, elapsedMs: elapsed() },
        "[issueLookup] lookup cancelled"
      );
      return { kind: "cancelled", attempts: attemptsMade, elapsedMs: elapsed() };
    };

    if (signal?.aborted) return cancelled();

    let state: MachineState = initialState;
    let transition: Transition = step(state, { type: "begin" }, params);

    for (;;) {
      if (signal?.aborted) return cancelled();
      state = transition.state;
      let nextInput: MachineInput | null = null;

      for (const effect of transition.effects) {
        if (signal?.aborted) return cancelled();

        switch (effect.type) {
          case "report":
            await report(effect.event);
            break;

          case "fetch": {
            attemptsMade = effect.attempt;
            const result = await attempt(searchKey, effect.attempt, signal);
            logger.info(
              {
                evt: "issue_lookup_attempt",
                traceId,
                searchKey,
                attempt: effect.attempt,
                result: result.kind,
                elapsedMs: elapsed(),
              },
              "[issueLookup] attempt finished"
            );
            addBreadcrumb({
              category: "issueLookup",
              message: `attempt ${effect.attempt}: ${result.kind}`,
              data: { traceId, searchKey },
              level: "info",
            });
            nextInput = { type: "attempt_finished", attempt: effect.attempt, result };
            break;
          }

          case "wait":
            logger.debug(
              { evt: "issue_lookup_backoff", traceId, searchKey, attempt: attemptsMade, backoffMs: effect.delayMs },
              "[issueLookup] backing off"
            );
            try {
              await sleep(effect.delayMs, signal);
            } catch (err) {
              if (signal?.aborted) return cancelled();
              throw err;
            }
            nextInput = { type: "wait_elapsed" };
            break;
        }
      }

      if (isTerminal(state)) {
        const elapsedMs = elapsed();
        if (state.phase === "resolved") {
          logger.info(
            { evt: "issue_lookup_resolved", traceId, searchKey, attempts: state.attempt, elapsedMs },
            "[issueLookup] issue found"
          );
          return { kind: "resolved", record: state.record, attempts: state.attempt, elapsedMs };
        }
        logger.warn(
          { evt: "issue_lookup_exhausted", traceId, searchKey, attempts: state.attempt, elapsedMs },
          `[issueLookup] no matching issue for ${searchKey} after ${state.attempt} attempts`
        );
        return { kind: "exhausted", attempts: state.attempt, elapsedMs };
      }

      if (!nextInput) {
        throw new Error(`issue lookup machine stalled in phase "${state.phase}"`);
      }
      if (signal?.aborted) return cancelled();
      transition = step(state, nextInput, params);
    }
  }

  return { policy, run };
}
