/**
 * Cronus — src/features/issueLookup/machine.ts
 * WHAT: Pure state machine for one issue lookup: which attempt we're on, when to retry, when to stop.
 * WHY: No timers and no I/O in here; the driver executes the returned effects, so the
 *      retry schedule is testable by feeding inputs and reading effects.
 * FLOWS:
 *  starting --begin--> attempting(1)
 *  attempting(n) --found--> resolved
 *  attempting(n) --not_found|fetch_failed, n < max--> awaiting_retry(n) --wait_elapsed--> attempting(n+1)
 *  attempting(n) --not_found|fetch_failed, n = max--> exhausted
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { backoffDelayMs } from "../../lib/retry.js";
import type { FetchError, IssueRecord, LookupPolicy, ProgressEvent, SearchKey } from "./types.js";

export type MachineState =
  | { phase: "starting" }
  | { phase: "attempting"; attempt: number }
  | { phase: "awaiting_retry"; attempt: number; intervalMs: number }
  | { phase: "resolved"; attempt: number; record: IssueRecord }
  | { phase: "exhausted"; attempt: number };

export type AttemptResult =
  | { kind: "found"; record: IssueRecord }
  | { kind: "not_found" }
  | { kind: "fetch_failed"; error: FetchError };

export type MachineInput =
  | { type: "begin" }
  | { type: "attempt_finished"; attempt: number; result: AttemptResult }
  | { type: "wait_elapsed" };

/**
 * `wait` is "resume after delayMs"; whoever drives the machine decides how
 * (promise sleep, a timer queue, a delayed message).
 */
export type Effect =
  | { type: "report"; event: ProgressEvent }
  | { type: "fetch"; attempt: number }
  | { type: "wait"; delayMs: number };

export type MachineParams = Readonly<{
  searchKey: SearchKey;
  policy: LookupPolicy;
}>;

export type Transition = { state: MachineState; effects: Effect[] };

export class InvalidLookupPolicyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidLookupPolicyError";
  }
}

/**
 * Throws on a policy the machine can't honor. Called once when an
 * orchestrator is built, never per run.
 */
export function validatePolicy(policy: LookupPolicy): void {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new InvalidLookupPolicyError(`maxAttempts must be an integer >= 1, got ${policy.maxAttempts}`);
  }
  if (!Number.isFinite(policy.initialIntervalMs) || policy.initialIntervalMs <= 0) {
    throw new InvalidLookupPolicyError(`initialIntervalMs must be > 0, got ${policy.initialIntervalMs}`);
  }
  if (!Number.isFinite(policy.backoffMultiplier) || policy.backoffMultiplier < 1) {
    throw new InvalidLookupPolicyError(`backoffMultiplier must be >= 1, got ${policy.backoffMultiplier}`);
  }
}

/** Delay after failed attempt n (1-based) */
export function retryIntervalMs(attempt: number, policy: LookupPolicy): number {
  return backoffDelayMs(attempt, policy.initialIntervalMs, policy.backoffMultiplier);
}

export function isTerminal(state: MachineState): state is Extract<MachineState, { phase: "resolved" | "exhausted" }> {
  return state.phase === "resolved" || state.phase === "exhausted";
}

export const initialState: MachineState = { phase: "starting" };

function unexpected(state: MachineState, input: MachineInput): never {
  throw new Error(`issue lookup machine: input "${input.type}" is not valid in phase "${state.phase}"`);
}

export function step(state: MachineState, input: MachineInput, params: MachineParams): Transition {
  const { searchKey, policy } = params;

  switch (state.phase) {
    case "starting": {
      if (input.type !== "begin") return unexpected(state, input);
      return {
        state: { phase: "attempting", attempt: 1 },
        effects: [
          { type: "report", event: { type: "fetching", searchKey } },
          { type: "fetch", attempt: 1 },
        ],
      };
    }

    case "attempting": {
      if (input.type !== "attempt_finished" || input.attempt !== state.attempt) {
        return unexpected(state, input);
      }
      const { attempt } = state;

      if (input.result.kind === "found") {
        const { record } = input.result;
        return {
          state: { phase: "resolved", attempt, record },
          effects: [{ type: "report", event: { type: "resolved", searchKey, record, attempts: attempt } }],
        };
      }

      if (attempt < policy.maxAttempts) {
        const intervalMs = retryIntervalMs(attempt, policy);
        return {
          state: { phase: "awaiting_retry", attempt, intervalMs },
          effects: [
            { type: "report", event: { type: "retrying", searchKey, attempt, intervalMs } },
            { type: "wait", delayMs: intervalMs },
          ],
        };
      }

      return {
        state: { phase: "exhausted", attempt },
        effects: [{ type: "report", event: { type: "exhausted", searchKey, attempts: attempt } }],
      };
    }

    case "awaiting_retry": {
      if (input.type !== "wait_elapsed") return unexpected(state, input);
      const next = state.attempt + 1;
      return {
        state: { phase: "attempting", attempt: next },
        effects: [{ type: "fetch", attempt: next }],
      };
    }

    case "resolved":
    case "exhausted":
      return unexpected(state, input);
  }
}
