/**
 * Cronus — src/lib/retry.ts
 * WHAT: Backoff math shared by every retry loop, plus a generic withRetry wrapper.
 * WHY: The issue lookup and command sync both back off geometrically; one formula keeps them honest.
 * FLOWS:
 *  - backoffDelayMs(attempt, initial, multiplier) → delay after the given failed attempt
 *  - withRetry(fn, options) → retries fn while the classified error is recoverable
 * USAGE:
 *  import { withRetry } from "./retry.js";
 *  const result = await withRetry(() => rest.put(route, { body }), { maxAttempts: 3, label: "command_sync" });
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { setTimeout as sleep } from "node:timers/promises";
import { logger } from "./logger.js";
import { classifyError, isRecoverable, type ClassifiedError } from "./errors.js";

/**
 * Delay to wait after failed attempt `attempt` (1-based):
 *   initialMs * multiplier^(attempt - 1)
 *
 * attempt 1 → initialMs, attempt 2 → initialMs * multiplier, ...
 * No jitter and no cap here; callers that want either apply it themselves.
 */
export function backoffDelayMs(attempt: number, initialMs: number, multiplier: number): number {
  return initialMs * Math.pow(multiplier, attempt - 1);
}

export interface RetryOptions {
  /** Maximum number of attempts (default: 3) */
  maxAttempts?: number;
  /** Delay after the first failure (default: 100) */
  initialDelayMs?: number;
  /** Maximum delay in ms (default: 5000) */
  maxDelayMs?: number;
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier?: number;
  /** Adds 0.5x–1.5x jitter to each delay (default: true) */
  jitter?: boolean;
  /** Custom function to determine if error is retryable */
  shouldRetry?: (err: ClassifiedError, attempt: number) => boolean;
  /** Label for logging */
  label?: string;
}

/**
 * Retry an async operation with exponential backoff.
 * Throws the last error once attempts run out or shouldRetry says no.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelayMs = 100,
    maxDelayMs = 5000,
    backoffMultiplier = 2,
    jitter = true,
    shouldRetry = (err) => isRecoverable(err),
    label = "operation",
  } = options;

  if (maxAttempts < 1) {
    throw new Error(`withRetry: maxAttempts must be >= 1, got ${maxAttempts}`);
  }

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      const classified = classifyError(err);

      if (attempt === maxAttempts || !shouldRetry(classified, attempt)) {
        logger.warn(
          {
            evt: "retry_exhausted",
            label,
            attempt,
            maxAttempts,
            errorKind: classified.kind,
            errorMessage: classified.message,
          },
          `[retry] ${label} failed after ${attempt} attempts`
        );
        throw err;
      }

      const baseMs = Math.min(backoffDelayMs(attempt, initialDelayMs, backoffMultiplier), maxDelayMs);
      // Spread simultaneous retries out instead of hammering a struggling service in lockstep
      const delayMs = jitter ? Math.floor(baseMs * (0.5 + Math.random())) : baseMs;

      logger.debug(
        {
          evt: "retry_attempt",
          label,
          attempt,
          maxAttempts,
          delayMs,
          errorKind: classified.kind,
        },
        `[retry] ${label} attempt ${attempt} failed, retrying in ${delayMs}ms`
      );

      await sleep(delayMs);
    }
  }

  // Unreachable: the loop either returns or throws
  throw lastError;
}
