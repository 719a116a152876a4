/**
 * Cronus — src/lib/logger.ts
 * WHAT: Pino logger with light redaction and Sentry capture on error-level logs.
 * WHY: Centralizes structured logging to keep other modules clean.
 * FLOWS: create logger → redact helpers → hook to captureException on error logs
 * DOCS:
 *  - pino: https://getpino.io
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import pino from "pino";

/**
 * Redaction patterns for secrets that might leak into logs.
 *
 * Token pattern: Discord bot tokens are 3 base64-ish segments separated by dots.
 * Bearer pattern: issue-search API keys travel in Authorization headers and
 *                 sometimes come back echoed in error bodies.
 * DSN pattern: Sentry DSNs embed auth tokens in URLs. We keep the host, redact the secret.
 * Mention pattern: @everyone/@here in logs usually means user input leaked through.
 */
const tokenRe = /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g;
const bearerRe = /Bearer\s+[A-Za-z0-9._~+/=-]+/gi;
const dsnRe = /(https?:\/\/)([^:@/\s]+):[^@\s]+@/gi;
const mentionRe = /@(everyone|here)/gi;

// Only warn once per process if the Sentry module can't be loaded
let sentryImportWarned = false;

/**
 * Sanitizes strings before logging. Use on any user-controlled or external data.
 * Truncates at 300 chars so a huge upstream error body can't flood the logs.
 */
export function redact(value: string): string {
  if (!value) return "";
  let sanitized = value.replace(/\s+/g, " ").trim();
  sanitized = sanitized.replace(tokenRe, "[redacted_token]");
  sanitized = sanitized.replace(bearerRe, "Bearer [redacted]");
  sanitized = sanitized.replace(dsnRe, "$1$2:[redacted]@");
  sanitized = sanitized.replace(mentionRe, "@redacted");
  if (sanitized.length > 300) {
    sanitized = `${sanitized.slice(0, 300)}...`;
  }
  return sanitized;
}

/**
 * Log level defaults to "info" (LOG_LEVEL overrides). Under Vitest the default
 * is "silent" so test output only shows what a test opts into.
 *
 * Pretty printing only when LOG_PRETTY=true on a TTY; production emits
 * newline-delimited JSON for log aggregators.
 */
const isVitest = !!process.env.VITEST_WORKER_ID;
const logLevel = process.env.LOG_LEVEL ?? (isVitest ? "silent" : "info");
const wantPretty = process.env.LOG_PRETTY === "true" && process.stdout.isTTY;

type SerializedError = {
  name?: string;
  code?: unknown;
  message?: string;
  stack?: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function serializeError(e: unknown): SerializedError {
  if (e instanceof Error) {
    return {
      name: e.name,
      code: "code" in e ? e.code : undefined,
      message: e.message,
      stack: e.stack,
    };
  }
  if (isRecord(e)) {
    return {
      name: typeof e.name === "string" ? e.name : undefined,
      code: e.code,
      message: typeof e.message === "string" ? e.message : undefined,
      stack: typeof e.stack === "string" ? e.stack : undefined,
    };
  }
  return { message: String(e) };
}

export const logger = pino({
  level: logLevel,
  ...(wantPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
            singleLine: false,
          },
        },
      }
    : {}),
  base: undefined, // Omit pid/hostname from JSON output
  // Only the useful fields; discord.js errors carry huge request objects
  serializers: {
    err: serializeError,
  },
  /**
   * Intercepts error-level logs and forwards the attached Error to Sentry,
   * so logger.error({ err }) is all a call site needs.
   */
  hooks: {
    logMethod(args, method, level) {
      if (level >= pino.levels.values.error) {
        const firstArg: unknown = args[0];
        const errorCandidate =
          firstArg instanceof Error
            ? firstArg
            : isRecord(firstArg)
              ? firstArg.err
              : undefined;

        if (errorCandidate instanceof Error) {
          const message = typeof args[1] === "string" ? args[1] : undefined;
          const label = pino.levels.labels[level] ?? "error";

          // Dynamic import avoids a logger ↔ sentry import cycle
          import("./sentry.js")
            .then(({ captureException, isSentryEnabled }) => {
              if (isSentryEnabled()) {
                captureException(errorCandidate, { message, level: label });
              }
            })
            .catch((importErr: unknown) => {
              if (!sentryImportWarned) {
                sentryImportWarned = true;
                console.warn("[logger] Failed to import Sentry module:", serializeError(importErr).message);
              }
            });
        }
      }

      return method.apply(this, args);
    },
  },
});
