/**
 * Cronus — src/lib/sentry.ts
 * WHAT: Sentry bootstrap and small helpers for capture/contexts.
 * WHY: Centralizes the bot's own error tracking with safe shutdown and guardrails when DSN is invalid.
 * FLOWS: initializeSentry() → isSentryEnabled → captureException/Message → flushSentry on shutdown
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 *
 * NOTE: this is where the bot reports ITS OWN failures. The /sentry command
 * talks to an issue-search HTTP API instead; see features/issueLookup.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import fs from "node:fs";
import path from "node:path";
import { env } from "./env.js";
import { logger } from "./logger.js";

let sentryEnabled = false;

const SECRET_ENV_KEYS = ["DISCORD_TOKEN", "SENTRY_DSN", "SENTRY_API_KEY", "DOG_API_KEY", "CAT_API_KEY"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function hasValidDsn(dsn: string | undefined): dsn is string {
  // Sentry DSN format: https://{key}@{org}.ingest.sentry.io/{project}
  // Structure check only; a revoked key is caught by the 403 handler below.
  if (!dsn) return false;
  try {
    const parsed = new URL(dsn);
    return (
      (parsed.protocol === "https:" || parsed.protocol === "http:") &&
      parsed.username.length > 0 &&
      parsed.pathname.length > 1
    );
  } catch {
    return false;
  }
}

// Release tag from package.json
function getVersion(): string {
  try {
    const packagePath = path.join(process.cwd(), "package.json");
    const packageJson: unknown = JSON.parse(fs.readFileSync(packagePath, "utf-8"));
    if (packageJson && typeof packageJson === "object" && "version" in packageJson) {
      const { version } = packageJson;
      if (typeof version === "string") return version;
    }
    return "unknown";
  } catch {
    return "unknown";
  }
}

/**
 * Initialize Sentry error tracking.
 * Only activates if SENTRY_DSN is valid and we're not running tests.
 */
export function initializeSentry() {
  if (process.env.VITEST_WORKER_ID) {
    return;
  }

  if (!hasValidDsn(env.SENTRY_DSN)) {
    logger.info("Sentry DSN missing or invalid, error tracking disabled");
    return;
  }

  try {
    Sentry.init({
      dsn: env.SENTRY_DSN,
      environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV,
      release: `cronus-bot@${getVersion()}`,
      tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,

      integrations: [
        Sentry.consoleIntegration({ levels: ["error", "warn"] }),
        Sentry.httpIntegration(),
        Sentry.onUncaughtExceptionIntegration({
          onFatalError: async (err: Error) => {
            logger.fatal({ err }, "Uncaught exception detected by Sentry");
            process.exit(1);
          },
        }),
        Sentry.onUnhandledRejectionIntegration({ mode: "warn" }),
      ],

      // Scrub secrets before anything leaves the process
      beforeSend(event) {
        if (event.message) {
          event.message = redactSecrets(event.message);
        }
        const runtimeEnv = event.contexts?.runtime?.env;
        if (isRecord(runtimeEnv)) {
          for (const key of SECRET_ENV_KEYS) {
            if (runtimeEnv[key]) runtimeEnv[key] = "[REDACTED]";
          }
        }
        return event;
      },

      // Transient network noise; the issue lookup already retries and logs these
      ignoreErrors: ["DiscordAPIError", "AbortError", "TimeoutError", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND"],

      debug: env.NODE_ENV === "development",
    });

    sentryEnabled = true;
    logger.info({ environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV }, "Sentry initialized");

    // A 403 means the DSN was revoked. Stop sending instead of spamming rejected events.
    const client = Sentry.getClient();
    client?.on("afterSendEvent", (_event, response) => {
      if (response?.statusCode === 403) {
        logger.warn({ statusCode: 403 }, "Sentry unauthorized (403); disabling capture");
        sentryEnabled = false;
        client.close(0).then(undefined, () => undefined);
      }
    });
  } catch (err) {
    logger.error({ err }, "Failed to initialize Sentry");
    sentryEnabled = false;
  }
}

function redactSecrets(text: string): string {
  return text
    .replace(/[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g, "[REDACTED_TOKEN]")
    .replace(/Bearer\s+[A-Za-z0-9._~+/=-]+/gi, "Bearer [REDACTED]");
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

/**
 * Capture an exception in Sentry
 */
export function captureException(error: unknown, context?: Record<string, unknown>): string | null {
  if (!sentryEnabled) return null;

  return Sentry.captureException(error, {
    contexts: context ? { custom: context } : undefined,
  });
}

/**
 * Add breadcrumb for debugging context
 */
export function addBreadcrumb(breadcrumb: {
  message: string;
  category?: string;
  level?: Sentry.SeverityLevel;
  data?: Record<string, unknown>;
}) {
  if (!sentryEnabled) return;

  Sentry.addBreadcrumb(breadcrumb);
}

export function setUser(user: { id: string; username?: string }) {
  if (!sentryEnabled) return;

  Sentry.setUser(user);
}

/**
 * Set tags for filtering errors
 */
export function setTag(key: string, value: string) {
  if (!sentryEnabled) return;

  Sentry.setTag(key, value);
}

export function setContext(name: string, context: Record<string, unknown>) {
  if (!sentryEnabled) return;

  Sentry.setContext(name, context);
}

/**
 * Flush any pending events (use before shutdown)
 */
export async function flushSentry(timeout = 2000): Promise<boolean> {
  if (!sentryEnabled) return true;

  try {
    return await Sentry.close(timeout);
  } catch (err) {
    logger.error({ err }, "Failed to flush Sentry events");
    return false;
  }
}
