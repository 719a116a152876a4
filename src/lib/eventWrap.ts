/**
 * Cronus — src/lib/eventWrap.ts
 * WHAT: Safe wrapper for discord.js event handlers
 * WHY: Events must never crash the bot; every failure is logged with its classification
 * FLOWS:
 *  - wrapEvent(name, handler, timeoutMs?) → wrapped handler that catches errors and times out
 *  - Sentry capture only for reportable errors
 * USAGE:
 *  import { wrapEvent } from "./eventWrap.js";
 *  client.on(Events.MessageDelete, wrapEvent("messageDelete", async (message) => { ... }));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { captureException } from "./sentry.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";

type EventHandler<T extends unknown[]> = (...args: T) => Promise<void> | void;

/**
 * Default timeout for event handlers. Command dispatch overrides this with
 * COMMAND_EVENT_TIMEOUT_MS because a lookup sleeps between attempts.
 */
export const DEFAULT_EVENT_TIMEOUT_MS = 10_000;

/**
 * Wrap an event handler with error protection and a time bound.
 *
 * The timeout only stops waiting; the handler keeps running. Its outcome is
 * logged as a timeout so slow paths show up.
 */
export function wrapEvent<T extends unknown[]>(
  eventName: string,
  handler: EventHandler<T>,
  timeoutMs: number = DEFAULT_EVENT_TIMEOUT_MS
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        handler(...args),
        new Promise<void>((_, reject) => {
          timer = setTimeout(() => reject(new Error(`Event handler timeout after ${timeoutMs}ms`)), timeoutMs);
          timer.unref();
        }),
      ]);
    } catch (err) {
      const classified = classifyError(err);
      const contextIds = extractEventContext(args);

      logger.error(
        {
          evt: "event_error",
          event: eventName,
          ...errorContext(classified, contextIds),
          err,
        },
        `[${eventName}] event handler failed: ${classified.message}`
      );

      if (shouldReportToSentry(classified)) {
        captureException(err instanceof Error ? err : new Error(String(err)), {
          event: eventName,
          errorKind: classified.kind,
          ...contextIds,
        });
      }
      // Never re-throw: one failing handler must not take the process down
    } finally {
      clearTimeout(timer);
    }
  };
}

function readId(value: unknown, key: string): string | undefined {
  if (!value || typeof value !== "object" || !(key in value)) return undefined;
  const found: unknown = Reflect.get(value, key);
  return typeof found === "string" ? found : undefined;
}

/**
 * Probe event args for guild/user/channel ids. discord.js payloads are
 * polymorphic, so this only reads well-known properties.
 */
export function extractEventContext(args: unknown[]): Record<string, string> {
  const context: Record<string, string> = {};

  for (const arg of args) {
    if (!arg || typeof arg !== "object") continue;

    const guildId = readId(arg, "guildId");
    if (guildId) context.guildId = guildId;

    const entityId = readId(arg, "id");
    if (entityId && !context.entityId) context.entityId = entityId;

    const userId = readId(Reflect.get(arg, "user"), "id") ?? readId(Reflect.get(arg, "author"), "id");
    if (userId) context.userId = userId;

    const channelId = readId(arg, "channelId");
    if (channelId) context.channelId = channelId;
  }

  return context;
}
