/**
 * Cronus — src/lib/reqctx.ts
 * WHAT: Async-local request context for tracing one command invocation.
 * WHY: Lets the lookup orchestrator, reporter and stores log the same traceId
 *      without threading it through every call.
 * FLOWS: newTraceId() → runWithCtx(meta, fn) → ctx() inside nested helpers
 * DOCS:
 *  - Node AsyncLocalStorage: https://nodejs.org/api/async_context.html#class-asynclocalstorage
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";

/** Which surface the invocation came from: a slash command or a `?` message */
export type InvocationKind = "slash" | "prefix";

export type ReqContext = {
  traceId: string;
  cmd?: string;
  kind?: InvocationKind;
  userId?: string;
  guildId?: string | null;
  channelId?: string | null;
};

const storage = new AsyncLocalStorage<ReqContext>();

const BASE62 = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";
const TRACE_ID_LENGTH = 11;

/**
 * 11-char base62 id (~65 bits). Modulo bias is irrelevant for correlation ids.
 */
export function newTraceId(): string {
  const bytes = randomBytes(TRACE_ID_LENGTH);
  let out = "";
  for (const byte of bytes) {
    out += BASE62[byte % BASE62.length];
  }
  return out;
}

/**
 * Binds a merged ReqContext for fn and every async call it makes. Nested calls
 * inherit the parent's fields unless they override them.
 *
 * Gateway events do NOT carry context on their own; index.ts and the prefix
 * listener wrap each dispatch in runWithCtx.
 */
export function runWithCtx<T>(meta: Partial<ReqContext>, fn: () => T): T {
  const parent = storage.getStore();
  const next: ReqContext = {
    traceId: meta.traceId ?? parent?.traceId ?? newTraceId(),
    cmd: meta.cmd ?? parent?.cmd,
    kind: meta.kind ?? parent?.kind,
    userId: meta.userId ?? parent?.userId,
    guildId: meta.guildId ?? parent?.guildId ?? null,
    channelId: meta.channelId ?? parent?.channelId ?? null,
  };
  return storage.run(next, fn);
}

/**
 * Current context, or an empty object outside any invocation so callers can
 * destructure without null checks.
 */
export function ctx(): Partial<ReqContext> {
  return storage.getStore() ?? {};
}
