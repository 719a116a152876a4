/**
 * WHAT: Proves the async-local request context propagates and merges across awaits.
 * DOCS: https://nodejs.org/api/async_context.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect } from "vitest";
import { ctx, newTraceId, runWithCtx } from "../../src/lib/reqctx.js";

describe("newTraceId", () => {
  it("returns 11 base62 characters", () => {
    expect(newTraceId()).toMatch(/^[0-9A-Za-z]{11}$/);
  });
});

describe("runWithCtx", () => {
  it("is empty outside any invocation", () => {
    expect(ctx()).toEqual({});
  });

  it("keeps the context across awaits", async () => {
    const seen = await runWithCtx({ traceId: "trace-1", cmd: "sentry", kind: "prefix" }, async () => {
      await new Promise((resolve) => setImmediate(resolve));
      return ctx();
    });

    expect(seen).toMatchObject({ traceId: "trace-1", cmd: "sentry", kind: "prefix", guildId: null, channelId: null });
  });

  it("lets nested calls inherit and override fields", () => {
    const inner = runWithCtx({ traceId: "trace-1", cmd: "sentry", userId: "user-1" }, () =>
      runWithCtx({ cmd: "help" }, () => ctx())
    );

    expect(inner).toMatchObject({ traceId: "trace-1", cmd: "help", userId: "user-1" });
  });

  it("generates a trace id when none is given", () => {
    const traceId = runWithCtx({ cmd: "ping" }, () => ctx().traceId);
    expect(traceId).toMatch(/^[0-9A-Za-z]{11}$/);
  });
});
