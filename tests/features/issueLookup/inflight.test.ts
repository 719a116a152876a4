/**
 * WHAT: Proves the in-flight lookup registry aborts by progress message id and on shutdown.
 * DOCS: https://vitest.dev/guide/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect } from "vitest";
import { InflightLookups } from "../../../src/features/issueLookup/inflight.js";

describe("InflightLookups", () => {
  it("aborts the controller registered for a message id", () => {
    const registry = new InflightLookups();
    const controller = new AbortController();
    registry.register("msg-1", controller);

    expect(registry.abortByMessageId("msg-1")).toBe(true);
    expect(controller.signal.aborted).toBe(true);
    expect(controller.signal.reason).toBeInstanceOf(Error);
    expect(registry.size).toBe(0);
  });

  it("ignores ids it doesn't know", () => {
    const registry = new InflightLookups();
    expect(registry.abortByMessageId("msg-unknown")).toBe(false);
  });

  it("only releases an entry owned by the same controller", () => {
    const registry = new InflightLookups();
    const first = new AbortController();
    const second = new AbortController();
    registry.register("msg-1", first);
    registry.register("msg-1", second);

    registry.release("msg-1", first);
    expect(registry.size).toBe(1);

    registry.release("msg-1", second);
    expect(registry.size).toBe(0);
  });

  it("aborts everything on shutdown", () => {
    const registry = new InflightLookups();
    const controllers = [new AbortController(), new AbortController()];
    registry.register("msg-1", controllers[0] ?? new AbortController());
    registry.register("msg-2", controllers[1] ?? new AbortController());

    expect(registry.abortAll("shutting down")).toBe(2);
    expect(controllers.every((c) => c.signal.aborted)).toBe(true);
    expect(registry.size).toBe(0);
    expect(registry.abortAll()).toBe(0);
  });
});
