/**
 * WHAT: Proves the backoff formula and withRetry's retry/give-up decisions.
 * HOW: Real sleeps kept to a few milliseconds; jitter disabled so delays stay predictable.
 * DOCS: https://vitest.dev/guide/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, vi } from "vitest";
import { backoffDelayMs, withRetry } from "../../src/lib/retry.js";

function networkError(): Error {
  return Object.assign(new Error("connection reset"), { code: "ECONNRESET" });
}

describe("backoffDelayMs", () => {
  it("multiplies the initial delay once per earlier attempt", () => {
    expect(backoffDelayMs(1, 2000, 1.3)).toBe(2000);
    expect(backoffDelayMs(2, 2000, 1.3)).toBeCloseTo(2600, 9);
    expect(backoffDelayMs(3, 2000, 1.3)).toBeCloseTo(3380, 9);
    expect(backoffDelayMs(4, 100, 2)).toBe(800);
  });
});

describe("withRetry", () => {
  it("returns the first successful result", async () => {
    const fn = vi.fn(async () => "ok");
    await expect(withRetry(fn)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries recoverable errors with backoff", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(networkError())
      .mockRejectedValueOnce(networkError())
      .mockResolvedValueOnce("ok");

    await expect(withRetry(fn, { maxAttempts: 3, initialDelayMs: 1, jitter: false })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry errors that aren't recoverable", async () => {
    const fn = vi.fn(async () => {
      throw new Error("bug");
    });

    await expect(withRetry(fn, { maxAttempts: 5 })).rejects.toThrow("bug");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("throws the last error when attempts run out", async () => {
    const fn = vi.fn(async () => {
      throw networkError();
    });

    await expect(withRetry(fn, { maxAttempts: 2, initialDelayMs: 1, jitter: false })).rejects.toThrow(
      "connection reset"
    );
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("honors a custom shouldRetry", async () => {
    const fn = vi.fn(async () => {
      throw networkError();
    });

    await expect(withRetry(fn, { shouldRetry: () => false })).rejects.toThrow("connection reset");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("rejects a maxAttempts below 1", async () => {
    await expect(withRetry(async () => "ok", { maxAttempts: 0 })).rejects.toThrow(/maxAttempts must be >= 1/);
  });
});
