/**
 * WHAT: Proves the /about process figures stay in sane ranges.
 * DOCS: https://nodejs.org/api/process.html#processcpuusagepreviousvalue
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect } from "vitest";
import { rssMegabytes, sampleCpuPercent } from "../../src/lib/processStats.js";

describe("processStats", () => {
  it("reports resident memory in MiB", () => {
    const rss = rssMegabytes();
    expect(rss).toBeGreaterThan(0);
    expect(rss).toBeCloseTo(process.memoryUsage().rss / (1024 * 1024), -1);
  });

  it("samples CPU as a non-negative percentage with one decimal", async () => {
    const percent = await sampleCpuPercent(5);
    expect(percent).toBeGreaterThanOrEqual(0);
    expect(Math.round(percent * 10) / 10).toBe(percent);
  });
});
