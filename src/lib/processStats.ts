/**
 * Cronus — src/lib/processStats.ts
 * WHAT: Process memory and a short CPU sample for /about.
 * WHY: A single cpuUsage() call is cumulative since boot; a percentage needs a window.
 * DOCS:
 *  - process.cpuUsage: https://nodejs.org/api/process.html#processcpuusagepreviousvalue
 *  - process.memoryUsage: https://nodejs.org/api/process.html#processmemoryusage
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { setTimeout as sleep } from "node:timers/promises";
import { CPU_SAMPLE_MS } from "./constants.js";

/** Resident set size in MiB */
export function rssMegabytes(): number {
  return process.memoryUsage().rss / (1024 * 1024);
}

/**
 * CPU used by this process over the window, as a percentage of one core.
 * Can exceed 100 when worker threads or native add-ons run in parallel.
 */
export async function sampleCpuPercent(windowMs: number = CPU_SAMPLE_MS): Promise<number> {
  const startUsage = process.cpuUsage();
  const startedAt = process.hrtime.bigint();
  await sleep(windowMs);
  const usage = process.cpuUsage(startUsage);
  const elapsedMicros = Number(process.hrtime.bigint() - startedAt) / 1000;
  if (elapsedMicros <= 0) return 0;
  const percent = ((usage.user + usage.system) / elapsedMicros) * 100;
  return Math.round(percent * 10) / 10;
}
