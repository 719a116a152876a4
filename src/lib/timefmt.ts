/**
 * Cronus — src/lib/timefmt.ts
 * WHAT: Timestamp parsing and formatting for Discord timestamp markup and uptimes.
 * WHY: Issue panels show "last seen" as a client-rendered relative time; /about shows uptime.
 * DOCS:
 *  - Discord timestamps: https://discord.com/developers/docs/reference#message-formatting
 *  - ISO 8601: https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Date/toISOString
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/**
 * Date-time with a mandatory zone designator: `Z` or `±HH:MM`.
 * Date.parse alone accepts far too much ("2024", "Jan 1") and treats a missing
 * zone as local time, which would silently shift the instant.
 */
const ISO_INSTANT_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d{1,9})?)?(Z|[+-]\d{2}:\d{2})$/;

/**
 * Parse an ISO-8601 timestamp into epoch milliseconds (UTC).
 * Returns null for anything that isn't a zoned ISO instant or doesn't exist on
 * the calendar (2024-02-30T00:00:00Z).
 */
export function parseIsoInstant(value: unknown): number | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (!ISO_INSTANT_RE.test(trimmed)) return null;

  // JS Date only keeps milliseconds; longer fractions would make Date.parse fail
  const normalized = trimmed.replace(/(\.\d{3})\d+/, "$1");
  const ms = Date.parse(normalized);
  if (Number.isNaN(ms)) return null;

  // Date.parse rolls 2024-02-30 over to March; reject it instead
  const [, month, day] = /^\d{4}-(\d{2})-(\d{2})/.exec(trimmed) ?? [];
  if (month === undefined || day === undefined) return null;
  const offsetMatch = /([+-])(\d{2}):(\d{2})$/.exec(trimmed);
  const offsetMs = offsetMatch
    ? (offsetMatch[1] === "-" ? -1 : 1) * (Number(offsetMatch[2]) * 60 + Number(offsetMatch[3])) * 60_000
    : 0;
  const local = new Date(ms + offsetMs);
  if (local.getUTCMonth() + 1 !== Number(month) || local.getUTCDate() !== Number(day)) {
    return null;
  }
  return ms;
}

/**
 * <t:epochSec:R> → "2 minutes ago" / "in 5 hours". The client keeps it live,
 * so an issue embed posted once stays accurate.
 */
export function toDiscordRel(epochSec: number): string {
  return `<t:${epochSec}:R>`;
}

/**
 * "1d 2h 3m 4s"; always shows at least "0s".
 */
export function formatUptime(seconds: number): string {
  const whole = Math.max(0, Math.floor(seconds));
  const days = Math.floor(whole / 86400);
  const hours = Math.floor((whole % 86400) / 3600);
  const minutes = Math.floor((whole % 3600) / 60);
  const secs = whole % 60;

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (secs > 0 || parts.length === 0) parts.push(`${secs}s`);

  return parts.join(" ");
}

/** Seconds with one decimal ("2.6") for countdown text */
export function formatSeconds(ms: number): string {
  return (ms / 1000).toFixed(1);
}
