/**
 * Cronus — src/lib/owner.ts
 * WHAT: Bot-owner override for role-gated commands.
 * WHY: The people running the bot need /sentry in servers where they hold no Support role.
 * FLOWS: parse OWNER_IDS once → isOwner(userId)
 * DOCS:
 *  - Environment: OWNER_IDS as comma-separated user IDs
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { env } from "./env.js";

/**
 * "123, 456,,789" → ["123", "456", "789"]
 */
export function parseOwnerIds(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
}

// Parsed once at module load; these ids bypass every role check, keep the list short
const ownerIds = parseOwnerIds(env.OWNER_IDS);

export function isOwner(userId: string): boolean {
  return ownerIds.includes(userId);
}
