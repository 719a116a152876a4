/**
 * Cronus — src/utils/requireSupportRole.ts
 * WHAT: Authorization helper for support tooling (/sentry, ?sentry).
 * WHY: Both command surfaces gate on the same role name; one check keeps them aligned.
 * FLOWS:
 *  - Bot owner override (OWNER_IDS)
 *  - Member holds a role named SUPPORT_ROLE_NAME (case-sensitive, like Discord shows it)
 * DOCS:
 *  - Roles: https://discord.js.org/#/docs/discord.js/main/class/GuildMemberRoleManager
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Guild } from "discord.js";
import { env } from "../lib/env.js";
import { isOwner } from "../lib/owner.js";
import { isGuildMember, type AnyGuildMember } from "./typeGuards.js";

/**
 * Role names the member holds. API members only carry role ids, which are
 * resolved through the guild's role cache; unknown ids are skipped.
 */
export function memberRoleNames(member: AnyGuildMember, guild: Guild | null): string[] {
  if (isGuildMember(member)) {
    return member.roles.cache.map((role) => role.name);
  }
  if (!guild) return [];
  const names: string[] = [];
  for (const roleId of member.roles) {
    const role = guild.roles.cache.get(roleId);
    if (role) names.push(role.name);
  }
  return names;
}

export function hasSupportRole(
  member: AnyGuildMember | null | undefined,
  guild: Guild | null,
  roleName: string = env.SUPPORT_ROLE_NAME
): boolean {
  if (!member) return false;
  return memberRoleNames(member, guild).includes(roleName);
}

/**
 * Owners always pass; everyone else needs the support role inside a guild.
 * DMs have no member, so only owners can use support tools there.
 */
export function canUseSupportTools(
  userId: string,
  member: AnyGuildMember | null | undefined,
  guild: Guild | null
): boolean {
  if (isOwner(userId)) return true;
  return hasSupportRole(member, guild);
}
