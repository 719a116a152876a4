/**
 * Cronus — src/utils/typeGuards.ts
 * WHAT: Type guards for discord.js member types.
 * WHY: Discord provides GuildMember (cached) or APIInteractionGuildMember (uncached).
 *      These guards narrow the type without unsafe casts.
 * DOCS:
 *  - GuildMember: https://discord.js.org/#/docs/discord.js/main/class/GuildMember
 *  - APIInteractionGuildMember: https://discord-api-types.dev/api/discord-api-types-v10/interface/APIInteractionGuildMember
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { GuildMember, APIInteractionGuildMember } from "discord.js";

export type AnyGuildMember = GuildMember | APIInteractionGuildMember;

/**
 * APIInteractionGuildMember has string permissions and a plain role-id array;
 * GuildMember has a PermissionsBitField and a role manager.
 */
export function isGuildMember(member: AnyGuildMember | null | undefined): member is GuildMember {
  if (!member) return false;
  return typeof member.permissions !== "string" && !Array.isArray(member.roles);
}
