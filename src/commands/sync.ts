/**
 * Cronus — src/commands/sync.ts
 * WHAT: Slash-command sync: bulk overwrite to one guild (GUILD_ID) or globally.
 * WHY: Keeps the registered commands identical to the catalog on every start.
 * FLOWS:
 *  - syncCommands(): GUILD_ID set → syncCommandsToGuild, else syncCommandsGlobally
 *  - each: serialize catalog → REST PUT (retried on 5xx/network) → log
 * DOCS:
 *  - Bulk overwrite: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-guild-application-commands
 *  - REST client: https://discord.js.org/#/docs/rest/main/class/REST
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { REST, Routes } from "discord.js";
import { getAllSlashCommands } from "./registry.js";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";
import { withRetry } from "../lib/retry.js";
import { DISCORD_COMMAND_SYNC_DELAY_MS } from "../lib/constants.js";

/**
 * PUT replaces the whole set: additions, updates and removals in one call.
 * Guild-scoped commands update instantly; global ones can take up to an hour.
 */
async function putCommands(route: `/${string}`, label: string, rest: REST): Promise<number> {
  const body = getAllSlashCommands();
  await withRetry(() => rest.put(route, { body }), {
    maxAttempts: 3,
    initialDelayMs: DISCORD_COMMAND_SYNC_DELAY_MS,
    label,
  });
  return body.length;
}

function createRest(): REST {
  return new REST({ version: "10" }).setToken(env.DISCORD_TOKEN);
}

export async function syncCommandsToGuild(guildId: string, rest: REST = createRest()): Promise<boolean> {
  try {
    const count = await putCommands(Routes.applicationGuildCommands(env.CLIENT_ID, guildId), "command_sync_guild", rest);
    logger.info({ evt: "cmdsync_ok", guildId, count }, "[cmdsync] synced commands to guild");
    return true;
  } catch (err) {
    logger.warn({ evt: "cmdsync_fail", guildId, err }, "[cmdsync] failed to sync guild");
    return false;
  }
}

export async function syncCommandsGlobally(rest: REST = createRest()): Promise<boolean> {
  try {
    const count = await putCommands(Routes.applicationCommands(env.CLIENT_ID), "command_sync_global", rest);
    logger.info({ evt: "cmdsync_ok", scope: "global", count }, "[cmdsync] synced global commands");
    return true;
  } catch (err) {
    logger.warn({ evt: "cmdsync_fail", scope: "global", err }, "[cmdsync] failed to sync global commands");
    return false;
  }
}

export async function syncCommands(): Promise<boolean> {
  return env.GUILD_ID ? syncCommandsToGuild(env.GUILD_ID) : syncCommandsGlobally();
}
