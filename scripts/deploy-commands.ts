/**
 * Cronus — scripts/deploy-commands.ts
 * WHAT: CLI helper to bulk overwrite slash commands (one guild or global) and verify they registered.
 * WHY: Lets whoever deploys the bot push command changes without starting it.
 * FLOWS: build commands → REST PUT → GET back → check every name is present
 * USAGE:
 *  tsx scripts/deploy-commands.ts --guild <guildId>
 *  tsx scripts/deploy-commands.ts --global
 *  tsx scripts/deploy-commands.ts --guild <guildId> --clear
 * DOCS:
 *  - REST client / Routes: https://discord.js.org/#/docs/rest/main/class/REST
 *  - Bulk overwrite guild commands: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-guild-application-commands
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { fileURLToPath } from "node:url";
import { REST, Routes } from "discord.js";
import { env } from "../src/lib/env.js";
import { buildCommands } from "../src/commands/buildCommands.js";

export type DeployTarget = { scope: "guild"; guildId: string } | { scope: "global" };

export type DeployArgs = { target: DeployTarget; clear: boolean };

/**
 * Parse argv (without node and script path). Returns null on bad usage.
 */
export function parseDeployArgs(argv: string[], defaultGuildId?: string): DeployArgs | null {
  const clear = argv.includes("--clear");
  if (argv.includes("--global")) {
    return { target: { scope: "global" }, clear };
  }
  const guildFlag = argv.indexOf("--guild");
  if (guildFlag !== -1) {
    const guildId = argv[guildFlag + 1];
    if (!guildId || guildId.startsWith("--")) return null;
    return { target: { scope: "guild", guildId }, clear };
  }
  if (defaultGuildId) {
    return { target: { scope: "guild", guildId: defaultGuildId }, clear };
  }
  return null;
}

function routeFor(appId: string, target: DeployTarget): `/${string}` {
  return target.scope === "global"
    ? Routes.applicationCommands(appId)
    : Routes.applicationGuildCommands(appId, target.guildId);
}

/** REST#get returns unknown; keep only entries that carry a string name */
export function registeredNames(body: unknown): string[] {
  if (!Array.isArray(body)) return [];
  const names: string[] = [];
  for (const entry of body) {
    if (typeof entry === "object" && entry !== null && "name" in entry && typeof entry.name === "string") {
      names.push(entry.name);
    }
  }
  return names;
}

/** Names we pushed that Discord doesn't report back */
export function missingCommandNames(expected: string[], registered: string[]): string[] {
  const present = new Set(registered);
  return expected.filter((name) => !present.has(name));
}

export async function deploy(rest: REST, appId: string, args: DeployArgs): Promise<string[]> {
  const route = routeFor(appId, args.target);
  const commands = args.clear ? [] : buildCommands();

  await rest.put(route, { body: commands });
  const registered = registeredNames(await rest.get(route));
  return missingCommandNames(
    commands.map((cmd) => cmd.name),
    registered
  );
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  const args = parseDeployArgs(process.argv.slice(2), env.GUILD_ID);
  if (!args) {
    console.error("Usage: tsx scripts/deploy-commands.ts (--guild <guildId> | --global) [--clear]");
    process.exit(1);
  }

  const rest = new REST({ version: "10" }).setToken(env.DISCORD_TOKEN);
  const where = args.target.scope === "global" ? "global" : `guild ${args.target.guildId}`;
  try {
    const missing = await deploy(rest, env.CLIENT_ID, args);
    if (missing.length > 0) {
      console.error(`[deploy] ${where}: missing after sync: ${missing.join(", ")}`);
      process.exit(1);
    }
    console.log(`[deploy] ${where}: ${args.clear ? "cleared" : "synced"} successfully`);
  } catch (err) {
    console.error(`[deploy] ${where}: failed`, err);
    process.exit(1);
  }
}
