/**
 * Cronus — src/commands/registry.ts
 * WHAT: The command catalog: every command's definition, category and wrapped executors for both surfaces.
 * WHY: Slash sync, slash dispatch, ? dispatch and /help all read the same list.
 * FLOWS: getCommandCatalog() → CommandEntry[] (built once, on first use)
 * DOCS:
 *  - Slash command deployment: https://discordjs.guide/interactions/deploying-commands.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { ChatInputCommandInteraction, Message, RESTPostAPIChatInputApplicationCommandsJSONBody } from "discord.js";
import { wrapCommand, wrapPrefixCommand, type CommandContext, type PrefixContext } from "../lib/cmdWrap.js";
import * as sentry from "./sentry.js";
import * as ping from "./ping.js";
import * as about from "./about.js";
import * as help from "./help.js";
import { dog, cat, meme, buzzword, insult, trump, age, country } from "./fun.js";

export type CommandCategory = "Support" | "Utility" | "Fun";

/** What each command module exports */
export type CommandModule = {
  data: {
    readonly name: string;
    readonly description: string;
    toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody;
  };
  usage: string;
  /** Positional args required on the ? surface */
  minArgs?: number;
  execute: (ctx: CommandContext) => Promise<void>;
  executePrefix: (ctx: PrefixContext) => Promise<void>;
};

export type CommandEntry = {
  name: string;
  description: string;
  category: CommandCategory;
  usage: string;
  minArgs: number;
  json: RESTPostAPIChatInputApplicationCommandsJSONBody;
  runSlash: (interaction: ChatInputCommandInteraction) => Promise<void>;
  runPrefix: (message: Message, args: string[]) => Promise<void>;
};

export function toEntry(category: CommandCategory, mod: CommandModule): CommandEntry {
  const { name, description } = mod.data;
  return {
    name,
    description,
    category,
    usage: mod.usage,
    minArgs: mod.minArgs ?? 0,
    json: mod.data.toJSON(),
    runSlash: wrapCommand(name, mod.execute),
    runPrefix: wrapPrefixCommand(name, mod.executePrefix),
  };
}

let catalog: CommandEntry[] | null = null;

/**
 * Built lazily: help.ts and about.ts import this module, and this module
 * imports them, so nothing may read their exports at load time.
 */
export function getCommandCatalog(): CommandEntry[] {
  if (!catalog) {
    catalog = [
      toEntry("Support", sentry),
      toEntry("Utility", ping),
      toEntry("Utility", about),
      toEntry("Utility", help),
      toEntry("Fun", dog),
      toEntry("Fun", cat),
      toEntry("Fun", meme),
      toEntry("Fun", buzzword),
      toEntry("Fun", insult),
      toEntry("Fun", trump),
      toEntry("Fun", age),
      toEntry("Fun", country),
    ];
  }
  return catalog;
}

export function findCommand(name: string): CommandEntry | undefined {
  const lowered = name.toLowerCase();
  return getCommandCatalog().find((entry) => entry.name === lowered);
}

/**
 * Returns all slash commands for registration with Discord's API.
 */
export function getAllSlashCommands(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return getCommandCatalog().map((entry) => entry.json);
}
