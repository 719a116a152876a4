/**
 * Cronus — src/commands/help.ts
 * WHAT: /help and ?help: the command list grouped by category.
 * WHY: Both surfaces take the same commands; one list shows how to call each.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder, SlashCommandBuilder } from "discord.js";
import { replyOrEdit, withStep, type CommandContext, type PrefixContext } from "../lib/cmdWrap.js";
import { env } from "../lib/env.js";
import { EMBED_COLOR, QUIET_REPLY_MENTIONS } from "../lib/constants.js";
import { getCommandCatalog, type CommandEntry } from "./registry.js";

export const data = new SlashCommandBuilder().setName("help").setDescription("Get a list of commands");

export const usage = "help";

/**
 * Categories sorted by name, commands in catalog order within each.
 */
export function buildHelpEmbed(entries: CommandEntry[], prefix: string = env.BOT_PREFIX): EmbedBuilder {
  const embed = new EmbedBuilder().setTitle("Command List").setColor(EMBED_COLOR);

  if (entries.length === 0) {
    return embed.setDescription("Cronus is still loading commands; please try again in a few seconds.");
  }

  const byCategory = new Map<string, string[]>();
  for (const entry of entries) {
    const lines = byCategory.get(entry.category) ?? [];
    lines.push(`\`/${entry.name}\` ${entry.description}`);
    byCategory.set(entry.category, lines);
  }

  for (const category of [...byCategory.keys()].sort()) {
    embed.addFields({ name: category, value: (byCategory.get(category) ?? []).join("\n") });
  }

  return embed.setFooter({ text: `Every command also works as ${prefix}name, e.g. ${prefix}sentry <error_id>` });
}

export async function execute(ctx: CommandContext): Promise<void> {
  const { interaction } = ctx;
  await withStep(ctx, "reply", () =>
    replyOrEdit(interaction, { embeds: [buildHelpEmbed(getCommandCatalog())], flags: 0 })
  );
}

export async function executePrefix(ctx: PrefixContext): Promise<void> {
  const { message } = ctx;
  await withStep(ctx, "reply", () =>
    message.reply({ embeds: [buildHelpEmbed(getCommandCatalog())], allowedMentions: QUIET_REPLY_MENTIONS })
  );
}
