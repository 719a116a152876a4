/**
 * Cronus — src/listeners/prefixCommands.ts
 * WHAT: messageCreate listener that runs `?name args` text commands.
 * WHY: Every slash command also works as a prefix command for people who type faster than they click.
 * FLOWS:
 *  message → skip bots/webhooks → parsePrefixCommand → findCommand → minArgs check
 *    → runWithCtx({ kind: "prefix" }) → entry.runPrefix(message, args)
 * DOCS:
 *  - Message content intent: https://discord.com/developers/docs/topics/gateway#message-content-intent
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { Events, type Message } from "discord.js";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";
import { newTraceId, runWithCtx } from "../lib/reqctx.js";
import { QUIET_REPLY_MENTIONS } from "../lib/constants.js";
import { findCommand } from "../commands/registry.js";

export const name = Events.MessageCreate;

export const MISSING_ARGS_MESSAGE = "You're missing some arguments.";

export type ParsedPrefixCommand = {
  name: string;
  args: string[];
};

/**
 * Splits `?sentry abc 123` into { name: "sentry", args: ["abc", "123"] }.
 * Returns null when the content doesn't start with the prefix or names nothing.
 */
export function parsePrefixCommand(content: string, prefix: string = env.BOT_PREFIX): ParsedPrefixCommand | null {
  if (!content.startsWith(prefix)) return null;

  const [commandName, ...args] = content.slice(prefix.length).trim().split(/\s+/);
  if (!commandName) return null;

  return { name: commandName.toLowerCase(), args };
}

export async function handlePrefixMessage(message: Message): Promise<void> {
  if (message.author.bot || message.webhookId) return;

  const parsed = parsePrefixCommand(message.content);
  if (!parsed) return;

  const entry = findCommand(parsed.name);
  if (!entry) {
    logger.warn({ cmd: parsed.name, userId: message.author.id, guildId: message.guildId }, "Command not found");
    return;
  }

  if (parsed.args.length < entry.minArgs) {
    await message.reply({ content: MISSING_ARGS_MESSAGE, allowedMentions: QUIET_REPLY_MENTIONS });
    return;
  }

  await runWithCtx(
    {
      traceId: newTraceId(),
      cmd: entry.name,
      kind: "prefix",
      userId: message.author.id,
      guildId: message.guildId,
      channelId: message.channelId,
    },
    () => entry.runPrefix(message, parsed.args)
  );
}
