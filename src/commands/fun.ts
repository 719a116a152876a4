/**
 * Cronus — src/commands/fun.ts
 * WHAT: /dog, /cat, /meme, /buzzword, /insult, /trump, /age, /country (and their ? forms): one-shot entertainment lookups.
 * WHY: Small morale features for the community; each is one HTTP call rendered as an embed.
 * FLOWS: defer → getFunReply(request) → embed or short error text
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext, type PrefixContext } from "../lib/cmdWrap.js";
import { QUIET_REPLY_MENTIONS } from "../lib/constants.js";
import { getFunReply, type FunKind, type FunQueryKind, type FunReply, type FunRequest } from "../features/fun/api.js";

const QUERY_MAX_LENGTH = 100;

function replyPayload(reply: FunReply) {
  return reply.kind === "embed" ? { embeds: [reply.embed] } : { content: reply.content };
}

async function runSlash(ctx: CommandContext, request: FunRequest): Promise<void> {
  const { interaction } = ctx;
  // APIs can take several seconds; don't let the 3s window lapse
  await ensureDeferred(interaction, { ephemeral: false });
  const reply = await withStep(ctx, "fetch", () => getFunReply(request));
  await withStep(ctx, "reply", () =>
    replyOrEdit(interaction, { ...replyPayload(reply), allowedMentions: QUIET_REPLY_MENTIONS, flags: 0 })
  );
}

async function runPrefix(ctx: PrefixContext, request: FunRequest): Promise<void> {
  const reply = await withStep(ctx, "fetch", () => getFunReply(request));
  await withStep(ctx, "reply", () =>
    ctx.message.reply({ ...replyPayload(reply), allowedMentions: QUIET_REPLY_MENTIONS })
  );
}

/**
 * Each fun command is the same shape; only the API and the description differ.
 */
function funCommand(kind: FunKind, description: string) {
  const data = new SlashCommandBuilder().setName(kind).setDescription(description);

  return {
    data,
    usage: kind,
    execute: (ctx: CommandContext) => runSlash(ctx, { kind }),
    executePrefix: (ctx: PrefixContext) => runPrefix(ctx, { kind }),
  };
}

/**
 * Same, plus one required string. On the ? surface the query is either the
 * first word or, with `restOfLine`, everything after the command name.
 */
function funQueryCommand(
  kind: FunQueryKind,
  description: string,
  option: { name: string; description: string; restOfLine: boolean }
) {
  const data = new SlashCommandBuilder()
    .setName(kind)
    .setDescription(description)
    .addStringOption((opt) =>
      opt.setName(option.name).setDescription(option.description).setRequired(true).setMaxLength(QUERY_MAX_LENGTH)
    );

  async function execute(ctx: CommandContext): Promise<void> {
    const query = (ctx.interaction.options.getString(option.name, true) ?? "").trim();
    if (!query) {
      await withStep(ctx, "reply", () =>
        replyOrEdit(ctx.interaction, { content: `Please provide a ${option.name}.`, flags: 0 })
      );
      return;
    }
    await runSlash(ctx, { kind, query });
  }

  async function executePrefix(ctx: PrefixContext): Promise<void> {
    const query = (option.restOfLine ? ctx.args.join(" ") : ctx.args[0] ?? "").slice(0, QUERY_MAX_LENGTH);
    await runPrefix(ctx, { kind, query });
  }

  return { data, usage: `${kind} <${option.name}>`, minArgs: 1, execute, executePrefix };
}

export const dog = funCommand("dog", "Get a random dog image");
export const cat = funCommand("cat", "Get a random cat image");
export const meme = funCommand("meme", "Get a random meme");
export const buzzword = funCommand("buzzword", "Get a random buzzword");
export const insult = funCommand("insult", "Get a random insult");
export const trump = funCommand("trump", "Get a random quote from Donald Trump");
export const age = funQueryCommand("age", "Get the age of a person", {
  name: "name",
  description: "The first name to look up",
  restOfLine: false,
});
export const country = funQueryCommand("country", "Get information about a country", {
  name: "country",
  description: "The country's name",
  restOfLine: true,
});
