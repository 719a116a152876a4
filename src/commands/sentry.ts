/**
 * Cronus — src/commands/sentry.ts
 * WHAT: /sentry error_id:<id> and ?sentry <id>: look up an error tracker issue with live progress.
 * WHY: Support staff paste the error id a user reports and get the matching issue without leaving Discord.
 * FLOWS:
 *  authorize (Support role or owner) → open progress message → runIssueLookup → record history
 * DOCS:
 *  - CommandInteraction: https://discord.js.org/#/docs/discord.js/main/class/CommandInteraction
 *  - Message#reply: https://discord.js.org/#/docs/discord.js/main/class/Message?scrollTo=reply
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder, type ChatInputCommandInteraction, type Message } from "discord.js";
import { replyOrEdit, withSql, withStep, type CommandContext, type PrefixContext, type StepContext } from "../lib/cmdWrap.js";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";
import { QUIET_REPLY_MENTIONS, SEARCH_KEY_MAX_LENGTH } from "../lib/constants.js";
import { canUseSupportTools } from "../utils/requireSupportRole.js";
import {
  runIssueLookup,
  type LookupOutcome,
  type ProgressPayload,
  type ProgressSurface,
} from "../features/issueLookup/index.js";
import { INSERT_LOOKUP_SQL, recordLookup } from "../store/lookupHistoryStore.js";

export const data = new SlashCommandBuilder()
  .setName("sentry")
  .setDescription("Look up an error tracker issue by error ID")
  .addStringOption((option) =>
    option
      .setName("error_id")
      .setDescription("The error ID a user reported")
      .setRequired(true)
      .setMaxLength(SEARCH_KEY_MAX_LENGTH)
  );

export const usage = "sentry <error_id>";
export const minArgs = 1;

export function missingRoleMessage(roleName: string = env.SUPPORT_ROLE_NAME): string {
  return `You are missing at least one of the required roles: '${roleName}'`;
}

/**
 * Slash surface: the interaction reply is the progress message.
 * fetchReply() gives us its id for the in-flight registry. The reply already
 * exists once reply() resolves, so a failed fetch falls back to the
 * interaction id: edits still land, only delete-to-cancel is lost.
 */
export function slashSurface(interaction: ChatInputCommandInteraction): ProgressSurface {
  return {
    async open(payload) {
      await interaction.reply(payload);
      const edit = (next: ProgressPayload) => interaction.editReply(next);
      try {
        const reply = await interaction.fetchReply();
        return { id: reply.id, edit };
      } catch (err) {
        logger.warn(
          { err, interactionId: interaction.id },
          "[sentry] could not fetch progress reply; deleting it will not cancel the lookup"
        );
        return { id: interaction.id, edit };
      }
    },
  };
}

/** Prefix surface: a reply to the invoking message, edited in place */
export function messageSurface(message: Message): ProgressSurface {
  return {
    async open(payload) {
      const reply = await message.reply({
        ...payload,
        allowedMentions: { ...payload.allowedMentions, repliedUser: false },
      });
      return {
        id: reply.id,
        edit: (next) => reply.edit(next),
      };
    },
  };
}

/**
 * A lost history row only costs /about a count; log it and move on.
 */
function recordOutcome(
  ctx: StepContext,
  params: { searchKey: string; outcome: LookupOutcome; requestedBy: string; guildId: string | null }
): void {
  const { outcome } = params;
  try {
    withSql(ctx, INSERT_LOOKUP_SQL, () =>
      recordLookup({
        searchKey: params.searchKey,
        outcome: outcome.kind,
        attempts: outcome.attempts,
        elapsedMs: outcome.elapsedMs,
        issueTitle: outcome.kind === "resolved" ? outcome.record.title : null,
        requestedBy: params.requestedBy,
        guildId: params.guildId,
      })
    );
  } catch (err) {
    logger.warn({ err, traceId: ctx.traceId, searchKey: params.searchKey }, "[sentry] failed to record lookup history");
  }
}

async function lookupAndRecord(
  ctx: StepContext,
  params: { searchKey: string; surface: ProgressSurface; requestedBy: string; guildId: string | null }
): Promise<LookupOutcome> {
  const outcome = await withStep(ctx, "lookup", () =>
    runIssueLookup({ searchKey: params.searchKey, surface: params.surface })
  );
  await withStep(ctx, "record", () => recordOutcome(ctx, { ...params, outcome }));
  return outcome;
}

/**
 * execute
 * WHAT: Slash entry point.
 * THROWS: MissingConfigError when the issue API isn't configured; wrapCommand turns it into an error card.
 */
export async function execute(ctx: CommandContext): Promise<void> {
  const { interaction } = ctx;

  const allowed = await withStep(ctx, "authorize", () =>
    canUseSupportTools(interaction.user.id, interaction.member, interaction.guild)
  );
  if (!allowed) {
    await replyOrEdit(interaction, { content: missingRoleMessage(), allowedMentions: QUIET_REPLY_MENTIONS });
    return;
  }

  const searchKey = interaction.options.getString("error_id", true).trim();
  if (!searchKey) {
    await replyOrEdit(interaction, { content: "Please provide an error ID." });
    return;
  }

  await lookupAndRecord(ctx, {
    searchKey,
    surface: slashSurface(interaction),
    requestedBy: interaction.user.id,
    guildId: interaction.guildId,
  });
}

/**
 * executePrefix
 * WHAT: `?sentry <error_id>`; the dispatcher has already checked minArgs.
 */
export async function executePrefix(ctx: PrefixContext): Promise<void> {
  const { message, args } = ctx;

  const allowed = await withStep(ctx, "authorize", () =>
    canUseSupportTools(message.author.id, message.member, message.guild)
  );
  if (!allowed) {
    await message.reply({ content: missingRoleMessage(), allowedMentions: QUIET_REPLY_MENTIONS });
    return;
  }

  const searchKey = (args[0] ?? "").slice(0, SEARCH_KEY_MAX_LENGTH);

  await lookupAndRecord(ctx, {
    searchKey,
    surface: messageSurface(message),
    requestedBy: message.author.id,
    guildId: message.guildId,
  });
}
