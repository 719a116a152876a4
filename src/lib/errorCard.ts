/**
 * Cronus — src/lib/errorCard.ts
 * WHAT: Formats and posts an "error card" to the invoking interaction with helpful diagnostics.
 * WHY: Interactions should never just fail silently; surface context to users and breadcrumbs to logs.
 * FLOWS: hintFor() → build embed → replyOrEdit(public)
 * DOCS:
 *  - Interaction replies (flags): https://discord.js.org/#/docs/discord.js/main/typedef/InteractionReplyOptions
 *  - Interaction response rules (10062 timing): https://discord.com/developers/docs/interactions/receiving-and-responding
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder, type ChatInputCommandInteraction } from "discord.js";
import { logger, redact } from "./logger.js";
import { replyOrEdit } from "./cmdWrap.js";
import { ERROR_COLOR } from "./constants.js";

type ErrLike = { name?: string; message?: string; code?: unknown };

/**
 * Translates raw errors into user-facing hints. Discord codes are cryptic;
 * nobody should have to search "10062" to learn what happened.
 *
 * - 10003: Unknown Channel
 * - 10008: Unknown Message
 * - 10062: Unknown Interaction (3s window)
 * - 40060: Already acknowledged
 * - 50001: Missing Access
 * - 50013: Missing Permissions
 * - 50035: Invalid Form Body (likely a bot bug)
 *
 * Also handles SQLite schema errors and missing configuration.
 */
export function hintFor(err: ErrLike): string {
  const name = err.name;
  const message = err.message ?? "";
  const code = err.code;

  if (name === "SqliteError" && /no such table/i.test(message)) {
    return "Database schema is missing; restart the bot so it can create its tables.";
  }

  if (name === "MissingConfigError") {
    return "This command isn't configured on this deployment. Ask the bot owner to set it up.";
  }

  switch (code) {
    case 10003:
      return "Channel not found. It may have been deleted or bot lacks visibility.";
    case 10008:
      return "Message not found. It may have been deleted.";
    case 10062:
      return "Interaction expired; handler didn't respond in time.";
    case 40060:
      return "Already acknowledged; avoid double reply.";
    case 50001:
      return "Bot lacks access to this resource. Check channel visibility and role permissions.";
    case 50013:
      return "Missing Discord permission in this channel.";
    case 50035:
      return "Invalid request format. This is likely a bot bug; report it with the trace ID.";
  }

  return "Unexpected error. Try again or contact staff.";
}

/**
 * SQL gets collapsed to one line and truncated; the query shape is enough.
 */
function truncateSql(sql: string | null | undefined): string {
  if (!sql) return "n/a";
  const cleaned = sql.replace(/\s+/g, " ").trim();
  if (cleaned.length <= 140) return cleaned;
  return `${cleaned.slice(0, 140)}...`;
}

function truncateMessage(message: string | undefined): string {
  if (!message) return "No message provided";
  const safe = redact(message);
  if (safe.length <= 200) return safe;
  return `${safe.slice(0, 200)}...`;
}

export type ErrorCardDetails = {
  traceId: string;
  cmd: string;
  phase: string;
  err: ErrLike & { stack?: string };
  lastSql?: string | null;
};

/**
 * Build the card on its own so the log-channel mirror and tests can reuse it.
 */
export function buildErrorCard(details: ErrorCardDetails): EmbedBuilder {
  const codeDisplay =
    typeof details.err.code === "string"
      ? details.err.code
      : details.err.code
        ? String(details.err.code)
        : (details.err.name ?? "unknown");

  return new EmbedBuilder()
    .setTitle("Command Error")
    .setColor(ERROR_COLOR)
    .addFields(
      { name: "Command", value: `/${details.cmd}`, inline: true },
      { name: "Phase", value: details.phase || "unknown", inline: true },
      { name: "Code", value: codeDisplay, inline: true },
      { name: "Message", value: truncateMessage(details.err.message) },
      { name: "Last SQL", value: truncateSql(details.lastSql) },
      { name: "Trace", value: details.traceId, inline: true },
      { name: "Hint", value: hintFor(details.err) }
    )
    .setFooter({ text: new Date().toISOString() });
}

/**
 * postErrorCard
 * WHAT: Sends the card as a public reply (flags: 0) so support staff can see it too.
 * RETURNS: Promise<void>; delivery failures are logged, never thrown.
 */
export async function postErrorCard(
  interaction: ChatInputCommandInteraction,
  details: ErrorCardDetails
) {
  const embed = buildErrorCard(details);

  try {
    // Trace ids are correlation ids, not secrets
    await replyOrEdit(interaction, { embeds: [embed], flags: 0 });
  } catch (err) {
    logger.error({ err, traceId: details.traceId, evt: "error_card_fail" }, "failed to deliver error card");
  }
}
