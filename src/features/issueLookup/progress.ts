/**
 * Cronus — src/features/issueLookup/progress.ts
 * WHAT: Renders lookup progress events and keeps one chat message updated with them.
 * WHY: The caller watches a single message go "Fetching..." → "Retrying in 2.6 seconds" → issue embed,
 *      instead of a trail of new messages.
 * FLOWS:
 *  createProgressReporter(surface).report(event)
 *    first event → surface.open(payload) → handle
 *    later events → handle.edit(payload)
 * DOCS:
 *  - Message edits: https://discord.js.org/#/docs/discord.js/main/class/Message?scrollTo=edit
 *  - Allowed mentions: https://discord.com/developers/docs/resources/message#allowed-mentions-object
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder, escapeMarkdown, type MessageMentionOptions } from "discord.js";
import { logger } from "../../lib/logger.js";
import { classifyError, errorContext, isUnknownMessage } from "../../lib/errors.js";
import { ctx as reqCtx } from "../../lib/reqctx.js";
import { formatSeconds } from "../../lib/timefmt.js";
import {
  EMBED_COLOR,
  EMBED_FIELD_VALUE_MAX,
  EMBED_TITLE_MAX,
  SAFE_ALLOWED_MENTIONS,
} from "../../lib/constants.js";
import { DESCRIPTION_FALLBACK } from "./normalize.js";
import type { IssueRecord, ProgressEvent, ProgressSink, Unhandled } from "./types.js";

export type ProgressPayload = {
  content: string;
  embeds: EmbedBuilder[];
  allowedMentions: MessageMentionOptions;
};

/** The message being edited; `id` keys the in-flight registry */
export interface ProgressHandle {
  readonly id: string;
  edit(payload: ProgressPayload): Promise<unknown>;
}

/**
 * Where progress messages live. Slash commands open with interaction.reply,
 * prefix commands with message.reply; both hand back an editable handle.
 */
export interface ProgressSurface {
  open(payload: ProgressPayload): Promise<ProgressHandle>;
}

export type ProgressReporter = ProgressSink & {
  /** The opened message, or null before the first event or after a failed open */
  handle(): ProgressHandle | null;
};

export type ProgressReporterOptions = {
  /** Called once the progress message exists, before any edit */
  onOpen?: (handle: ProgressHandle) => void;
};

/** Cuts by UTF-16 unit, stepping back so a surrogate pair is never split */
export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  let end = max - 3;
  if (isHighSurrogate(text.charCodeAt(end - 1))) end -= 1;
  return `${text.slice(0, end)}...`;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

export function unhandledLabel(value: Unhandled): string {
  if (value === "not_available") return "Not available";
  return value ? "Yes" : "No";
}

export function buildIssueEmbed(record: IssueRecord): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle(truncate(`Sentry Issue: ${record.title}`, EMBED_TITLE_MAX))
    .setColor(EMBED_COLOR)
    .addFields(
      { name: "Value", value: truncate(record.description || DESCRIPTION_FALLBACK, EMBED_FIELD_VALUE_MAX) },
      { name: "Unhandled", value: unhandledLabel(record.isUnhandled), inline: true },
      { name: "Last Seen", value: record.lastSeenRelative, inline: true }
    );

  if (record.detailUrl) {
    embed.addFields({ name: "Sentry URL", value: truncate(record.detailUrl, EMBED_FIELD_VALUE_MAX) });
  }
  return embed;
}

/**
 * Pure rendering; the reporter only decides open vs edit.
 * Search keys are escaped so a key can't smuggle markdown into the message.
 */
export function renderProgress(event: ProgressEvent): ProgressPayload {
  const key = escapeMarkdown(event.searchKey);
  switch (event.type) {
    case "fetching":
      return { content: "Fetching...", embeds: [], allowedMentions: SAFE_ALLOWED_MENTIONS };

    case "retrying":
      return {
        content: `No matching issues found for error ID: ${key}... **Retrying in ${formatSeconds(event.intervalMs)} seconds**.`,
        embeds: [],
        allowedMentions: SAFE_ALLOWED_MENTIONS,
      };

    case "resolved":
      return { content: "", embeds: [buildIssueEmbed(event.record)], allowedMentions: SAFE_ALLOWED_MENTIONS };

    case "exhausted":
      return {
        content: `No matching issues found for error ID: ${key} after ${event.attempts} attempts.`,
        embeds: [],
        allowedMentions: SAFE_ALLOWED_MENTIONS,
      };
  }
}

/**
 * report() never throws: open/edit failures are classified and logged. Once
 * the message is gone (failed open, or 10008 on edit) later events are dropped.
 */
export function createProgressReporter(
  surface: ProgressSurface,
  options: ProgressReporterOptions = {}
): ProgressReporter {
  let current: ProgressHandle | null = null;
  let dead = false;

  function logFailure(op: "open" | "edit", event: ProgressEvent, err: unknown) {
    const classified = classifyError(err);
    const meta = { evt: `progress_${op}_fail`, traceId: reqCtx().traceId, event: event.type, messageId: current?.id };
    if (isUnknownMessage(classified)) {
      logger.info(errorContext(classified, meta), "[issueLookup] progress message is gone; dropping updates");
      return;
    }
    logger.warn({ ...errorContext(classified, meta), err }, `[issueLookup] progress ${op} failed`);
  }

  async function report(event: ProgressEvent): Promise<void> {
    if (dead) return;
    const payload = renderProgress(event);

    if (!current) {
      try {
        current = await surface.open(payload);
      } catch (err) {
        dead = true;
        logFailure("open", event, err);
        return;
      }
      options.onOpen?.(current);
      return;
    }

    try {
      await current.edit(payload);
    } catch (err) {
      if (isUnknownMessage(classifyError(err))) dead = true;
      logFailure("edit", event, err);
    }
  }

  return {
    report,
    handle: () => (dead ? null : current),
  };
}
