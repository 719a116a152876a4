/**
 * Cronus — src/lib/cmdWrap.ts
 * WHAT: Small helpers to standardize command lifecycle on both surfaces: tracing, step logging, error replies, safe defers/replies.
 * WHY: Slash and `?` commands share executors; wrapping them keeps logging and failure handling identical.
 * FLOWS:
 *  - wrapCommand(): slash enter → step(...) → try/catch → postErrorCard on failure
 *  - wrapPrefixCommand(): message enter → step(...) → try/catch → "Something went wrong" reply on failure
 *  - ensureDeferred(): deferReply if not already replied/deferred (ephemeral by default)
 *  - replyOrEdit(): choose reply/editReply/followUp based on state; ephemeral by default
 * DOCS:
 *  - discord.js v14 (interactions): https://discord.js.org/#/docs/discord.js/main/class/Interaction
 *  - Interaction replies (options/flags): https://discord.js.org/#/docs/discord.js/main/typedef/InteractionReplyOptions
 *  - Interaction response rules (3‑second window): https://discord.com/developers/docs/interactions/receiving-and-responding
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  MessageFlags,
  DiscordAPIError,
  type InteractionReplyOptions,
  type ChatInputCommandInteraction,
  type Message,
} from "discord.js";
import { logger, redact } from "./logger.js";
import { addBreadcrumb, captureException, setContext, setTag } from "./sentry.js";
import { ctx as reqCtx, newTraceId, type InvocationKind } from "./reqctx.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";
import { QUIET_REPLY_MENTIONS } from "./constants.js";

/**
 * A "phase" is just a label for where we are in command execution.
 * "it crashed in phase 'lookup'" beats "it crashed somewhere in /sentry".
 */
type Phase = string;

/**
 * Instrumentation shared by both surfaces. Call step() to mark progress,
 * setLastSql() before DB calls, and read traceId for custom logging.
 */
export type StepContext = {
  /** Mark the current execution phase (e.g., "validate", "lookup", "reply") */
  step: (phase: Phase) => void;
  currentPhase: () => Phase;
  /** Track the last SQL query for error diagnostics; call before DB operations */
  setLastSql: (sql: string | null) => void;
  getTraceId: () => string;
  readonly traceId: string;
};

/** Passed to slash executors */
export type CommandContext = StepContext & {
  interaction: ChatInputCommandInteraction;
};

/** Passed to `?` executors; args are whitespace-split after the command name */
export type PrefixContext = StepContext & {
  message: Message;
  args: string[];
};

export type SqlTrackingCtx = { setLastSql: (sql: string | null) => void };

type SlashExecutor = (ctx: CommandContext) => Promise<void>;
type PrefixExecutor = (ctx: PrefixContext) => Promise<void>;

type SerializedErr = {
  name: string;
  code?: unknown;
  message: string;
  stack?: string;
};

/**
 * Extract REST API metadata from a DiscordAPIError for logging.
 * Body is redacted and truncated; returns null for non-Discord errors so
 * callers can spread safely.
 */
function discordRestMeta(err: unknown) {
  if (!(err instanceof DiscordAPIError)) return null;
  let bodySnippet: string | undefined;
  try {
    const body = err.requestBody;
    if (body?.json) {
      bodySnippet = redact(JSON.stringify(body.json));
    } else if (body?.files?.length) {
      // Don't log file contents, just count
      bodySnippet = `[files:${body.files.length}]`;
    }
  } catch {
    bodySnippet = "[unserializable]";
  }
  if (bodySnippet && bodySnippet.length > 120) {
    bodySnippet = `${bodySnippet.slice(0, 120)}...`;
  }
  return {
    status: err.status,
    code: err.code,
    method: err.method,
    url: err.url,
    bodySnippet,
  };
}

function codeOf(err: unknown): unknown {
  return err && typeof err === "object" && "code" in err ? err.code : undefined;
}

/**
 * Builds the step/SQL tracker both wrappers hand to executors.
 */
function createStepContext(traceId: string, cmdName: string): StepContext & { lastSql: () => string | null } {
  let phase: Phase = "enter";
  let lastSql: string | null = null;
  return {
    step: (newPhase: Phase) => {
      phase = newPhase;
      logger.info({ evt: "cmd_step", traceId, cmd: cmdName, phase });
      addBreadcrumb({
        category: "cmd",
        message: cmdName,
        data: { phase, traceId },
        level: "info",
      });
      setTag("phase", phase);
    },
    currentPhase: () => phase,
    setLastSql: (sql: string | null) => {
      lastSql = sql;
    },
    lastSql: () => lastSql,
    getTraceId: () => traceId,
    traceId,
  };
}

type FailureMeta = {
  traceId: string;
  cmd: string;
  kind: InvocationKind;
  phase: Phase;
  lastSql: string | null;
  userId: string;
  guildId: string | null;
};

/**
 * Log, tag, report and mirror a command failure. Returns the serialized error
 * for the surface-specific user reply.
 */
async function recordFailure(error: unknown, meta: FailureMeta): Promise<SerializedErr> {
  const err = error instanceof Error ? error : new Error(String(error));
  const classified = classifyError(error);
  const errPayload: SerializedErr = {
    name: err.name,
    code: "code" in classified ? classified.code : undefined,
    message: err.message,
    stack: err.stack,
  };
  logger.error(
    {
      evt: "cmd_error",
      traceId: meta.traceId,
      cmd: meta.cmd,
      kind: meta.kind,
      phase: meta.phase,
      lastSql: meta.lastSql,
      ...errorContext(classified),
      err: errPayload,
      cause: classified.cause,
    },
    `command error: ${classified.message}`
  );
  setTag("phase", meta.phase);
  setTag("cmd", meta.cmd);
  setTag("traceId", meta.traceId);
  setTag("errorKind", classified.kind);

  if (shouldReportToSentry(classified)) {
    captureException(err, {
      cmd: meta.cmd,
      phase: meta.phase,
      traceId: meta.traceId,
      lastSql: meta.lastSql,
      errorKind: classified.kind,
      errorContext: errorContext(classified),
    });
  }

  try {
    const { mirrorCommandError } = await import("./logChannel.js");
    await mirrorCommandError({
      traceId: meta.traceId,
      cmd: meta.cmd,
      kind: meta.kind,
      phase: meta.phase,
      message: errPayload.message,
      userId: meta.userId,
      guildId: meta.guildId,
    });
  } catch (mirrorErr) {
    logger.warn({ err: mirrorErr, traceId: meta.traceId, evt: "cmd_error_mirror_fail" }, "Failed to mirror command error");
  }

  return errPayload;
}

/**
 * wrapCommand
 * WHAT: Decorates a slash executor with tracing, step logging, and error-card handling.
 * RETURNS: An interaction handler compatible with discord.js. Never throws.
 * PITFALLS:
 *  - Ensure any DB call sets ctx.setLastSql to populate diagnostics on failures.
 */
export function wrapCommand(name: string, fn: SlashExecutor) {
  return async (interaction: ChatInputCommandInteraction) => {
    const store = reqCtx();
    const traceId = store.traceId ?? newTraceId();
    const cmdName = store.cmd ?? name;
    const startedAt = Date.now();
    const tracker = createStepContext(traceId, cmdName);
    const { lastSql, ...stepCtx } = tracker;
    const commandCtx: CommandContext = { ...stepCtx, interaction };

    logger.info(
      {
        evt: "cmd_start",
        traceId,
        cmd: cmdName,
        kind: "slash",
        userId: interaction.user.id,
        guildId: interaction.guildId ?? "dm",
      },
      "command start"
    );

    setTag("cmd", cmdName);
    setTag("traceId", traceId);
    setTag("phase", "enter");
    setContext("discord", {
      userId: interaction.user.id,
      guildId: interaction.guildId ?? "dm",
      channelId: interaction.channelId ?? null,
    });

    try {
      await fn(commandCtx);
      logger.info({ evt: "cmd_ok", traceId, cmd: cmdName, ms: Date.now() - startedAt }, "command ok");
    } catch (error) {
      const errPayload = await recordFailure(error, {
        traceId,
        cmd: cmdName,
        kind: "slash",
        phase: stepCtx.currentPhase(),
        lastSql: lastSql(),
        userId: interaction.user.id,
        guildId: interaction.guildId,
      });

      try {
        const { postErrorCard } = await import("./errorCard.js");
        await postErrorCard(interaction, {
          traceId,
          cmd: cmdName,
          phase: stepCtx.currentPhase(),
          err: errPayload,
          lastSql: lastSql(),
        });
      } catch (cardErr) {
        logger.error({ err: cardErr, traceId, evt: "cmd_error_card_fail" }, "Failed to post error card");
      }
    }
  };
}

/**
 * wrapPrefixCommand
 * WHAT: Same instrumentation for `?name args` messages.
 * On failure the author gets a short reply quoting the error message; the
 * trace id stays in the logs and the log channel.
 */
export function wrapPrefixCommand(name: string, fn: PrefixExecutor) {
  return async (message: Message, args: string[]) => {
    const store = reqCtx();
    const traceId = store.traceId ?? newTraceId();
    const cmdName = store.cmd ?? name;
    const startedAt = Date.now();
    const tracker = createStepContext(traceId, cmdName);
    const { lastSql, ...stepCtx } = tracker;
    const prefixCtx: PrefixContext = { ...stepCtx, message, args };

    logger.info(
      {
        evt: "cmd_start",
        traceId,
        cmd: cmdName,
        kind: "prefix",
        userId: message.author.id,
        guildId: message.guildId ?? "dm",
        argc: args.length,
      },
      "command start"
    );

    setTag("cmd", cmdName);
    setTag("traceId", traceId);
    setContext("discord", {
      userId: message.author.id,
      guildId: message.guildId ?? "dm",
      channelId: message.channelId,
    });

    try {
      await fn(prefixCtx);
      logger.info({ evt: "cmd_ok", traceId, cmd: cmdName, ms: Date.now() - startedAt }, "command ok");
    } catch (error) {
      const errPayload = await recordFailure(error, {
        traceId,
        cmd: cmdName,
        kind: "prefix",
        phase: stepCtx.currentPhase(),
        lastSql: lastSql(),
        userId: message.author.id,
        guildId: message.guildId,
      });

      try {
        await message.reply({
          content: `Something went wrong. 👇\n* ${redact(errPayload.message)}`,
          allowedMentions: QUIET_REPLY_MENTIONS,
        });
      } catch (replyErr) {
        logger.error({ err: replyErr, traceId, evt: "cmd_error_reply_fail" }, "Failed to reply with command error");
      }
    }
  };
}

/**
 * Mark a phase and run some work under it. Exceptions propagate to the wrapper.
 */
export async function withStep<T>(
  ctx: Pick<StepContext, "step">,
  phase: Phase,
  fn: () => Promise<T> | T
): Promise<T> {
  ctx.step(phase);
  return await fn();
}

/**
 * Wrap a synchronous database operation with SQL tracking. If it throws, the
 * failing SQL stays set for the error card.
 */
export function withSql<T>(ctx: SqlTrackingCtx, sql: string, run: () => T): T {
  ctx.setLastSql(sql);
  const result = run();
  ctx.setLastSql(null);
  return result;
}

/**
 * First-time acknowledgement with deferReply if we haven't replied yet.
 * 10062 (expired) is logged and swallowed; anything else is re-thrown.
 */
export async function ensureDeferred(
  interaction: ChatInputCommandInteraction,
  options: { ephemeral?: boolean } = {}
) {
  if (interaction.deferred || interaction.replied) {
    return;
  }
  const ephemeral = options.ephemeral ?? true;
  try {
    await interaction.deferReply(ephemeral ? { flags: MessageFlags.Ephemeral } : {});
    logger.info({ evt: "cmd_deferred", traceId: reqCtx().traceId, ephemeral }, "[cmd] deferred reply");
  } catch (err) {
    const code = codeOf(err);
    const logPayload = {
      evt: "cmd_defer_fail",
      traceId: reqCtx().traceId,
      code,
      ...(discordRestMeta(err) ?? {}),
      err,
    };
    if (code === 10062) {
      logger.warn(logPayload, "defer failed (interaction expired)");
      return;
    }
    logger.warn(logPayload, "defer failed");
    throw err;
  }
}

/**
 * Reply to an interaction, handling the deferred/replied state correctly.
 * Replies default to ephemeral; public responses pass `flags: 0` explicitly.
 */
export async function replyOrEdit(
  interaction: ChatInputCommandInteraction,
  payload: InteractionReplyOptions
) {
  const withFlags = { ...payload, flags: payload.flags ?? MessageFlags.Ephemeral };
  try {
    if (interaction.deferred) {
      const { flags: _flags, ...editPayload } = withFlags;
      return await interaction.editReply(editPayload);
    }
    if (interaction.replied) {
      return await interaction.followUp(withFlags);
    }
    return await interaction.reply(withFlags);
  } catch (err) {
    const code = codeOf(err);
    const logPayload = {
      evt: "cmd_reply_fail",
      traceId: reqCtx().traceId,
      code,
      ...(discordRestMeta(err) ?? {}),
      err,
    };
    if (code === 10062) {
      logger.warn(logPayload, "reply/edit skipped; interaction expired");
      return;
    }
    if (code === 40060) {
      logger.warn(logPayload, "reply/edit skipped; already acknowledged");
      return;
    }
    logger.error(logPayload, "reply/edit failed");
    throw err;
  }
}
