/**
 * Cronus — src/index.ts
 * WHAT: Main process entrypoint. Boots the Discord client, routes slash and `?` commands, syncs commands.
 * WHY: Startup, the hot path and shutdown in one place.
 * FLOWS:
 *  - Ready: bind log channel → sync commands (guild or global) → "Bot is ready" notice
 *  - Interaction: slash only → findCommand → runWithCtx → wrapped executor (error card on failure)
 *  - Message: prefix listener → wrapped prefix executor
 *  - Message delete: abort the lookup whose progress message was deleted
 *  - SIGTERM/SIGINT: abort lookups → destroy client → close DB → flush Sentry
 * DOCS:
 *  - discord.js v14 (interactions): https://discord.js.org/#/docs/discord.js/main/class/Interaction
 *  - Gateway intents: https://discord.com/developers/docs/topics/gateway#gateway-intents
 *  - Partials: https://discordjs.guide/popular-topics/partials.html
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { initializeSentry, addBreadcrumb, setTag, setUser, captureException, flushSentry } from "./lib/sentry.js";
import { UNCAUGHT_EXCEPTION_EXIT_DELAY_MS, COMMAND_EVENT_TIMEOUT_MS } from "./lib/constants.js";
initializeSentry();

import { Client, Events, GatewayIntentBits, Options, Partials } from "discord.js";
import { logger } from "./lib/logger.js";

// ===== Global Error Handlers =====
// DOCS: https://nodejs.org/api/process.html#event-uncaughtexception

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  captureException(error, { context: "unhandledRejection" });
  // Don't exit - discord.js recovers from most rejections
});

process.on("uncaughtException", (error, origin) => {
  logger.error(
    { evt: "uncaught_exception", err: error, origin },
    "[process] Uncaught exception - bot may be in unstable state"
  );
  captureException(error, { context: "uncaughtException", origin });
  // Give Sentry time to flush, then exit
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

import { env } from "./lib/env.js";
import { isOwner } from "./lib/owner.js";
import { wrapEvent } from "./lib/eventWrap.js";
import { newTraceId, runWithCtx } from "./lib/reqctx.js";
import { announceReady, bindLogChannel, unbindLogChannel } from "./lib/logChannel.js";
import { closeDatabase } from "./db/db.js";
import { findCommand, getCommandCatalog } from "./commands/registry.js";
import { syncCommands } from "./commands/sync.js";
import { inflightLookups } from "./features/issueLookup/index.js";
import * as prefixCommands from "./listeners/prefixCommands.js";

const bootStartedAt = Date.now();

export const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.MessageContent, // `?` commands read message text
  ],
  // messageDelete for an uncached progress message arrives as a partial
  partials: [Partials.Message, Partials.Channel],
  makeCache: Options.cacheWithLimits({
    ...Options.DefaultMakeCacheSettings,
    MessageManager: 200,
    GuildMemberManager: 500, // role checks for /sentry
    UserManager: 500,
    PresenceManager: 0,
    ReactionManager: 0,
    ReactionUserManager: 0,
    GuildStickerManager: 0,
    GuildScheduledEventManager: 0,
    StageInstanceManager: 0,
    VoiceStateManager: 0,
  }),
});

client.once(Events.ClientReady, async (readyClient) => {
  logger.info({ tag: readyClient.user.tag, id: readyClient.user.id }, "Bot ready");
  setTag("bot_id", readyClient.user.id);
  setTag("bot_username", readyClient.user.username);
  addBreadcrumb({ message: "Bot successfully connected to Discord", category: "bot", level: "info" });

  bindLogChannel(readyClient);

  const synced = await syncCommands();
  if (!synced) {
    logger.warn("[startup] command sync failed; existing registrations stay in place");
  }

  logger.info({ commands: getCommandCatalog().map((entry) => entry.name) }, "[startup] commands loaded");
  await announceReady(Date.now() - bootStartedAt);
});

client.on(
  Events.InteractionCreate,
  wrapEvent(
    "interactionCreate",
    async (interaction) => {
      if (!interaction.isChatInputCommand()) return;

      if (isOwner(interaction.user.id)) {
        logger.info(
          { evt: "owner_override", userId: interaction.user.id, cmd: interaction.commandName },
          "Owner override activated - bypassing role checks"
        );
      }

      const entry = findCommand(interaction.commandName);
      if (!entry) {
        logger.warn({ cmd: interaction.commandName }, "Command not found");
        return;
      }

      await runWithCtx(
        {
          traceId: newTraceId(),
          kind: "slash",
          cmd: entry.name,
          userId: interaction.user.id,
          guildId: interaction.guildId,
          channelId: interaction.channelId,
        },
        async () => {
          setUser({ id: interaction.user.id, username: interaction.user.username });
          await entry.runSlash(interaction);
        }
      );
    },
    COMMAND_EVENT_TIMEOUT_MS
  )
);

client.on(prefixCommands.name, wrapEvent("messageCreate", prefixCommands.handlePrefixMessage, COMMAND_EVENT_TIMEOUT_MS));

client.on(
  Events.MessageDelete,
  wrapEvent("messageDelete", async (message) => {
    inflightLookups.abortByMessageId(message.id);
  })
);

// ===== Coordinated Graceful Shutdown =====
// ORDER: 1) Abort lookups, 2) Remove listeners, 3) Destroy client, 4) Close DB, 5) Flush Sentry
let isShuttingDown = false;

export async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
    return;
  }
  isShuttingDown = true;
  logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

  try {
    const aborted = inflightLookups.abortAll("shutting down");
    logger.debug({ aborted }, "[shutdown] In-flight lookups aborted");

    client.removeAllListeners();
    unbindLogChannel();
    await client.destroy();
    logger.debug("[shutdown] Discord client destroyed");

    closeDatabase();
    await flushSentry();

    logger.info("[shutdown] Graceful shutdown complete");
    process.exit(0);
  } catch (err) {
    logger.error({ err }, "[shutdown] Error during graceful shutdown");
    process.exit(1);
  }
}

async function main() {
  if (!env.GUILD_ID) {
    logger.warn("[startup] GUILD_ID not set - commands will register globally");
  }

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

  await client.login(env.DISCORD_TOKEN);
}

// Only start the bot if not running in test environment
if (!process.env.VITEST_WORKER_ID) {
  main().catch((err) => {
    logger.error({ err }, "Fatal startup error");
    process.exit(1);
  });
}
