/**
 * Cronus — src/lib/logChannel.ts
 * WHAT: Optional Discord log channel: startup notice and a mirror of command errors.
 * WHY: Support staff watch a channel, not the process logs.
 * FLOWS:
 *  - bindLogChannel(client) once the gateway is ready
 *  - announceReady(startupMs) → "Bot is ready. Took Xms"
 *  - mirrorCommandError(details) → compact error embed
 * DOCS:
 *  - Permissions: https://discord.js.org/#/docs/discord.js/main/class/PermissionsBitField
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder, PermissionFlagsBits, type Client, type SendableChannels } from "discord.js";
import { env } from "./env.js";
import { logger, redact } from "./logger.js";
import { ERROR_COLOR, SAFE_ALLOWED_MENTIONS } from "./constants.js";
import type { InvocationKind } from "./reqctx.js";

let boundClient: Client | null = null;

export function bindLogChannel(client: Client): void {
  boundClient = client;
}

/** Test hook and shutdown path */
export function unbindLogChannel(): void {
  boundClient = null;
}

/**
 * Resolve LOG_CHANNEL_ID to a channel we can post embeds in.
 * Returns null (and logs why) when unset, missing, not sendable, or lacking perms.
 */
export async function getLogChannel(): Promise<SendableChannels | null> {
  const channelId = env.LOG_CHANNEL_ID;
  if (!channelId || !boundClient) {
    return null;
  }

  let channel;
  try {
    channel = await boundClient.channels.fetch(channelId);
  } catch (err) {
    logger.warn({ err, channelId }, "[logChannel] failed to fetch log channel - may have been deleted");
    return null;
  }

  if (!channel || !channel.isSendable()) {
    logger.warn({ channelId, type: channel?.type }, "[logChannel] log channel is not sendable");
    return null;
  }

  // Guild channels: confirm SendMessages + EmbedLinks before posting
  if (!channel.isDMBased() && boundClient.user) {
    const permissions = channel.permissionsFor(boundClient.user);
    const required = [PermissionFlagsBits.SendMessages, PermissionFlagsBits.EmbedLinks];
    const missing = required.filter((perm) => !permissions?.has(perm));
    if (missing.length > 0) {
      logger.warn(
        { channelId, missingPerms: missing.map((p) => p.toString()) },
        "[logChannel] bot lacks required permissions in log channel"
      );
      return null;
    }
  }

  return channel;
}

export async function announceReady(startupMs: number): Promise<void> {
  const channel = await getLogChannel();
  if (!channel) return;
  try {
    await channel.send({
      content: `Bot is ready. Took ${Math.round(startupMs)}ms`,
      allowedMentions: SAFE_ALLOWED_MENTIONS,
    });
  } catch (err) {
    logger.warn({ err, evt: "log_channel_ready_fail" }, "[logChannel] failed to post ready notice");
  }
}

export type MirroredError = {
  traceId: string;
  cmd: string;
  kind: InvocationKind;
  phase: string;
  message: string;
  userId: string;
  guildId: string | null;
};

export function buildMirrorEmbed(details: MirroredError): EmbedBuilder {
  const label = details.kind === "prefix" ? `${env.BOT_PREFIX}${details.cmd}` : `/${details.cmd}`;
  return new EmbedBuilder()
    .setTitle(`Command failed: ${label}`)
    .setColor(ERROR_COLOR)
    .setDescription(redact(details.message) || "No message provided")
    .addFields(
      { name: "Phase", value: details.phase || "unknown", inline: true },
      { name: "User", value: `<@${details.userId}>`, inline: true },
      { name: "Guild", value: details.guildId ?? "dm", inline: true },
      { name: "Trace", value: details.traceId }
    )
    .setTimestamp();
}

/**
 * Best effort: a missing or broken log channel never affects the command.
 */
export async function mirrorCommandError(details: MirroredError): Promise<void> {
  const channel = await getLogChannel();
  if (!channel) return;
  try {
    await channel.send({ embeds: [buildMirrorEmbed(details)], allowedMentions: SAFE_ALLOWED_MENTIONS });
  } catch (err) {
    logger.warn({ err, traceId: details.traceId, evt: "log_channel_mirror_fail" }, "[logChannel] failed to mirror command error");
  }
}
