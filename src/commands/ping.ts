/**
 * Cronus — src/commands/ping.ts
 * WHAT: /ping and ?ping: gateway heartbeat latency.
 * WHY: Quick "is it up?" check that touches nothing but the gateway.
 * DOCS:
 *  - WebSocketManager#ping: https://discord.js.org/#/docs/discord.js/main/class/WebSocketManager?scrollTo=ping
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder, SlashCommandBuilder, type Client } from "discord.js";
import { replyOrEdit, withStep, type CommandContext, type PrefixContext } from "../lib/cmdWrap.js";
import { EMBED_COLOR, QUIET_REPLY_MENTIONS } from "../lib/constants.js";

export const data = new SlashCommandBuilder().setName("ping").setDescription("Get the bot's latency");

export const usage = "ping";

/**
 * client.ws.ping is the heartbeat ACK round trip, -1 until the first ACK.
 */
export function buildPingEmbed(client: Client): EmbedBuilder {
  const ping = client.ws.ping;
  const description = ping < 0 ? "Pong: measuring..." : `Pong: ${Math.round(ping)}ms`;
  return new EmbedBuilder().setDescription(description).setColor(EMBED_COLOR);
}

export async function execute(ctx: CommandContext): Promise<void> {
  const { interaction } = ctx;
  await withStep(ctx, "reply", () =>
    replyOrEdit(interaction, { embeds: [buildPingEmbed(interaction.client)], flags: 0 })
  );
}

export async function executePrefix(ctx: PrefixContext): Promise<void> {
  const { message } = ctx;
  await withStep(ctx, "reply", () =>
    message.reply({ embeds: [buildPingEmbed(message.client)], allowedMentions: QUIET_REPLY_MENTIONS })
  );
}
