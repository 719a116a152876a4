/**
 * Cronus — src/commands/about.ts
 * WHAT: /about and ?about: what the bot is, resource usage, loaded commands and recent lookup totals.
 * WHY: Lets support staff see at a glance whether the bot is healthy and how much /sentry is used.
 * FLOWS:
 *  collect_metrics (RAM, CPU sample, uptime) → lookup_summary (SQLite, last 24h) → reply
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder, SlashCommandBuilder, type Client } from "discord.js";
import { ensureDeferred, replyOrEdit, withSql, withStep, type CommandContext, type PrefixContext, type StepContext } from "../lib/cmdWrap.js";
import { EMBED_COLOR, LOOKUP_SUMMARY_WINDOW_SEC, QUIET_REPLY_MENTIONS } from "../lib/constants.js";
import { formatUptime } from "../lib/timefmt.js";
import { rssMegabytes, sampleCpuPercent } from "../lib/processStats.js";
import { summarizeLookupsSince, type LookupSummary } from "../store/lookupHistoryStore.js";
import { getCommandCatalog } from "./registry.js";

export const data = new SlashCommandBuilder().setName("about").setDescription("Learn about Cronus");

export const usage = "about";

export const ABOUT_DESCRIPTION =
  "Cronus is a Discord bot that helps run a support server: error issue lookups for the support team, " +
  "a few utilities, and some fun commands.";

export type AboutMetrics = {
  rssMb: number;
  cpuPercent: number;
  uptimeSec: number;
  commandCount: number;
  lookups: LookupSummary;
};

export function formatLookupSummary(summary: LookupSummary): string {
  if (summary.total === 0) return "None";
  return `${summary.total} total (${summary.resolved} found, ${summary.exhausted} not found, ${summary.cancelled} cancelled)`;
}

export function buildAboutEmbed(client: Client, metrics: AboutMetrics): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle("About Cronus")
    .setDescription(ABOUT_DESCRIPTION)
    .setColor(EMBED_COLOR)
    .addFields(
      { name: "RAM Usage", value: `${metrics.rssMb.toFixed(2)} MB`, inline: true },
      { name: "CPU Usage", value: `${metrics.cpuPercent}%`, inline: true },
      { name: "Loaded Commands", value: String(metrics.commandCount), inline: true },
      { name: "Uptime", value: formatUptime(metrics.uptimeSec), inline: true },
      { name: "Lookups (24h)", value: formatLookupSummary(metrics.lookups), inline: true }
    );

  const avatarUrl = client.user?.avatarURL();
  if (avatarUrl) embed.setThumbnail(avatarUrl);
  return embed;
}

async function collectMetrics(ctx: StepContext): Promise<AboutMetrics> {
  const base = await withStep(ctx, "collect_metrics", async () => ({
    rssMb: rssMegabytes(),
    cpuPercent: await sampleCpuPercent(),
    uptimeSec: Math.floor(process.uptime()),
    commandCount: getCommandCatalog().length,
  }));

  const since = Math.floor(Date.now() / 1000) - LOOKUP_SUMMARY_WINDOW_SEC;
  const lookups = await withStep(ctx, "lookup_summary", () =>
    withSql(ctx, "SELECT outcome, COUNT(*) FROM issue_lookup WHERE created_at >= ? GROUP BY outcome", () =>
      summarizeLookupsSince(since)
    )
  );

  return { ...base, lookups };
}

export async function execute(ctx: CommandContext): Promise<void> {
  const { interaction } = ctx;
  // The CPU sample and DB read are quick, but defer so the 3s window is never at risk
  await ensureDeferred(interaction, { ephemeral: false });
  const metrics = await collectMetrics(ctx);
  await withStep(ctx, "reply", () =>
    replyOrEdit(interaction, { embeds: [buildAboutEmbed(interaction.client, metrics)], flags: 0 })
  );
}

export async function executePrefix(ctx: PrefixContext): Promise<void> {
  const { message } = ctx;
  const metrics = await collectMetrics(ctx);
  await withStep(ctx, "reply", () =>
    message.reply({ embeds: [buildAboutEmbed(message.client, metrics)], allowedMentions: QUIET_REPLY_MENTIONS })
  );
}
