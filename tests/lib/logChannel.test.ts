/**
 * WHAT: Proves the log channel resolves safely and posts the ready notice and error mirrors.
 * HOW: env mocked with a LOG_CHANNEL_ID; client and channel are plain stubs.
 * DOCS: https://vitest.dev/api/vi.html#vi-mock
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Client } from "discord.js";

const loggerMock = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({
  logger: loggerMock,
  redact: (value: string) => value,
}));

vi.mock("../../src/lib/env.js", () => ({
  env: { LOG_CHANNEL_ID: "log-1", BOT_PREFIX: "?" },
}));

import {
  announceReady,
  bindLogChannel,
  buildMirrorEmbed,
  getLogChannel,
  mirrorCommandError,
  unbindLogChannel,
} from "../../src/lib/logChannel.js";

function createChannel(options: { sendable?: boolean; canPost?: boolean } = {}) {
  return {
    id: "log-1",
    type: 0,
    isSendable: () => options.sendable ?? true,
    isDMBased: () => false,
    permissionsFor: vi.fn(() => ({ has: () => options.canPost ?? true })),
    send: vi.fn(async () => undefined),
  };
}

function createClient(fetchChannel: () => Promise<unknown>): Client {
  return {
    user: { id: "bot-123" },
    channels: { fetch: vi.fn(fetchChannel) },
  } as unknown as Client;
}

const mirrored = {
  traceId: "trace-1",
  cmd: "sentry",
  kind: "prefix" as const,
  phase: "lookup",
  message: "SENTRY_ORG_SLUG is not configured",
  userId: "user-1",
  guildId: "guild-1",
};

beforeEach(() => {
  vi.clearAllMocks();
  unbindLogChannel();
});

describe("getLogChannel", () => {
  it("returns null before a client is bound", async () => {
    await expect(getLogChannel()).resolves.toBeNull();
  });

  it("returns null when the channel can't be fetched", async () => {
    bindLogChannel(createClient(async () => Promise.reject(new Error("Unknown Channel"))));
    await expect(getLogChannel()).resolves.toBeNull();
    expect(loggerMock.warn).toHaveBeenCalledTimes(1);
  });

  it("returns null for a channel the bot can't send to", async () => {
    bindLogChannel(createClient(async () => createChannel({ sendable: false })));
    await expect(getLogChannel()).resolves.toBeNull();
  });

  it("returns null when the bot lacks send or embed permissions", async () => {
    bindLogChannel(createClient(async () => createChannel({ canPost: false })));
    await expect(getLogChannel()).resolves.toBeNull();
    expect(loggerMock.warn).toHaveBeenCalledWith(
      expect.objectContaining({ channelId: "log-1" }),
      "[logChannel] bot lacks required permissions in log channel"
    );
  });
});

describe("announceReady", () => {
  it("posts the startup time rounded to whole milliseconds", async () => {
    const channel = createChannel();
    bindLogChannel(createClient(async () => channel));

    await announceReady(1234.6);

    expect(channel.send).toHaveBeenCalledWith({
      content: "Bot is ready. Took 1235ms",
      allowedMentions: { parse: [] },
    });
  });

  it("does nothing without a usable channel", async () => {
    await expect(announceReady(10)).resolves.toBeUndefined();
  });
});

describe("mirrorCommandError", () => {
  it("labels prefix commands with the prefix", () => {
    const json = buildMirrorEmbed(mirrored).toJSON();
    expect(json.title).toBe("Command failed: ?sentry");
    expect(json.description).toBe("SENTRY_ORG_SLUG is not configured");
    expect(json.fields).toEqual([
      { name: "Phase", value: "lookup", inline: true },
      { name: "User", value: "<@user-1>", inline: true },
      { name: "Guild", value: "guild-1", inline: true },
      { name: "Trace", value: "trace-1" },
    ]);
  });

  it("labels slash commands with a slash", () => {
    expect(buildMirrorEmbed({ ...mirrored, kind: "slash", guildId: null }).toJSON().title).toBe(
      "Command failed: /sentry"
    );
  });

  it("sends the embed and survives a failed send", async () => {
    const channel = createChannel();
    channel.send.mockRejectedValueOnce(new Error("Missing Access"));
    bindLogChannel(createClient(async () => channel));

    await expect(mirrorCommandError(mirrored)).resolves.toBeUndefined();

    expect(channel.send).toHaveBeenCalledTimes(1);
    expect(loggerMock.warn).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "log_channel_mirror_fail", traceId: "trace-1" }),
      "[logChannel] failed to mirror command error"
    );
  });
});
