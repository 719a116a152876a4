/**
 * WHAT: Proves /ping reports the gateway heartbeat and replies publicly on both surfaces.
 * DOCS: https://vitest.dev/api/expect.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, vi } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  redact: (value: string) => value,
}));

import { buildPingEmbed, data, execute, executePrefix } from "../../src/commands/ping.js";
import { createMockClient, createMockInteraction, createMockMessage } from "../utils/discordMocks.js";
import { createPrefixContext, createSlashContext } from "../utils/contextFactory.js";

describe("/ping", () => {
  it("is named ping", () => {
    expect(data.name).toBe("ping");
    expect(data.description).toBe("Get the bot's latency");
  });

  it("rounds the heartbeat latency", () => {
    expect(buildPingEmbed(createMockClient({ ping: 41.6 })).toJSON().description).toBe("Pong: 42ms");
  });

  it("says measuring before the first heartbeat", () => {
    expect(buildPingEmbed(createMockClient({ ping: -1 })).toJSON().description).toBe("Pong: measuring...");
  });

  it("replies publicly to the interaction", async () => {
    const interaction = createMockInteraction({ client: createMockClient({ ping: 12 }) });
    const { ctx, phases } = createSlashContext(interaction);

    await execute(ctx);

    expect(interaction.reply).toHaveBeenCalledWith({ embeds: [expect.any(Object)], flags: 0 });
    expect(phases).toEqual(["reply"]);
  });

  it("replies to the message without pinging the author", async () => {
    const message = createMockMessage({ content: "?ping", client: createMockClient({ ping: 12 }) });

    await executePrefix(createPrefixContext(message, []).ctx);

    expect(message.reply).toHaveBeenCalledWith({
      embeds: [expect.any(Object)],
      allowedMentions: { parse: [], repliedUser: false },
    });
  });
});
