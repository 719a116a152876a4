/**
 * WHAT: Proves the command catalog lists every command once, with categories, usage and arg counts.
 * DOCS: https://discordjs.guide/interactions/deploying-commands.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect } from "vitest";
import { findCommand, getAllSlashCommands, getCommandCatalog } from "../../src/commands/registry.js";
import { buildCommands } from "../../src/commands/buildCommands.js";

describe("command catalog", () => {
  it("builds once and reuses the same list", () => {
    expect(getCommandCatalog()).toBe(getCommandCatalog());
  });

  it("serializes every command for registration", () => {
    expect(getAllSlashCommands().map((cmd) => cmd.name)).toEqual([
      "sentry",
      "ping",
      "about",
      "help",
      "dog",
      "cat",
      "meme",
      "buzzword",
      "insult",
      "trump",
      "age",
      "country",
    ]);
    expect(buildCommands()).toEqual(getAllSlashCommands());
  });

  it("finds commands case-insensitively", () => {
    const entry = findCommand("SENTRY");
    expect(entry?.name).toBe("sentry");
    expect(entry?.category).toBe("Support");
    expect(entry?.usage).toBe("sentry <error_id>");
    expect(entry?.minArgs).toBe(1);
  });

  it("requires the query on the name-lookup commands", () => {
    expect(findCommand("age")).toMatchObject({ category: "Fun", usage: "age <name>", minArgs: 1 });
    expect(findCommand("country")).toMatchObject({ category: "Fun", usage: "country <country>", minArgs: 1 });
  });

  it("defaults minArgs to zero", () => {
    expect(findCommand("meme")?.minArgs).toBe(0);
    expect(findCommand("help")?.category).toBe("Utility");
  });

  it("returns undefined for unknown names", () => {
    expect(findCommand("kick")).toBeUndefined();
  });
});
