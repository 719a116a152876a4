// SPDX-License-Identifier: LicenseRef-ANW-1.0

// Serialized slash command payloads for bulk registration (scripts/deploy-commands.ts).
//
// GOTCHA: Discord caches slash commands aggressively. After adding/removing commands in the
// registry, re-register them. Global commands can take up to 1 hour to propagate; guild
// commands update instantly, so prefer GUILD_ID during development.

import type { RESTPostAPIChatInputApplicationCommandsJSONBody } from "discord.js";
import { getAllSlashCommands } from "./registry.js";

export function buildCommands(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return getAllSlashCommands();
}
