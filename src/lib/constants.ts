/**
 * Cronus — src/lib/constants.ts
 * WHAT: Centralized application constants for timeouts, delays, colors and limits
 * WHY: Single source of truth for magic numbers
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { MessageMentionOptions } from "discord.js";

// ===== Discord Message Options =====

/**
 * Suppresses all @mentions (users, roles, everyone/here).
 * Progress messages echo the caller's search key, so they never ping.
 */
export const SAFE_ALLOWED_MENTIONS: MessageMentionOptions = { parse: [] };

/** Same, but also don't ping the author of the message being replied to */
export const QUIET_REPLY_MENTIONS: MessageMentionOptions = { parse: [], repliedUser: false };

/** Embed color shared by every informational embed (dark grey) */
export const EMBED_COLOR = 0x2b2d31;

/** Error card color (Discord red) */
export const ERROR_COLOR = 0xed4245;

// ===== Discord API Limits =====

export const EMBED_TITLE_MAX = 256;
export const EMBED_FIELD_VALUE_MAX = 1024;

/** Longest search key accepted by /sentry */
export const SEARCH_KEY_MAX_LENGTH = 100;

/** Discord command sync rate limit buffer (keeps us under 2 req/sec) */
export const DISCORD_COMMAND_SYNC_DELAY_MS = 650;

// ===== Timeouts & Delays =====

/** Grace period before exit on uncaught exception (for Sentry flush) */
export const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

/**
 * interactionCreate/messageCreate handlers run a whole /sentry lookup, which can
 * legitimately take maxAttempts fetches plus the backoff sleeps.
 */
export const COMMAND_EVENT_TIMEOUT_MS = 120_000;

/** One-shot entertainment API requests */
export const FUN_API_TIMEOUT_MS = 8000;

/** Sampling window for the CPU figure in /about */
export const CPU_SAMPLE_MS = 100;

// ===== Lookup history =====

/** Window summarized by /about */
export const LOOKUP_SUMMARY_WINDOW_SEC = 24 * 60 * 60;
