/**
 * Cronus — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail-fast on missing secrets; keep process.env access centralized.
 * FLOWS: load .env → parse/validate → export typed env object
 * DOCS:
 *  - zod: https://zod.dev
 *  - dotenv: https://github.com/motdotla/dotenv
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// Load .env from the working directory. Tests set their vars before imports,
// so they must win over the file.
const isTest = process.env.NODE_ENV === "test";
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

const SAFE_SLUG_REGEX = /^[a-zA-Z0-9_.-]+$/;

/**
 * Raw environment extraction. Every variable gets trimmed to handle
 * stray whitespace in .env files; validation happens in one zod pass below.
 */
const raw = {
  DISCORD_TOKEN: process.env.DISCORD_TOKEN?.trim(),
  CLIENT_ID: process.env.CLIENT_ID?.trim(),
  GUILD_ID: process.env.GUILD_ID?.trim(),
  BOT_PREFIX: process.env.BOT_PREFIX?.trim(),
  LOG_CHANNEL_ID: process.env.LOG_CHANNEL_ID?.trim(),
  SUPPORT_ROLE_NAME: process.env.SUPPORT_ROLE_NAME?.trim(),
  OWNER_IDS: process.env.OWNER_IDS?.trim(),
  NODE_ENV: process.env.NODE_ENV?.trim(),
  DB_PATH: process.env.DB_PATH?.trim(),
  LOG_LEVEL: process.env.LOG_LEVEL?.trim(),

  SENTRY_DSN: process.env.SENTRY_DSN?.trim(),
  SENTRY_ENVIRONMENT: process.env.SENTRY_ENVIRONMENT?.trim(),
  SENTRY_TRACES_SAMPLE_RATE: process.env.SENTRY_TRACES_SAMPLE_RATE?.trim(),

  // Issue search API used by /sentry (not the bot's own error reporting)
  SENTRY_API_URL: process.env.SENTRY_API_URL?.trim(),
  SENTRY_ORG_SLUG: process.env.SENTRY_ORG_SLUG?.trim(),
  SENTRY_PROJECT_SLUG: process.env.SENTRY_PROJECT_SLUG?.trim(),
  SENTRY_API_KEY: process.env.SENTRY_API_KEY?.trim(),
  SENTRY_ISSUE_URL_TEMPLATE: process.env.SENTRY_ISSUE_URL_TEMPLATE?.trim(),
  SENTRY_LOOKUP_MAX_ATTEMPTS: process.env.SENTRY_LOOKUP_MAX_ATTEMPTS?.trim(),
  SENTRY_LOOKUP_INITIAL_INTERVAL_SEC: process.env.SENTRY_LOOKUP_INITIAL_INTERVAL_SEC?.trim(),
  SENTRY_LOOKUP_BACKOFF_MULTIPLIER: process.env.SENTRY_LOOKUP_BACKOFF_MULTIPLIER?.trim(),
  SENTRY_LOOKUP_TIMEOUT_MS: process.env.SENTRY_LOOKUP_TIMEOUT_MS?.trim(),

  // Entertainment APIs (/dog, /cat, /meme, /buzzword, /insult, /trump, /age, /country)
  DOG_API_URL: process.env.DOG_API_URL?.trim(),
  DOG_API_KEY: process.env.DOG_API_KEY?.trim(),
  CAT_API_URL: process.env.CAT_API_URL?.trim(),
  CAT_API_KEY: process.env.CAT_API_KEY?.trim(),
  MEME_API_URL: process.env.MEME_API_URL?.trim(),
  BUZZWORD_API_URL: process.env.BUZZWORD_API_URL?.trim(),
  INSULT_API_URL: process.env.INSULT_API_URL?.trim(),
  QUOTE_API_URL: process.env.QUOTE_API_URL?.trim(),
  AGE_API_URL: process.env.AGE_API_URL?.trim(),
  COUNTRY_API_URL: process.env.COUNTRY_API_URL?.trim(),
};

/**
 * Schema defines what's required vs optional. Only the Discord credentials are
 * required to boot; /sentry reports a config error at use time when its API
 * settings are missing so the rest of the bot still works.
 */
const schema = z.object({
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  CLIENT_ID: z.string().min(1, "Missing CLIENT_ID"),
  GUILD_ID: z.string().optional(), // Only needed for guild-scoped command deployment
  BOT_PREFIX: z.string().min(1).max(3).default("?"),
  LOG_CHANNEL_ID: z.string().optional(),
  SUPPORT_ROLE_NAME: z.string().min(1).default("Support"),
  OWNER_IDS: z.string().optional(),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DB_PATH: z.string().default("data/data.db"),
  LOG_LEVEL: z.string().optional(),

  // Bot error tracking - disabled if DSN not provided
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),

  SENTRY_API_URL: z.string().url().default("https://sentry.io/api/0"),
  SENTRY_ORG_SLUG: z
    .string()
    .optional()
    .refine((val) => !val || SAFE_SLUG_REGEX.test(val), {
      message: "SENTRY_ORG_SLUG contains invalid characters",
    }),
  SENTRY_PROJECT_SLUG: z
    .string()
    .optional()
    .refine((val) => !val || SAFE_SLUG_REGEX.test(val), {
      message: "SENTRY_PROJECT_SLUG contains invalid characters",
    }),
  SENTRY_API_KEY: z.string().optional(),
  SENTRY_ISSUE_URL_TEMPLATE: z
    .string()
    .default("https://sentry.io/issues/{id}/")
    .refine((val) => val.includes("{id}"), {
      message: "SENTRY_ISSUE_URL_TEMPLATE must contain an {id} placeholder",
    }),
  SENTRY_LOOKUP_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(4),
  SENTRY_LOOKUP_INITIAL_INTERVAL_SEC: z.coerce.number().positive().max(60).default(2),
  SENTRY_LOOKUP_BACKOFF_MULTIPLIER: z.coerce.number().min(1).max(10).default(1.3),
  SENTRY_LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  DOG_API_URL: z.string().url().default("https://api.thedogapi.com/v1/images/search"),
  DOG_API_KEY: z.string().optional(),
  CAT_API_URL: z.string().url().default("https://api.thecatapi.com/v1/images/search"),
  CAT_API_KEY: z.string().optional(),
  MEME_API_URL: z.string().url().default("https://meme-api.com/gimme"),
  BUZZWORD_API_URL: z.string().url().default("https://corporatebs-generator.sameerkumar.website/"),
  INSULT_API_URL: z.string().url().default("https://evilinsult.com/generate_insult.php?lang=en&type=text"),
  QUOTE_API_URL: z.string().url().default("https://api.tronalddump.io/random/quote"),
  AGE_API_URL: z.string().url().default("https://api.agify.io/"),
  // The country name is appended to this
  COUNTRY_API_URL: z.string().url().default("https://restcountries.com/v3.1/name/"),
});

export type Env = z.infer<typeof schema>;

/**
 * Fail-fast validation. safeParse collects ALL errors so a broken .env is
 * fixed in one pass instead of one variable at a time.
 */
const parsed = schema.safeParse(raw);
if (!parsed.success) {
  const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
  console.error(`Environment validation failed:\n${issues}`);
  process.exit(1);
}
export const env: Env = parsed.data;
