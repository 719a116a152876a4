/**
 * Cronus — src/features/fun/api.ts
 * WHAT: One-shot lookups against public entertainment APIs (images, memes, buzzwords, insults, quotes, ages, countries).
 * WHY: Keeps HTTP and response shape checks out of the command module.
 * FLOWS:
 *  fetchFunData(url, opts) → { ok, data } | { ok: false, message }
 *  imageReply / memeReply / buzzwordReply / insultReply / quoteReply / ageReply / countryReply
 *    (result) → FunReply (embed or short text)
 * DOCS:
 *  - TheDogAPI / TheCatAPI: https://developers.thecatapi.com/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder } from "discord.js";
import { env } from "../../lib/env.js";
import { logger } from "../../lib/logger.js";
import { classifyError } from "../../lib/errors.js";
import { EMBED_COLOR, FUN_API_TIMEOUT_MS } from "../../lib/constants.js";

export type FunFetchResult = { ok: true; data: unknown } | { ok: false; message: string };

/** What the command sends back: an embed, or a one-line explanation */
export type FunReply = { kind: "embed"; embed: EmbedBuilder } | { kind: "text"; content: string };

export const GENERIC_FETCH_ERROR = "Error fetching API. Please try again later.";

export function statusErrorMessage(status: number): string {
  return `Error fetching API.\n* **Status Code:** ${status}`;
}

/**
 * GET a JSON endpoint. Non-200 and transport failures become user-facing text;
 * nothing here throws.
 */
export async function fetchFunData(
  url: string,
  options: { headers?: Record<string, string>; timeoutMs?: number; as?: "json" | "text" } = {}
): Promise<FunFetchResult> {
  const as = options.as ?? "json";
  try {
    const response = await fetch(url, {
      headers: { Accept: as === "json" ? "application/json" : "text/plain", ...options.headers },
      signal: AbortSignal.timeout(options.timeoutMs ?? FUN_API_TIMEOUT_MS),
    });

    if (response.status !== 200) {
      logger.warn({ evt: "fun_api_bad_status", status: response.status, url }, "[fun] API request failed");
      return { ok: false, message: statusErrorMessage(response.status) };
    }

    const data: unknown = as === "json" ? await response.json() : await response.text();
    return { ok: true, data };
  } catch (err) {
    const classified = classifyError(err);
    logger.warn({ evt: "fun_api_error", url, errorKind: classified.kind, err }, "[fun] API request error");
    return { ok: false, message: GENERIC_FETCH_ERROR };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === "string" && value.length > 0 ? value : null;
}

/** Embed limits count UTF-16 units; never leave half a surrogate pair behind */
function clip(text: string, max: number): string {
  if (text.length <= max) return text;
  const code = text.charCodeAt(max - 1);
  return text.slice(0, code >= 0xd800 && code <= 0xdbff ? max - 1 : max);
}

/** thedogapi/thecatapi: `[{ url, ... }]` */
export function imageReply(result: FunFetchResult): FunReply {
  if (!result.ok) return { kind: "text", content: result.message };
  const { data } = result;
  if (!Array.isArray(data) || data.length === 0 || !isRecord(data[0])) {
    return { kind: "text", content: "Unexpected response from API." };
  }
  const imageUrl = nonEmptyString(data[0].url);
  if (!imageUrl) {
    return { kind: "text", content: "Error extracting image URL from API response." };
  }
  return { kind: "embed", embed: new EmbedBuilder().setColor(EMBED_COLOR).setImage(imageUrl) };
}

/** meme-api: `{ title, url, ... }` */
export function memeReply(result: FunFetchResult): FunReply {
  if (!result.ok) return { kind: "text", content: result.message };
  if (!isRecord(result.data)) {
    return { kind: "text", content: "Unexpected response from Meme API." };
  }
  const title = nonEmptyString(result.data.title);
  const imageUrl = nonEmptyString(result.data.url);
  if (!title || !imageUrl) {
    return { kind: "text", content: "Error extracting title or image URL from Meme API response." };
  }
  return {
    kind: "embed",
    embed: new EmbedBuilder().setTitle(clip(title, 256)).setColor(EMBED_COLOR).setImage(imageUrl),
  };
}

/** corporate bs generator: `{ phrase }` */
export function buzzwordReply(result: FunFetchResult): FunReply {
  if (!result.ok) return { kind: "text", content: result.message };
  const phrase = isRecord(result.data) ? nonEmptyString(result.data.phrase) : null;
  if (!phrase) {
    return { kind: "text", content: "Error extracting phrase from Buzzword API response." };
  }
  return { kind: "embed", embed: new EmbedBuilder().setDescription(phrase).setColor(EMBED_COLOR) };
}

/** insult API: plain text body */
export function insultReply(result: FunFetchResult): FunReply {
  if (!result.ok) return { kind: "text", content: result.message };
  const text = typeof result.data === "string" ? result.data.trim() : "";
  if (!text) return { kind: "text", content: "Error extracting insult from API response." };
  return { kind: "embed", embed: new EmbedBuilder().setDescription(clip(text, 4096)).setColor(EMBED_COLOR) };
}

export const QUOTE_AUTHOR = "Donald Trump";

/** quote API: `{ value, ... }` */
export function quoteReply(result: FunFetchResult): FunReply {
  if (!result.ok) return { kind: "text", content: result.message };
  const quote = (isRecord(result.data) ? nonEmptyString(result.data.value) : null) ?? "No quote available";
  return {
    kind: "embed",
    embed: new EmbedBuilder().setDescription(clip(quote, 4096)).setAuthor({ name: QUOTE_AUTHOR }).setColor(EMBED_COLOR),
  };
}

/** "mARY" → "Mary" */
export function capitalizeName(name: string): string {
  return name.charAt(0).toUpperCase() + name.slice(1).toLowerCase();
}

/** agify: `{ name, age, count }`; age is null for names it has never seen */
export function ageReply(result: FunFetchResult, name: string): FunReply {
  if (!result.ok) return { kind: "text", content: result.message };
  const age = isRecord(result.data) && typeof result.data.age === "number" ? String(result.data.age) : "Age not available";
  return {
    kind: "embed",
    embed: new EmbedBuilder()
      .setTitle(clip(name, 256))
      .setDescription(`After consulting your mother, she says that ${name} is **${age}**.`)
      .setColor(EMBED_COLOR),
  };
}

function firstOrDefault(value: unknown, fallback: string): string {
  if (Array.isArray(value)) return firstOrDefault(value[0], fallback);
  if (typeof value === "number") return String(value);
  return nonEmptyString(value) ?? fallback;
}

/** restcountries v3: `[{ name: { common }, capital: [..], region, population }]` */
export function countryReply(result: FunFetchResult): FunReply {
  if (!result.ok) return { kind: "text", content: result.message };
  const info = Array.isArray(result.data) && isRecord(result.data[0]) ? result.data[0] : null;
  const commonName = info && isRecord(info.name) ? nonEmptyString(info.name.common) : null;
  if (!info || !commonName) {
    return { kind: "text", content: "No information available for the specified country." };
  }
  return {
    kind: "embed",
    embed: new EmbedBuilder()
      .setTitle(clip(`Information for ${commonName}`, 256))
      .setColor(EMBED_COLOR)
      .addFields(
        { name: "Capital", value: firstOrDefault(info.capital, "Not available"), inline: true },
        { name: "Region", value: firstOrDefault(info.region, "Not available"), inline: true },
        { name: "Population", value: firstOrDefault(info.population, "Not available"), inline: true }
      ),
  };
}

function apiKeyHeaders(key: string | undefined): Record<string, string> {
  return key ? { "x-api-key": key } : {};
}

export type FunKind = "dog" | "cat" | "meme" | "buzzword" | "insult" | "trump";
/** Commands that look something up by the name the user typed */
export type FunQueryKind = "age" | "country";

export type FunRequest = { kind: FunKind } | { kind: FunQueryKind; query: string };

/**
 * Fetch + shape for one command. URLs and keys come from env.
 */
export async function getFunReply(request: FunRequest): Promise<FunReply> {
  switch (request.kind) {
    case "dog":
      return imageReply(await fetchFunData(env.DOG_API_URL, { headers: apiKeyHeaders(env.DOG_API_KEY) }));
    case "cat":
      return imageReply(await fetchFunData(env.CAT_API_URL, { headers: apiKeyHeaders(env.CAT_API_KEY) }));
    case "meme":
      return memeReply(await fetchFunData(env.MEME_API_URL));
    case "buzzword":
      return buzzwordReply(await fetchFunData(env.BUZZWORD_API_URL));
    case "insult":
      return insultReply(await fetchFunData(env.INSULT_API_URL, { as: "text" }));
    case "trump":
      return quoteReply(await fetchFunData(env.QUOTE_API_URL));
    case "age": {
      const name = capitalizeName(request.query);
      const url = new URL(env.AGE_API_URL);
      url.searchParams.set("name", name);
      return ageReply(await fetchFunData(url.toString()), name);
    }
    case "country":
      return countryReply(await fetchFunData(`${env.COUNTRY_API_URL}${encodeURIComponent(request.query)}`));
  }
}
