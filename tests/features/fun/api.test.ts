/**
 * WHAT: Proves the entertainment API helpers turn responses into embeds or short error texts.
 * HOW: Stubs global fetch with canned Responses; env is mocked for URLs and keys.
 * DOCS: https://vitest.dev/api/vi.html#vi-stubglobal
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, vi } from "vitest";

vi.mock("../../../src/lib/env.js", () => ({
  env: {
    DOG_API_URL: "https://dogs.test/search",
    DOG_API_KEY: "test-key",
    CAT_API_URL: "https://cats.test/search",
    CAT_API_KEY: undefined,
    MEME_API_URL: "https://memes.test/gimme",
    BUZZWORD_API_URL: "https://buzz.test/",
    INSULT_API_URL: "https://insults.test/generate?type=text",
    QUOTE_API_URL: "https://quotes.test/random",
    AGE_API_URL: "https://age.test/",
    COUNTRY_API_URL: "https://countries.test/name/",
  },
}));

vi.mock("../../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  redact: (value: string) => value,
}));

import {
  ageReply,
  buzzwordReply,
  capitalizeName,
  countryReply,
  fetchFunData,
  getFunReply,
  GENERIC_FETCH_ERROR,
  imageReply,
  insultReply,
  memeReply,
  quoteReply,
  statusErrorMessage,
} from "../../../src/features/fun/api.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

function stubFetch(impl: (input: string | URL | Request, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("fetchFunData", () => {
  it("returns parsed JSON on 200", async () => {
    stubFetch(async () => jsonResponse({ phrase: "synergize" }));
    await expect(fetchFunData("https://buzz.test/")).resolves.toEqual({ ok: true, data: { phrase: "synergize" } });
  });

  it("reports the status code on anything but 200", async () => {
    stubFetch(async () => new Response("down", { status: 503 }));
    await expect(fetchFunData("https://buzz.test/")).resolves.toEqual({
      ok: false,
      message: "Error fetching API.\n* **Status Code:** 503",
    });
  });

  it("reads the body as text when asked", async () => {
    const fetchMock = stubFetch(async () => new Response("You smell like a merge conflict.", { status: 200 }));

    await expect(fetchFunData("https://insults.test/", { as: "text" })).resolves.toEqual({
      ok: true,
      data: "You smell like a merge conflict.",
    });
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({ Accept: "text/plain" });
  });

  it("falls back to a generic message on transport errors", async () => {
    stubFetch(async () => {
      throw new TypeError("fetch failed");
    });
    await expect(fetchFunData("https://buzz.test/")).resolves.toEqual({ ok: false, message: GENERIC_FETCH_ERROR });
  });
});

describe("reply shaping", () => {
  it("builds an image embed from the first element", () => {
    const reply = imageReply({ ok: true, data: [{ url: "https://img.test/1.jpg" }, { url: "https://img.test/2.jpg" }] });
    expect(reply.kind).toBe("embed");
    if (reply.kind === "embed") expect(reply.embed.toJSON().image?.url).toBe("https://img.test/1.jpg");
  });

  it("explains unusable image payloads", () => {
    expect(imageReply({ ok: true, data: [] })).toEqual({ kind: "text", content: "Unexpected response from API." });
    expect(imageReply({ ok: true, data: [{ url: "" }] })).toEqual({
      kind: "text",
      content: "Error extracting image URL from API response.",
    });
  });

  it("passes fetch errors straight through", () => {
    expect(memeReply({ ok: false, message: statusErrorMessage(404) })).toEqual({
      kind: "text",
      content: "Error fetching API.\n* **Status Code:** 404",
    });
  });

  it("titles meme embeds and requires both title and url", () => {
    const reply = memeReply({ ok: true, data: { title: "When the build passes", url: "https://img.test/m.png" } });
    if (reply.kind !== "embed") throw new Error("expected embed");
    expect(reply.embed.toJSON().title).toBe("When the build passes");

    expect(memeReply({ ok: true, data: { title: "no image" } })).toEqual({
      kind: "text",
      content: "Error extracting title or image URL from Meme API response.",
    });
  });

  it("puts the buzzword phrase in the description", () => {
    const reply = buzzwordReply({ ok: true, data: { phrase: "leverage holistic paradigms" } });
    if (reply.kind !== "embed") throw new Error("expected embed");
    expect(reply.embed.toJSON().description).toBe("leverage holistic paradigms");
    expect(buzzwordReply({ ok: true, data: "nope" })).toEqual({
      kind: "text",
      content: "Error extracting phrase from Buzzword API response.",
    });
  });
});

describe("getFunReply", () => {
  it("sends the x-api-key header when a key is configured", async () => {
    const fetchMock = stubFetch(async () => jsonResponse([{ url: "https://img.test/dog.jpg" }]));

    await getFunReply({ kind: "dog" });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const call = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe("https://dogs.test/search");
    expect(call?.[1]?.headers).toEqual({ Accept: "application/json", "x-api-key": "test-key" });
  });

  it("omits the header without a key", async () => {
    const fetchMock = stubFetch(async () => jsonResponse([{ url: "https://img.test/cat.jpg" }]));

    await getFunReply({ kind: "cat" });

    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({ Accept: "application/json" });
  });
});

describe("text and quote replies", () => {
  it("puts the insult text in the description", () => {
    const reply = insultReply({ ok: true, data: "  Your code has more bugs than features.\n" });
    if (reply.kind !== "embed") throw new Error("expected embed");
    expect(reply.embed.toJSON().description).toBe("Your code has more bugs than features.");
    expect(insultReply({ ok: true, data: "" })).toEqual({
      kind: "text",
      content: "Error extracting insult from API response.",
    });
  });

  it("credits the quote and defaults missing text", () => {
    const reply = quoteReply({ ok: true, data: { value: "Nobody builds walls better than me." } });
    if (reply.kind !== "embed") throw new Error("expected embed");
    expect(reply.embed.toJSON()).toMatchObject({
      description: "Nobody builds walls better than me.",
      author: { name: "Donald Trump" },
    });

    const empty = quoteReply({ ok: true, data: {} });
    if (empty.kind !== "embed") throw new Error("expected embed");
    expect(empty.embed.toJSON().description).toBe("No quote available");
  });
});

describe("ageReply", () => {
  it("capitalizes like a first name", () => {
    expect(capitalizeName("mARY")).toBe("Mary");
    expect(capitalizeName("x")).toBe("X");
  });

  it("renders the guessed age", () => {
    const reply = ageReply({ ok: true, data: { name: "Mary", age: 42, count: 10 } }, "Mary");
    if (reply.kind !== "embed") throw new Error("expected embed");
    expect(reply.embed.toJSON()).toMatchObject({
      title: "Mary",
      description: "After consulting your mother, she says that Mary is **42**.",
    });
  });

  it("says so when the API has no age for the name", () => {
    const reply = ageReply({ ok: true, data: { name: "Zyx", age: null, count: 0 } }, "Zyx");
    if (reply.kind !== "embed") throw new Error("expected embed");
    expect(reply.embed.toJSON().description).toBe("After consulting your mother, she says that Zyx is **Age not available**.");
  });
});

describe("countryReply", () => {
  it("lays out capital, region and population from the first match", () => {
    const reply = countryReply({
      ok: true,
      data: [
        { name: { common: "Testland" }, capital: ["Test City", "Second City"], region: "Europe", population: 1234567 },
        { name: { common: "Other" } },
      ],
    });
    if (reply.kind !== "embed") throw new Error("expected embed");
    const json = reply.embed.toJSON();
    expect(json.title).toBe("Information for Testland");
    expect(json.fields).toEqual([
      { name: "Capital", value: "Test City", inline: true },
      { name: "Region", value: "Europe", inline: true },
      { name: "Population", value: "1234567", inline: true },
    ]);
  });

  it("fills gaps with Not available", () => {
    const reply = countryReply({ ok: true, data: [{ name: { common: "Nowhere" }, capital: [] }] });
    if (reply.kind !== "embed") throw new Error("expected embed");
    expect(reply.embed.toJSON().fields?.map((f) => f.value)).toEqual(["Not available", "Not available", "Not available"]);
  });

  it("explains an empty result", () => {
    expect(countryReply({ ok: true, data: [] })).toEqual({
      kind: "text",
      content: "No information available for the specified country.",
    });
  });
});

describe("getFunReply with a query", () => {
  it("queries the age API with the capitalized name", async () => {
    const fetchMock = stubFetch(async () => jsonResponse({ name: "Mary", age: 42, count: 10 }));

    const reply = await getFunReply({ kind: "age", query: "mARY" });

    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://age.test/?name=Mary");
    if (reply.kind !== "embed") throw new Error("expected embed");
    expect(reply.embed.toJSON().title).toBe("Mary");
  });

  it("appends the encoded country name to the country API", async () => {
    const fetchMock = stubFetch(async () => new Response("not found", { status: 404 }));

    const reply = await getFunReply({ kind: "country", query: "south africa" });

    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://countries.test/name/south%20africa");
    expect(reply).toEqual({ kind: "text", content: "Error fetching API.\n* **Status Code:** 404" });
  });

  it("asks the insult API for plain text", async () => {
    const fetchMock = stubFetch(async () => new Response("You call that a commit message?", { status: 200 }));

    const reply = await getFunReply({ kind: "insult" });

    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://insults.test/generate?type=text");
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({ Accept: "text/plain" });
    if (reply.kind !== "embed") throw new Error("expected embed");
    expect(reply.embed.toJSON().description).toBe("You call that a commit message?");
  });
});
