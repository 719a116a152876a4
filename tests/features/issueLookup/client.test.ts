/**
 * WHAT: Proves the issue search client builds the right request and maps responses to FetchResult.
 * HOW: Stubs global fetch with vi.stubGlobal; no network.
 * DOCS: https://vitest.dev/api/vi.html#vi-stubglobal
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, vi, beforeEach } from "vitest";

const loggerMock = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock("../../../src/lib/logger.js", () => ({
  logger: loggerMock,
  redact: (value: string) => value.replace(/test-secret/g, "[redacted]"),
}));

import { buildIssueSearchUrl, createIssueClient } from "../../../src/features/issueLookup/client.js";
import type { IssueClientConfig } from "../../../src/features/issueLookup/types.js";

const config: IssueClientConfig = {
  baseUrl: "https://errors.example.test/api/0/",
  orgSlug: "acme",
  projectSlug: "bot",
  apiKey: "test-secret",
  timeoutMs: 5000,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

beforeEach(() => {
  vi.clearAllMocks();
});

describe("buildIssueSearchUrl", () => {
  it("puts the key in the query and trims trailing slashes from the base", () => {
    expect(buildIssueSearchUrl(config, "abc-123")).toBe(
      "https://errors.example.test/api/0/projects/acme/bot/issues/?query=error_id%3Aabc-123"
    );
  });

  it("encodes characters that would break the query", () => {
    expect(buildIssueSearchUrl(config, "a&b c")).toBe(
      "https://errors.example.test/api/0/projects/acme/bot/issues/?query=error_id%3Aa%26b+c"
    );
  });
});

describe("createIssueClient", () => {
  it("sends a bearer token and returns the parsed payload on 200", async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      jsonResponse([{ title: "X" }])
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await createIssueClient(config).fetchIssues("abc-123");

    expect(result).toEqual({ ok: true, payload: [{ title: "X" }] });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://errors.example.test/api/0/projects/acme/bot/issues/?query=error_id%3Aabc-123");
    expect(init?.method).toBe("GET");
    expect(init?.headers).toEqual({ Authorization: "Bearer test-secret", Accept: "application/json" });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("maps any non-200 status to bad_status and logs a redacted body", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("token test-secret rejected", { status: 401 }))
    );

    const result = await createIssueClient(config).fetchIssues("abc-123");

    expect(result).toEqual({ ok: false, error: { kind: "bad_status", status: 401 } });
    expect(loggerMock.warn).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "issue_fetch_bad_status", status: 401, body: "token [redacted] rejected" }),
      "[issueLookup] search endpoint returned non-200"
    );
  });

  it("treats 204 as a failed fetch, not an empty result", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(null, { status: 204 }))
    );

    const result = await createIssueClient(config).fetchIssues("abc-123");

    expect(result).toEqual({ ok: false, error: { kind: "bad_status", status: 204 } });
  });

  it("maps connection failures to transport errors with their code", async () => {
    const cause = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:443"), { code: "ECONNREFUSED" });
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed", { cause });
      })
    );

    const result = await createIssueClient(config).fetchIssues("abc-123");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatchObject({ kind: "transport", code: "ECONNREFUSED" });
    }
  });

  it("maps an unparseable body to a transport error", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("<html>", { status: 200 }))
    );

    const result = await createIssueClient(config).fetchIssues("abc-123");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("transport");
    }
  });

  it("passes an abort from the caller through to fetch", async () => {
    const controller = new AbortController();
    vi.stubGlobal(
      "fetch",
      vi.fn(
        (_url: string, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(init.signal?.reason));
          })
      )
    );

    const pending = createIssueClient(config).fetchIssues("abc-123", controller.signal);
    controller.abort(new Error("progress message deleted"));
    const result = await pending;

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("transport");
    }
  });
});
