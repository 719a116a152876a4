/**
 * WHAT: Proves issue payload normalization: first element wins, bad fields degrade to placeholders.
 * HOW: Plain payload literals; normalizeIssues is pure.
 * DOCS: https://vitest.dev/guide/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect } from "vitest";
import {
  DESCRIPTION_FALLBACK,
  LAST_SEEN_FALLBACK,
  TITLE_FALLBACK,
  issueDetailUrl,
  normalizeIssues,
} from "../../../src/features/issueLookup/normalize.js";

describe("normalizeIssues", () => {
  it("maps a complete first element", () => {
    const record = normalizeIssues([
      { title: "X", metadata: { value: "V" }, isUnhandled: true, lastSeen: "2024-01-01T00:00:00Z" },
    ]);

    expect(record).toEqual({
      title: "X",
      description: "V",
      isUnhandled: true,
      lastSeenRelative: "<t:1704067200:R>",
      detailUrl: null,
    });
  });

  it("returns null for an empty list", () => {
    expect(normalizeIssues([])).toBeNull();
  });

  it.each([
    ["an object", { title: "X" }],
    ["null", null],
    ["a string", "[]"],
    ["a list of strings", ["X"]],
    ["a list starting with an array", [["X"]]],
  ])("returns null when the payload is %s", (_label, payload) => {
    expect(normalizeIssues(payload)).toBeNull();
  });

  it("uses only the first element", () => {
    const record = normalizeIssues([
      { title: "first", metadata: { value: "one" } },
      { title: "second", metadata: { value: "two" } },
    ]);

    expect(record?.title).toBe("first");
    expect(record?.description).toBe("one");
  });

  it("falls back when lastSeen is missing", () => {
    const record = normalizeIssues([{ title: "X", metadata: { value: "V" }, isUnhandled: false }]);

    expect(record?.lastSeenRelative).toBe(LAST_SEEN_FALLBACK);
    expect(record?.isUnhandled).toBe(false);
  });

  it.each(["yesterday", "2024-01-01", "2024-01-01T00:00:00", "2024-02-30T00:00:00Z", 1704067200])(
    "falls back for an unusable lastSeen (%s)",
    (lastSeen) => {
      expect(normalizeIssues([{ lastSeen }])?.lastSeenRelative).toBe(LAST_SEEN_FALLBACK);
    }
  );

  it("honors the zone offset and fractional seconds", () => {
    expect(normalizeIssues([{ lastSeen: "2024-01-01T02:00:00+02:00" }])?.lastSeenRelative).toBe("<t:1704067200:R>");
    expect(normalizeIssues([{ lastSeen: "2024-01-01T00:00:00.123456Z" }])?.lastSeenRelative).toBe(
      "<t:1704067200:R>"
    );
  });

  it("fills every missing field with its placeholder", () => {
    expect(normalizeIssues([{}])).toEqual({
      title: TITLE_FALLBACK,
      description: DESCRIPTION_FALLBACK,
      isUnhandled: "not_available",
      lastSeenRelative: LAST_SEEN_FALLBACK,
      detailUrl: null,
    });
  });

  it("ignores wrongly typed fields", () => {
    const record = normalizeIssues([{ title: 42, metadata: "V", isUnhandled: "yes" }]);

    expect(record?.title).toBe(TITLE_FALLBACK);
    expect(record?.description).toBe(DESCRIPTION_FALLBACK);
    expect(record?.isUnhandled).toBe("not_available");
  });

  it("builds a detail link from the template", () => {
    const record = normalizeIssues([{ id: "9001", title: "X" }], {
      issueUrlTemplate: "https://errors.example.test/issues/{id}/",
    });

    expect(record?.detailUrl).toBe("https://errors.example.test/issues/9001/");
  });

  it("returns a frozen record", () => {
    const record = normalizeIssues([{ title: "X" }]);
    expect(Object.isFrozen(record)).toBe(true);
  });
});

describe("issueDetailUrl", () => {
  const template = "https://errors.example.test/issues/{id}/";

  it("accepts numeric ids", () => {
    expect(issueDetailUrl(123, template)).toBe("https://errors.example.test/issues/123/");
  });

  it("encodes string ids", () => {
    expect(issueDetailUrl("a/b c", template)).toBe("https://errors.example.test/issues/a%2Fb%20c/");
  });

  it("returns null without a usable id or template", () => {
    expect(issueDetailUrl("", template)).toBeNull();
    expect(issueDetailUrl(undefined, template)).toBeNull();
    expect(issueDetailUrl(Number.NaN, template)).toBeNull();
    expect(issueDetailUrl("1", undefined)).toBeNull();
    expect(issueDetailUrl("1", "https://errors.example.test/issues/")).toBeNull();
  });
});
