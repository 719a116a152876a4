/**
 * WHAT: Proves owner id parsing and lookup.
 * HOW: env is mocked so the module reads a known OWNER_IDS at load.
 * DOCS: https://vitest.dev/api/vi.html#vi-mock
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, vi } from "vitest";

vi.mock("../../src/lib/env.js", () => ({
  env: { OWNER_IDS: "111, 222,,333 " },
}));

import { isOwner, parseOwnerIds } from "../../src/lib/owner.js";

describe("parseOwnerIds", () => {
  it("splits, trims and drops empty entries", () => {
    expect(parseOwnerIds("111, 222,,333 ")).toEqual(["111", "222", "333"]);
  });

  it("returns nothing for an unset value", () => {
    expect(parseOwnerIds(undefined)).toEqual([]);
    expect(parseOwnerIds("")).toEqual([]);
  });
});

describe("isOwner", () => {
  it("matches configured ids only", () => {
    expect(isOwner("222")).toBe(true);
    expect(isOwner("333")).toBe(true);
    expect(isOwner("444")).toBe(false);
  });
});
