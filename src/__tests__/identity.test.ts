import { describe, it, expect } from "vitest";
import {
  normalizeId,
  tryNormalizeId,
  compactId,
  remoteUrl,
  InvalidIdentityError,
} from "../identity/index.js";

const CANONICAL = "01234567-89ab-cdef-0123-456789abcdef";

describe("normalizeId", () => {
  it("should hyphenate a bare 32-hex id", () => {
    expect(normalizeId("0123456789abcdef0123456789abcdef")).toBe(CANONICAL);
  });

  it("should lower-case the result", () => {
    expect(normalizeId("0123456789ABCDEF0123456789ABCDEF")).toBe(CANONICAL);
  });

  it("should accept an already hyphenated id", () => {
    expect(normalizeId("01234567-89AB-cdef-0123-456789abcdef")).toBe(CANONICAL);
  });

  it("should extract the id from a page URL with a title slug", () => {
    expect(
      normalizeId("https://www.notion.so/My-Page-0123456789abcdef0123456789abcdef"),
    ).toBe(CANONICAL);
  });

  it("should extract the id from a workspace URL with a view query", () => {
    expect(
      normalizeId(
        "https://www.notion.so/team/0123456789abcdef0123456789abcdef?v=fedcba9876543210fedcba9876543210",
      ),
    ).toBe(CANONICAL);
  });

  it("should prefer a hyphenated id anywhere in the input", () => {
    expect(normalizeId(`see https://example.com/${CANONICAL}/x`)).toBe(CANONICAL);
  });

  it("should accept an id with irregular hyphens", () => {
    expect(normalizeId("0123-4567-89ab-cdef-0123-4567-89ab-cdef")).toBe(CANONICAL);
  });

  it("should trim surrounding whitespace", () => {
    expect(normalizeId("  0123456789abcdef0123456789abcdef\n")).toBe(CANONICAL);
  });

  it("should be idempotent", () => {
    const once = normalizeId("https://www.notion.so/Page-0123456789abcdef0123456789abcdef");
    expect(normalizeId(once)).toBe(once);
  });

  it("should throw InvalidIdentityError when no id is present", () => {
    expect(() => normalizeId("https://www.notion.so/just-a-title")).toThrow(
      InvalidIdentityError,
    );
    expect(() => normalizeId("not an id")).toThrow(
      "Could not find a Notion page id in: not an id",
    );
  });

  it("should reject 31 hex characters", () => {
    expect(() => normalizeId("0123456789abcdef0123456789abcde")).toThrow(
      InvalidIdentityError,
    );
  });
});

describe("tryNormalizeId", () => {
  it("should return the canonical id when one is present", () => {
    expect(tryNormalizeId("0123456789abcdef0123456789abcdef")).toBe(CANONICAL);
  });

  it("should return undefined for an external URL", () => {
    expect(tryNormalizeId("https://example.com/docs")).toBeUndefined();
  });
});

describe("compactId / remoteUrl", () => {
  it("should strip hyphens", () => {
    expect(compactId(CANONICAL)).toBe("0123456789abcdef0123456789abcdef");
  });

  it("should build the remote fallback URL", () => {
    expect(remoteUrl(CANONICAL)).toBe(
      "https://www.notion.so/0123456789abcdef0123456789abcdef",
    );
  });
});
