import { describe, it, expect } from "vitest";
import {
  MAX_SEARCH_LENGTH,
  containsText,
  escapeLikePattern,
  extractSnippet,
  prepareSafeLikePattern,
  validateSearchText,
} from "./searchUtils";
import { ValidationError } from "./errors";

describe("escapeLikePattern", () => {
  it("should escape percent and underscore", () => {
    expect(escapeLikePattern("50%_off")).toBe("50\\%\\_off");
  });

  it("should escape backslash before the other metacharacters", () => {
    expect(escapeLikePattern("a\\%b")).toBe("a\\\\\\%b");
  });

  it("should leave plain text untouched", () => {
    expect(escapeLikePattern("كتاب")).toBe("كتاب");
  });
});

describe("prepareSafeLikePattern", () => {
  it("should wrap escaped text with wildcards", () => {
    expect(prepareSafeLikePattern("abc")).toBe("%abc%");
    expect(prepareSafeLikePattern("a_b")).toBe("%a\\_b%");
  });
});

describe("validateSearchText", () => {
  it("should accept text at the limit", () => {
    expect(() => validateSearchText("x".repeat(MAX_SEARCH_LENGTH))).not.toThrow();
  });

  it("should reject text over the limit", () => {
    expect(() => validateSearchText("x".repeat(MAX_SEARCH_LENGTH + 1))).toThrow(
      ValidationError
    );
  });

  it("should honor a custom limit", () => {
    expect(() => prepareSafeLikePattern("abcd", 3)).toThrow(
      "Search text too long: 4 characters (max: 3)"
    );
  });
});

describe("containsText", () => {
  it("should match case-insensitively", () => {
    expect(containsText("The Quick Fox", "quick")).toBe(true);
    expect(containsText("The Quick Fox", "slow")).toBe(false);
  });
});

describe("extractSnippet", () => {
  it("should return short text unchanged apart from whitespace", () => {
    expect(extractSnippet("alpha\n  beta", "beta")).toBe("alpha beta");
  });

  it("should cut a window around the keyword", () => {
    const text = "x ".repeat(100) + "needle" + " y".repeat(100);
    const snippet = extractSnippet(text, "needle");

    expect(snippet.startsWith("...")).toBe(true);
    expect(snippet.endsWith("...")).toBe(true);
    expect(snippet).toContain("needle");
    expect(snippet).toHaveLength(126);
  });

  it("should fall back to the head when the keyword is missing", () => {
    expect(extractSnippet("a".repeat(130), "zzz")).toBe("a".repeat(120) + "...");
  });
});
