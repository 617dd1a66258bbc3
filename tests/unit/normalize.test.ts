import { describe, it, expect } from "vitest";
import {
  hasHashtag,
  isValidUsername,
  normalizeUsername,
  parseCount,
  stripCounterLabel,
  toIdentifier,
} from "../../src/core/normalize";

describe("Username normalization", () => {
  it("should strip leading @ signs, whitespace and case", () => {
    expect(normalizeUsername("  @@Alice_B ")).toBe("alice_b");
  });

  it("should return an empty string for missing input", () => {
    expect(normalizeUsername(null)).toBe("");
    expect(normalizeUsername(undefined)).toBe("");
  });

  it("should accept 2-24 characters of letters, digits, dots and underscores", () => {
    expect(isValidUsername("ab")).toBe(true);
    expect(isValidUsername("some.user_01")).toBe(true);
    expect(isValidUsername("a")).toBe(false);
    expect(isValidUsername("a".repeat(25))).toBe(false);
    expect(isValidUsername("bad-name")).toBe(false);
    expect(isValidUsername("Upper")).toBe(false);
  });

  it("should turn raw text into an identifier or null", () => {
    expect(toIdentifier("@Some.User")).toBe("some.user");
    expect(toIdentifier("@x")).toBeNull();
    expect(toIdentifier("two words")).toBeNull();
  });
});

describe("parseCount", () => {
  it("should expand K/M/B suffixes", () => {
    expect(parseCount("18.5K")).toBe(18_500);
    expect(parseCount("166 K")).toBe(166_000);
    expect(parseCount("2B")).toBe(2_000_000_000);
    expect(parseCount("1.2k")).toBe(1_200);
  });

  it("should read a comma as the decimal separator before a suffix", () => {
    expect(parseCount("1,5M")).toBe(1_500_000);
  });

  it("should read a comma as a thousands separator without a suffix", () => {
    expect(parseCount("1,234")).toBe(1_234);
  });

  it("should handle non-breaking spaces", () => {
    expect(parseCount("12 K")).toBe(12_000);
  });

  it("should return null for unparseable text", () => {
    expect(parseCount("")).toBeNull();
    expect(parseCount(null)).toBeNull();
    expect(parseCount("abc")).toBeNull();
    expect(parseCount("12 likes")).toBeNull();
  });
});

describe("stripCounterLabel", () => {
  it("should remove the first matching label and lower-case the rest", () => {
    expect(stripCounterLabel("1.2K Followers", ["followers"])).toBe("1.2k");
  });
});

describe("hasHashtag", () => {
  it("should match case-insensitively with or without the leading #", () => {
    expect(hasHashtag("Fun #Cats video", "cats")).toBe(true);
    expect(hasHashtag("Fun #cats video", "#CATS")).toBe(true);
  });

  it("should not match a bare word or an empty tag", () => {
    expect(hasHashtag("cats are fun", "cats")).toBe(false);
    expect(hasHashtag("#cats", "#")).toBe(false);
  });
});
