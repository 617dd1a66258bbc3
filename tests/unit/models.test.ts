import { afterEach, describe, it, expect, vi } from "vitest";
import {
  FeedRunConfigSchema,
  FollowersRunConfigSchema,
  ScrapeRunConfigSchema,
  UnfollowRunConfigSchema,
  parseRunConfig,
} from "../../src/domain/models";
import { ConfigError } from "../../src/core/errors";

describe("Run configuration", () => {
  it("should fill defaults for an empty feed config", () => {
    const config = parseRunConfig(FeedRunConfigSchema, undefined);

    expect(config.maxVideos).toBe(50);
    expect(config.likeProbability).toBe(0.3);
    expect(config.maxLikesPerSession).toBe(50);
    expect(config.interactionWindowHours).toBe(168);
    expect(config.stuckThreshold).toBe(3);
    expect(config.commentTemplates).toEqual([]);
    expect(config.minLikes).toBeNull();
  });

  describe("environment defaults", () => {
    afterEach(() => {
      vi.unstubAllEnvs();
      vi.resetModules();
    });

    it("should take the workflow defaults from the environment", async () => {
      vi.stubEnv("WORKFLOW_STUCK_THRESHOLD", "4");
      vi.stubEnv("WORKFLOW_MAX_ERRORS", "9");
      vi.stubEnv("WORKFLOW_INTERACTION_WINDOW_HOURS", "24");
      vi.resetModules();

      const models = await import("../../src/domain/models");
      const config = models.parseRunConfig(models.UnfollowRunConfigSchema, {});

      expect(config.stuckThreshold).toBe(4);
      expect(config.maxErrors).toBe(9);
      expect(config.interactionWindowHours).toBe(24);
    });
  });

  it("should freeze the parsed config", () => {
    expect(Object.isFrozen(parseRunConfig(FeedRunConfigSchema, {}))).toBe(true);
  });

  it("should reject probabilities outside [0, 1]", () => {
    expect(() => parseRunConfig(FeedRunConfigSchema, { likeProbability: 1.5 })).toThrow(ConfigError);
  });

  it("should reject inverted ranges and name the field", () => {
    expect(() => parseRunConfig(FeedRunConfigSchema, { minDelay: 5, maxDelay: 2 })).toThrow(
      "Invalid run configuration: minDelay: minDelay must not exceed maxDelay"
    );
  });

  it("should require a search query for the followers workflow", () => {
    expect(() => parseRunConfig(FollowersRunConfigSchema, {})).toThrow(/searchQuery/);
    expect(parseRunConfig(FollowersRunConfigSchema, { searchQuery: "  creator " }).searchQuery).toBe("creator");
  });

  it("should require targets in target scrape mode and a tag in hashtag mode", () => {
    expect(() => parseRunConfig(ScrapeRunConfigSchema, {})).toThrow(/targetUsernames/);
    expect(() => parseRunConfig(ScrapeRunConfigSchema, { scrapeType: "hashtag", hashtag: "#" })).toThrow(/hashtag/);
    expect(parseRunConfig(ScrapeRunConfigSchema, { scrapeType: "hashtag", hashtag: "#cats" }).hashtag).toBe("#cats");
  });

  it("should default unfollow runs to leave friends alone", () => {
    const config = parseRunConfig(UnfollowRunConfigSchema, {});
    expect(config.includeFriends).toBe(false);
    expect(config.maxUnfollows).toBe(20);
  });

  it("should accept a string or numeric seed", () => {
    expect(parseRunConfig(FeedRunConfigSchema, { seed: 42 }).seed).toBe(42);
    expect(parseRunConfig(FeedRunConfigSchema, { seed: "abc" }).seed).toBe("abc");
  });
});
