import { z } from "zod";
import { env } from "../core/config";
import { ConfigError } from "../core/errors";

export const PageStateSchema = z.enum([
  "feed",
  "profile",
  "followers_list",
  "inbox",
  "story",
  "video_player",
  "search_results",
  "unknown",
]);
export type PageState = z.infer<typeof PageStateSchema>;

export const TargetOriginSchema = z.enum(["feed", "followers_list", "following_list", "search", "hashtag"]);
export type TargetOrigin = z.infer<typeof TargetOriginSchema>;

export const InteractionKindSchema = z.enum(["like", "follow", "favorite", "comment", "share", "dm", "unfollow"]);
export type InteractionKind = z.infer<typeof InteractionKindSchema>;

export const ActionKindSchema = z.enum(["like", "follow", "favorite", "comment", "share"]);
export type ActionKind = z.infer<typeof ActionKindSchema>;

/** Evaluation order of the action engine. Session caps make this order significant. */
export const ACTION_ORDER: readonly ActionKind[] = ["like", "follow", "favorite", "comment", "share"];

/** Kinds whose repetition against the same target must be avoided across runs. */
export const LEDGERED_KINDS: ReadonlySet<InteractionKind> = new Set(["like", "follow", "dm", "unfollow"]);

export const WorkflowTypeSchema = z.enum(["feed", "search", "followers", "scrape", "unfollow"]);
export type WorkflowType = z.infer<typeof WorkflowTypeSchema>;

export const SessionStatusSchema = z.enum(["running", "completed", "stopped", "failed"]);
export type SessionStatus = z.infer<typeof SessionStatusSchema>;

export const CompletionReasonSchema = z.enum([
  "max_videos_reached",
  "max_profiles_reached",
  "max_likes_reached",
  "max_follows_reached",
  "max_unfollows_reached",
  "no_more_targets",
  "stopped_by_user",
  "navigation_failed",
  "recovery_failed",
  "error",
]);
export type CompletionReason = z.infer<typeof CompletionReasonSchema>;

const probability = z.number().min(0).max(1);
const seconds = z.number().min(0);
const count = z.number().int().min(0);

const CommonRunConfigShape = {
  minDelay: seconds.default(1),
  maxDelay: seconds.default(3),
  pauseAfterActions: count.default(10),
  pauseDurationMin: seconds.default(30),
  pauseDurationMax: seconds.default(60),
  interactionWindowHours: z.number().positive().default(env.WORKFLOW_INTERACTION_WINDOW_HOURS),
  maxErrors: count.default(env.WORKFLOW_MAX_ERRORS),
  stuckThreshold: z.number().int().min(2).default(env.WORKFLOW_STUCK_THRESHOLD),
  seed: z.union([z.string(), z.number()]).optional(),
};

export const CommonRunConfigSchema = z.object(CommonRunConfigShape);
export type CommonRunConfig = Readonly<z.infer<typeof CommonRunConfigSchema>>;

const EngagementConfigShape = {
  likeProbability: probability.default(0.3),
  followProbability: probability.default(0.1),
  favoriteProbability: probability.default(0.05),
  commentProbability: probability.default(0),
  shareProbability: probability.default(0),
  commentTemplates: z.array(z.string().min(1)).default([]),
  maxLikesPerSession: count.default(50),
  maxFollowsPerSession: count.default(20),
  maxCommentsPerSession: count.default(10),
  minWatchTime: seconds.default(2),
  maxWatchTime: seconds.default(8),
  minLikes: count.nullable().default(null),
  maxLikes: count.nullable().default(null),
  requiredHashtags: z.array(z.string()).default([]),
  excludedHashtags: z.array(z.string()).default([]),
  skipAlreadyLiked: z.boolean().default(true),
  includeFriends: z.boolean().default(false),
  skipAds: z.boolean().default(true),
};

type RangeFields = Partial<Record<"minDelay" | "maxDelay" | "pauseDurationMin" | "pauseDurationMax" | "minWatchTime" | "maxWatchTime", number>>;

function checkRanges(value: RangeFields, ctx: z.RefinementCtx): void {
  const pairs: Array<[keyof RangeFields, keyof RangeFields]> = [
    ["minDelay", "maxDelay"],
    ["pauseDurationMin", "pauseDurationMax"],
    ["minWatchTime", "maxWatchTime"],
  ];
  for (const [lo, hi] of pairs) {
    const min = value[lo];
    const max = value[hi];
    if (min !== undefined && max !== undefined && min > max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [lo], message: `${lo} must not exceed ${hi}` });
    }
  }
}

export const FeedRunConfigSchema = z
  .object({
    ...CommonRunConfigShape,
    ...EngagementConfigShape,
    maxVideos: count.default(50),
    followBackSuggestions: z.boolean().default(false),
  })
  .superRefine(checkRanges);
export type FeedRunConfig = Readonly<z.infer<typeof FeedRunConfigSchema>>;
export type FeedRunInput = z.input<typeof FeedRunConfigSchema>;

export const SearchRunConfigSchema = z
  .object({
    ...CommonRunConfigShape,
    ...EngagementConfigShape,
    searchQuery: z.string().trim().min(1),
    maxVideos: count.default(50),
    followBackSuggestions: z.boolean().default(false),
  })
  .superRefine(checkRanges);
export type SearchRunConfig = Readonly<z.infer<typeof SearchRunConfigSchema>>;
export type SearchRunInput = z.input<typeof SearchRunConfigSchema>;

export const FollowersRunConfigSchema = z
  .object({
    ...CommonRunConfigShape,
    ...EngagementConfigShape,
    searchQuery: z.string().trim().min(1),
    maxFollowers: count.default(50),
    postsPerProfile: count.default(2),
    storyLikeProbability: probability.default(0.5),
  })
  .superRefine(checkRanges);
export type FollowersRunConfig = Readonly<z.infer<typeof FollowersRunConfigSchema>>;
export type FollowersRunInput = z.input<typeof FollowersRunConfigSchema>;

export const ScrapeRunConfigSchema = z
  .object({
    ...CommonRunConfigShape,
    scrapeType: z.enum(["target", "hashtag"]).default("target"),
    targetUsernames: z.array(z.string().min(1)).default([]),
    targetScrapeType: z.enum(["followers", "following"]).default("followers"),
    hashtag: z.string().default(""),
    maxProfiles: count.default(500),
    maxVideos: count.default(50),
    maxScrollAttempts: count.default(50),
    enrichProfiles: z.boolean().default(true),
    maxProfilesToEnrich: count.default(50),
  })
  .superRefine(checkRanges)
  .superRefine((value, ctx) => {
    if (value.scrapeType === "target" && value.targetUsernames.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["targetUsernames"], message: "at least one target username is required" });
    }
    if (value.scrapeType === "hashtag" && value.hashtag.replace(/^#/, "").trim().length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["hashtag"], message: "hashtag is required" });
    }
  });
export type ScrapeRunConfig = Readonly<z.infer<typeof ScrapeRunConfigSchema>>;
export type ScrapeRunInput = z.input<typeof ScrapeRunConfigSchema>;

export const UnfollowRunConfigSchema = z
  .object({
    ...CommonRunConfigShape,
    maxUnfollows: count.default(20),
    includeFriends: z.boolean().default(false),
    maxScrollAttempts: count.default(10),
  })
  .superRefine(checkRanges);
export type UnfollowRunConfig = Readonly<z.infer<typeof UnfollowRunConfigSchema>>;
export type UnfollowRunInput = z.input<typeof UnfollowRunConfigSchema>;

export type EngagementRunConfig = FeedRunConfig | SearchRunConfig | FollowersRunConfig;

export function parseRunConfig<S extends z.ZodTypeAny>(schema: S, input: unknown): Readonly<z.infer<S>> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid run configuration: ${details}`);
  }
  return Object.freeze(parsed.data);
}

export const ScrapedProfileSchema = z.object({
  username: z.string(),
  displayName: z.string().default(""),
  followersCount: z.number().int().nullable().default(null),
  followingCount: z.number().int().nullable().default(null),
  likesCount: z.number().int().nullable().default(null),
  bio: z.string().default(""),
  isPrivate: z.boolean().default(false),
  isVerified: z.boolean().default(false),
  isEnriched: z.boolean().default(false),
});
export type ScrapedProfile = z.infer<typeof ScrapedProfileSchema>;
