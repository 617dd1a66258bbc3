import type { Logger } from "../../core/logger";
import { hasHashtag, isValidUsername } from "../../core/normalize";
import { pick, type Rng } from "../../core/random";
import { ACTION_ORDER, LEDGERED_KINDS, type ActionKind, type EngagementRunConfig } from "../../domain/models";
import type { AnyTarget } from "../../domain/targets";
import { isFriendStatus } from "../../platforms/tiktok/parsers";
import type { LedgerGateway } from "../../services/ledger-gateway";
import type { SafeEvents } from "../events";
import type { StatKey, WorkflowStats } from "../stats";
import type { PacingController } from "./pacing";

export type SkipReason =
  | "invalid_identifier"
  | "already_liked"
  | "below_min_likes"
  | "above_max_likes"
  | "missing_required_tag"
  | "excluded_tag"
  | "recently_interacted"
  | "friend";

export interface ActionOutcome {
  skipped: SkipReason | null;
  attempted: ActionKind[];
  results: Partial<Record<ActionKind, boolean>>;
  /** Enabled kinds that were not drawn because their session cap is reached. */
  capBlocked: ActionKind[];
}

/** Where the engine's decisions land on screen. */
export interface ActionSurface {
  /** True when the target is already in the state the action would produce. */
  isInState(kind: ActionKind): Promise<boolean>;
  perform(kind: ActionKind, context: { commentText: string | null }): Promise<boolean>;
}

export type EngagementSettings = Pick<
  EngagementRunConfig,
  | "likeProbability"
  | "followProbability"
  | "favoriteProbability"
  | "commentProbability"
  | "shareProbability"
  | "commentTemplates"
  | "maxLikesPerSession"
  | "maxFollowsPerSession"
  | "maxCommentsPerSession"
  | "minLikes"
  | "maxLikes"
  | "requiredHashtags"
  | "excludedHashtags"
  | "skipAlreadyLiked"
  | "includeFriends"
  | "interactionWindowHours"
>;

const COUNTERS: Record<ActionKind, StatKey> = {
  like: "videos_liked",
  follow: "users_followed",
  favorite: "videos_favorited",
  comment: "comments",
  share: "shares",
};

export class ActionEngine {
  constructor(
    private settings: EngagementSettings,
    private rng: Rng,
    private stats: WorkflowStats,
    private ledger: LedgerGateway,
    private pacing: PacingController,
    private events: SafeEvents,
    private log: Logger
  ) {}

  /** Filter predicates. Returns the first reason to leave the target alone, or null. */
  async screenTarget(target: AnyTarget): Promise<SkipReason | null> {
    if (!target.identifier || !isValidUsername(target.identifier)) return "invalid_identifier";

    if (target.kind === "video") {
      if (this.settings.skipAlreadyLiked && target.isLiked) return "already_liked";
      if (target.likeCount !== null) {
        if (this.settings.minLikes !== null && target.likeCount < this.settings.minLikes) return "below_min_likes";
        if (this.settings.maxLikes !== null && target.likeCount > this.settings.maxLikes) return "above_max_likes";
      }
      if (
        this.settings.requiredHashtags.length > 0 &&
        !this.settings.requiredHashtags.some((tag) => hasHashtag(target.description, tag))
      ) {
        return "missing_required_tag";
      }
      if (this.settings.excludedHashtags.some((tag) => hasHashtag(target.description, tag))) return "excluded_tag";
    }

    if (!this.settings.includeFriends && isFriendStatus(target.statusLabel)) return "friend";

    if (await this.ledger.hasRecent(target.identifier, "any", this.settings.interactionWindowHours)) {
      return "recently_interacted";
    }
    return null;
  }

  /**
   * Draws and performs actions in the fixed kind order. Caps are checked
   * before each draw; counters move only on reported success.
   */
  async execute(
    target: AnyTarget,
    surface: ActionSurface,
    kinds: readonly ActionKind[] = ACTION_ORDER
  ): Promise<ActionOutcome> {
    const outcome: ActionOutcome = { skipped: null, attempted: [], results: {}, capBlocked: [] };

    for (const kind of ACTION_ORDER) {
      if (!kinds.includes(kind)) continue;

      const probability = this.probability(kind);
      if (probability <= 0) continue;

      if (this.capReached(kind)) {
        outcome.capBlocked.push(kind);
        continue;
      }

      if (this.rng() >= probability) continue;

      const commentText = kind === "comment" ? (pick(this.rng, this.settings.commentTemplates) ?? null) : null;
      if (kind === "comment" && commentText === null) continue;

      if (await surface.isInState(kind)) {
        this.log.debug({ kind, target: target.identifier }, "Target already in state");
        continue;
      }

      outcome.attempted.push(kind);
      outcome.results[kind] = await this.performAction(target, kind, () => surface.perform(kind, { commentText }));
    }

    return outcome;
  }

  async decideAndExecute(
    target: AnyTarget,
    surface: ActionSurface,
    kinds: readonly ActionKind[] = ACTION_ORDER
  ): Promise<ActionOutcome> {
    const skipped = await this.screenTarget(target);
    if (skipped) {
      return { skipped, attempted: [], results: {}, capBlocked: [] };
    }
    return this.execute(target, surface, kinds);
  }

  /**
   * Performs one already-decided action and books it: counter and pacing on
   * success, ledger for ledgered kinds, then the action and stats events.
   */
  async performAction(target: AnyTarget, kind: ActionKind, perform: () => Promise<boolean>): Promise<boolean> {
    const success = await perform();

    if (success) {
      this.stats.increment(COUNTERS[kind]);
      this.pacing.noteAction();
      this.log.info({ kind, target: target.identifier }, "Action performed");
    } else {
      this.log.debug({ kind, target: target.identifier }, "Action did not succeed");
    }

    if (LEDGERED_KINDS.has(kind)) {
      await this.ledger.record(target.identifier, kind, success);
    }

    this.events.action({ action: kind, target: target.identifier, success });
    this.events.stats(this.stats.toJSON());

    if (success) {
      await this.pacing.humanDelay();
    }
    return success;
  }

  capReached(kind: ActionKind): boolean {
    const cap = this.cap(kind);
    return cap !== null && this.stats.get(COUNTERS[kind]) >= cap;
  }

  private cap(kind: ActionKind): number | null {
    switch (kind) {
      case "like":
        return this.settings.maxLikesPerSession;
      case "follow":
        return this.settings.maxFollowsPerSession;
      case "comment":
        return this.settings.maxCommentsPerSession;
      default:
        return null;
    }
  }

  private probability(kind: ActionKind): number {
    switch (kind) {
      case "like":
        return this.settings.likeProbability;
      case "follow":
        return this.settings.followProbability;
      case "favorite":
        return this.settings.favoriteProbability;
      case "comment":
        return this.settings.commentProbability;
      case "share":
        return this.settings.shareProbability;
    }
  }
}
