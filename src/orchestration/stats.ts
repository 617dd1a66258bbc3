import type { Clock } from "../core/clock";
import type { CompletionReason } from "../domain/models";

const ZERO_COUNTERS = {
  videos_watched: 0,
  videos_liked: 0,
  users_followed: 0,
  videos_favorited: 0,
  comments: 0,
  shares: 0,
  videos_skipped: 0,
  ads_skipped: 0,
  popups_closed: 0,
  suggestions_handled: 0,
  stories_viewed: 0,
  profiles_visited: 0,
  profiles_skipped: 0,
  followers_seen: 0,
  already_friends: 0,
  profiles_scraped: 0,
  profiles_enriched: 0,
  unfollowed: 0,
  recoveries: 0,
  errors: 0,
};

export type StatKey = keyof typeof ZERO_COUNTERS;

export type WorkflowStatsSnapshot = Record<StatKey, number> & {
  completion_reason: CompletionReason | null;
  elapsed_seconds: number;
};

/**
 * Per-run accumulator. Counters only grow, and the completion reason is
 * written once; later attempts to complete are ignored.
 */
export class WorkflowStats {
  private counters: Record<StatKey, number> = { ...ZERO_COUNTERS };
  private reason: CompletionReason | null = null;
  private readonly startedAt: number;
  private endedAt: number | null = null;

  constructor(private clock: Pick<Clock, "now">) {
    this.startedAt = clock.now();
  }

  increment(key: StatKey, by: number = 1): number {
    if (by > 0) {
      this.counters[key] += by;
    }
    return this.counters[key];
  }

  get(key: StatKey): number {
    return this.counters[key];
  }

  get completionReason(): CompletionReason | null {
    return this.reason;
  }

  get isComplete(): boolean {
    return this.reason !== null;
  }

  complete(reason: CompletionReason): boolean {
    if (this.reason !== null) return false;
    this.reason = reason;
    this.endedAt = this.clock.now();
    return true;
  }

  elapsedSeconds(): number {
    const end = this.endedAt ?? this.clock.now();
    return Math.round((end - this.startedAt) / 100) / 10;
  }

  toJSON(): WorkflowStatsSnapshot {
    return {
      ...this.counters,
      completion_reason: this.reason,
      elapsed_seconds: this.elapsedSeconds(),
    };
  }
}
