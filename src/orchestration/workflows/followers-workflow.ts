import { errorMessage } from "../../core/errors";
import { normalizeUsername } from "../../core/normalize";
import {
  FollowersRunConfigSchema,
  parseRunConfig,
  type ActionKind,
  type FollowersRunConfig,
  type FollowersRunInput,
} from "../../domain/models";
import { describeTarget, listSignature, type ProfileRowTarget } from "../../domain/targets";
import { locator } from "../../platforms/tiktok/selectors";
import type { ActionEngine } from "../capabilities/action-engine";
import { smartScrollBudget } from "../capabilities/smart-scroll";
import { ProfileSurface, VideoSurface } from "../capabilities/surfaces";
import { createActionEngine, type WorkflowContext, type WorkflowDependencies } from "../context";
import { BaseWorkflow, type Step } from "./base-workflow";
import { capReason } from "./video-loop";

const POST_ACTIONS: readonly ActionKind[] = ["like", "favorite", "comment", "share"];

function rowKey(row: ProfileRowTarget): string {
  return row.identifier || `unnamed:${row.displayName}:${row.bounds?.top ?? 0}`;
}

interface FollowersRun {
  config: FollowersRunConfig;
  engine: ActionEngine;
  scope: string;
  checkpoint: string;
  processed: Set<string>;
  /** Rows that were skipped or opened; a failed open does not count. */
  settled: number;
  followersTotal: number | null;
  open: () => Promise<boolean>;
}

/**
 * Visits the followers of an account found by search: watches and acts on a
 * few posts per follower, decides a follow on their profile, then returns to
 * the list. Scrolling is bounded by the smart scroll budget.
 */
export class FollowersWorkflow extends BaseWorkflow<FollowersRunConfig, FollowersRunInput> {
  constructor(deps: WorkflowDependencies) {
    super(deps, "followers");
  }

  protected parse(input: FollowersRunInput): FollowersRunConfig {
    return parseRunConfig(FollowersRunConfigSchema, input);
  }

  protected scope(config: FollowersRunConfig): string {
    return normalizeUsername(config.searchQuery);
  }

  protected async execute(ctx: WorkflowContext, config: FollowersRunConfig): Promise<void> {
    const run: FollowersRun = {
      config,
      engine: createActionEngine(ctx, config),
      scope: this.scope(config),
      checkpoint: `followers:${this.scope(config)}`,
      processed: new Set(),
      settled: 0,
      followersTotal: null,
      open: async () => {
        const entry = await ctx.flows.openFollowersOf(config.searchQuery);
        if (entry.followersTotal !== null) run.followersTotal = entry.followersTotal;
        return entry.reached;
      },
    };

    if (!(await this.reach(ctx, run.checkpoint, run.open))) return;

    while (await this.proceed(ctx)) {
      if (ctx.stats.get("profiles_visited") >= config.maxFollowers) {
        ctx.stats.complete("max_profiles_reached");
        break;
      }

      const step = await this.iterate(ctx, config, () => this.processNext(ctx, run));
      if (step === "done" || ctx.stats.isComplete) break;

      await ctx.pacing.maybePause();
    }
  }

  private async processNext(ctx: WorkflowContext, run: FollowersRun): Promise<Step> {
    if (!(await this.backToList(ctx, run))) return "done";

    const rows = await ctx.reader.readRows("followers_list");
    const recovery = await ctx.recovery.check(listSignature("followers_list", rows, run.settled), async () =>
      listSignature(await ctx.detector.classify(), await ctx.reader.readRows("followers_list"), run.settled)
    );
    if (recovery === "failed") {
      ctx.stats.complete("recovery_failed");
      return "done";
    }
    if (recovery !== "progressing") return "continue";

    const row = this.firstUnprocessed(rows, run) ?? (await this.scrollForNew(ctx, run));
    if (!row) {
      ctx.log.info({ processed: run.processed.size, total: run.followersTotal }, "No more followers to visit");
      ctx.stats.complete("no_more_targets");
      return "done";
    }

    run.processed.add(rowKey(row));
    ctx.stats.increment("followers_seen");

    const skip = await run.engine.screenTarget(row);
    if (skip === "friend") {
      run.settled++;
      ctx.stats.increment("already_friends");
      return "continue";
    }
    if (skip) {
      run.settled++;
      ctx.stats.increment("profiles_skipped");
      ctx.log.debug({ username: row.identifier, reason: skip }, "Skipping follower");
      return "continue";
    }

    if (!(await this.openRow(ctx, run, row))) {
      ctx.stats.increment("errors");
      ctx.log.warn({ username: row.identifier }, "Could not open follower profile");
      return "continue";
    }

    run.settled++;
    ctx.stats.increment("profiles_visited");
    ctx.log.info(
      { username: row.identifier, visited: ctx.stats.get("profiles_visited"), max: run.config.maxFollowers },
      "Visiting profile"
    );
    await this.captureProfile(ctx, row);

    const capBlocked = await this.interactWithPosts(ctx, run, row);
    const follow = await run.engine.execute(row, new ProfileSurface(ctx.device), ["follow"]);
    capBlocked.push(...follow.capBlocked);

    if (!(await this.backToList(ctx, run))) return "done";

    const reason = capReason(capBlocked);
    if (reason) {
      ctx.stats.complete(reason);
      return "done";
    }

    ctx.events.stats(ctx.stats.toJSON());
    await ctx.pacing.humanDelay();
    return "continue";
  }

  private async backToList(ctx: WorkflowContext, run: FollowersRun): Promise<boolean> {
    if (await ctx.navigator.backTo("followers_list", 5)) return true;
    return this.reach(ctx, run.checkpoint, run.open);
  }

  private firstUnprocessed(rows: readonly ProfileRowTarget[], run: FollowersRun): ProfileRowTarget | null {
    return rows.find((row) => !run.processed.has(rowKey(row))) ?? null;
  }

  private async scrollForNew(ctx: WorkflowContext, run: FollowersRun): Promise<ProfileRowTarget | null> {
    const visited = await ctx.ledger.countForScope(run.scope, run.config.interactionWindowHours);
    const budget = smartScrollBudget(Math.max(visited, run.processed.size), run.followersTotal);
    ctx.log.debug({ visited, total: run.followersTotal, budget }, "Scrolling for unseen followers");

    for (let attempt = 0; attempt < budget; attempt++) {
      if (this.control.shouldStop) return null;
      await ctx.device.scrollList();
      await ctx.clock.sleep(1000);

      const row = this.firstUnprocessed(await ctx.reader.readRows("followers_list"), run);
      if (row) return row;
    }
    return null;
  }

  /** Taps the row's name (the avatar may open a story instead). */
  private async openRow(ctx: WorkflowContext, run: FollowersRun, row: ProfileRowTarget): Promise<boolean> {
    if (!row.bounds) return false;

    const tapped = await ctx.device.tap((row.bounds.left + row.bounds.right) / 2, (row.bounds.top + row.bounds.bottom) / 2);
    if (!tapped.ok) return false;
    await ctx.pacing.humanDelay();

    if (await ctx.detector.is("story")) {
      return this.handleStory(ctx, run, row);
    }
    return ctx.navigator.waitFor("profile", 3000);
  }

  private async handleStory(ctx: WorkflowContext, run: FollowersRun, row: ProfileRowTarget): Promise<boolean> {
    ctx.stats.increment("stories_viewed");
    await ctx.pacing.dwell(3, 6);

    const probability = run.config.storyLikeProbability;
    if (probability > 0 && !run.engine.capReached("like") && ctx.rng() < probability) {
      await run.engine.performAction(row, "like", () => ctx.device.tryClick(locator("story.like_button"), 1500));
    }

    if (await ctx.device.tryClick(locator("story.username"), 1500)) {
      if (await ctx.navigator.waitFor("profile", 3000)) return true;
    }

    if (!(await ctx.device.tryClick(locator("story.close_button"), 1000))) {
      await ctx.device.back();
    }
    return false;
  }

  private async captureProfile(ctx: WorkflowContext, row: ProfileRowTarget): Promise<void> {
    const profile = await ctx.reader.readProfile(row.identifier);
    ctx.events.profile(profile);

    const sink = ctx.profiles;
    if (!sink) return;
    try {
      await sink.saveProfile(profile, ctx.ledger.currentSessionId);
    } catch (error) {
      ctx.stats.increment("errors");
      ctx.log.warn({ username: profile.username, error: errorMessage(error) }, "Could not save profile");
    }
  }

  private async interactWithPosts(ctx: WorkflowContext, run: FollowersRun, row: ProfileRowTarget): Promise<ActionKind[]> {
    const capBlocked: ActionKind[] = [];
    const available = await ctx.reader.countGridItems();
    const posts = Math.min(run.config.postsPerProfile, available);
    if (posts === 0) {
      ctx.log.debug({ username: row.identifier }, "No posts to watch");
      return capBlocked;
    }

    if (!(await ctx.flows.openProfileGridItem(0))) return capBlocked;
    await ctx.pacing.humanDelay();

    for (let index = 0; index < posts; index++) {
      if (this.control.shouldStop) break;

      await ctx.pacing.dwell(run.config.minWatchTime, run.config.maxWatchTime);
      ctx.stats.increment("videos_watched");

      const video = await ctx.reader.readVideo("followers_list");
      ctx.events.video(describeTarget(video));

      const outcome = await run.engine.execute(
        { ...video, identifier: row.identifier },
        new VideoSurface(ctx.device, ctx.clock, video),
        POST_ACTIONS
      );
      capBlocked.push(...outcome.capBlocked);

      if (index < posts - 1) {
        await ctx.device.nextVideo();
        await ctx.pacing.humanDelay();
      }
    }

    await ctx.navigator.backTo("profile", 3);
    return capBlocked;
  }
}
