import type { ActionKind, CompletionReason, FeedRunConfig, SearchRunConfig, TargetOrigin } from "../../domain/models";
import { describeTarget, videoSignature } from "../../domain/targets";
import { locator } from "../../platforms/tiktok/selectors";
import type { ActionEngine } from "../capabilities/action-engine";
import { VideoSurface } from "../capabilities/surfaces";
import { createActionEngine, type WorkflowContext } from "../context";
import { BaseWorkflow, type Step } from "./base-workflow";

export type VideoRunConfig = FeedRunConfig | SearchRunConfig;

// Only the like and follow caps end a run; a capped comment kind just stops being drawn.
const CAP_REASONS: Partial<Record<ActionKind, CompletionReason>> = {
  like: "max_likes_reached",
  follow: "max_follows_reached",
};

export function capReason(kinds: readonly ActionKind[]): CompletionReason | null {
  for (const kind of kinds) {
    const reason = CAP_REASONS[kind];
    if (reason) return reason;
  }
  return null;
}

/**
 * Per-video loop shared by the feed and search workflows: read, filter,
 * watch, act, swipe. Subclasses decide how the player is reached.
 */
export abstract class VideoLoopWorkflow<TConfig extends VideoRunConfig, TInput> extends BaseWorkflow<TConfig, TInput> {
  protected abstract readonly origin: TargetOrigin;
  protected abstract enter(ctx: WorkflowContext, config: TConfig): Promise<boolean>;

  protected async execute(ctx: WorkflowContext, config: TConfig): Promise<void> {
    const engine = createActionEngine(ctx, config);
    if (!(await this.reach(ctx, this.type, () => this.enter(ctx, config)))) return;

    while (await this.proceed(ctx)) {
      if (ctx.stats.get("videos_watched") >= config.maxVideos) {
        ctx.stats.complete("max_videos_reached");
        break;
      }

      const step = await this.iterate(ctx, config, () => this.processVideo(ctx, config, engine));
      if (step === "done" || ctx.stats.isComplete) break;

      await ctx.pacing.maybePause();
    }
  }

  private async processVideo(ctx: WorkflowContext, config: TConfig, engine: ActionEngine): Promise<Step> {
    if (!(await this.onPlayer(ctx, config, engine))) {
      return (await this.reach(ctx, this.type, () => this.enter(ctx, config))) ? "continue" : "done";
    }

    const state = await ctx.detector.classify();
    const video = await ctx.reader.readVideo(this.origin);
    const signature = videoSignature(video, state);

    const recovery = await ctx.recovery.check(signature, async () =>
      videoSignature(await ctx.reader.readVideo(this.origin), await ctx.detector.classify())
    );
    if (recovery === "failed") {
      ctx.stats.complete("recovery_failed");
      return "done";
    }
    if (recovery !== "progressing") return "continue";

    ctx.events.video(describeTarget(video));

    if (video.isAd && config.skipAds) {
      ctx.stats.increment("ads_skipped");
      ctx.log.debug({ author: video.author }, "Skipping sponsored video");
      await this.next(ctx);
      return "continue";
    }

    // Filtered videos are still watched and count toward maxVideos.
    await ctx.pacing.dwell(config.minWatchTime, config.maxWatchTime);
    ctx.stats.increment("videos_watched");

    const skip = await engine.screenTarget(video);
    if (skip) {
      ctx.stats.increment("videos_skipped");
      ctx.log.debug({ author: video.author, reason: skip }, "Skipping video");
      await this.next(ctx);
      return "continue";
    }

    const outcome = await engine.execute(video, new VideoSurface(ctx.device, ctx.clock, video));
    ctx.events.stats(ctx.stats.toJSON());

    const reason = capReason(outcome.capBlocked);
    if (reason) {
      ctx.log.info({ reason }, "Session cap reached");
      ctx.stats.complete(reason);
      return "done";
    }

    await this.next(ctx);
    return "continue";
  }

  /**
   * Clears whatever covers the player. Returns true when the player (or feed)
   * is showing afterwards.
   */
  private async onPlayer(ctx: WorkflowContext, config: TConfig, engine: ActionEngine): Promise<boolean> {
    if (await ctx.device.isPresent(locator("comment.sheet_open"), 300)) {
      ctx.log.debug("Closing comments sheet");
      if (!(await ctx.device.tryClick(locator("comment.close_button"), 1000))) {
        await ctx.device.back();
      }
    }

    if (await ctx.device.isPresent(locator("suggestion.page_indicator"), 300)) {
      await this.handleSuggestions(ctx, config, engine);
    }

    const state = await ctx.detector.classify();
    if (state === "feed" || state === "video_player") return true;

    await ctx.popups.dismissAll();
    const after = await ctx.detector.classify();
    return after === "feed" || after === "video_player";
  }

  private async handleSuggestions(ctx: WorkflowContext, config: TConfig, engine: ActionEngine): Promise<void> {
    ctx.stats.increment("suggestions_handled");

    if (config.followBackSuggestions && !engine.capReached("follow")) {
      if (await ctx.device.tryClick(locator("suggestion.follow_back"), 1000)) {
        ctx.stats.increment("users_followed");
        ctx.pacing.noteAction();
        ctx.events.action({ action: "follow", target: "suggestion", success: true });
        await ctx.pacing.humanDelay();
        return;
      }
    }

    if (await ctx.device.tryClick(locator("suggestion.not_interested"), 1000)) return;
    if (await ctx.device.tryClick(locator("suggestion.close"), 1000)) return;
    await ctx.device.nextVideo();
  }

  private async next(ctx: WorkflowContext): Promise<void> {
    await ctx.device.nextVideo();
    await ctx.pacing.humanDelay();
  }
}
