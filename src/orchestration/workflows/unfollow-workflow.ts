import { UnfollowRunConfigSchema, parseRunConfig, type UnfollowRunConfig, type UnfollowRunInput } from "../../domain/models";
import { listSignature, type ProfileRowTarget } from "../../domain/targets";
import { locator } from "../../platforms/tiktok/selectors";
import type { WorkflowContext, WorkflowDependencies } from "../context";
import { BaseWorkflow, type Step } from "./base-workflow";

const UNFOLLOWABLE = new Set(["Following", "Friends"]);

export class UnfollowWorkflow extends BaseWorkflow<UnfollowRunConfig, UnfollowRunInput> {
  constructor(deps: WorkflowDependencies) {
    super(deps, "unfollow");
  }

  protected parse(input: UnfollowRunInput): UnfollowRunConfig {
    return parseRunConfig(UnfollowRunConfigSchema, input);
  }

  protected scope(): string {
    return "own_following";
  }

  protected async execute(ctx: WorkflowContext, config: UnfollowRunConfig): Promise<void> {
    const open = () => ctx.flows.openOwnFollowing();
    if (!(await this.reach(ctx, "own_following", open))) return;

    const processed = new Set<string>();
    let fruitless = 0;

    while (await this.proceed(ctx)) {
      if (ctx.stats.get("unfollowed") >= config.maxUnfollows) {
        ctx.stats.complete("max_unfollows_reached");
        break;
      }

      const step = await this.iterate(ctx, config, async (): Promise<Step> => {
        if (!(await ctx.navigator.backTo("followers_list", 3)) && !(await this.reach(ctx, "own_following", open))) {
          return "done";
        }

        // Unchanged rows only repeat while nothing was unfollowed, skipped or scrolled.
        const progress = () => `${ctx.stats.get("unfollowed") + ctx.stats.get("already_friends")}:${fruitless}`;
        const rows = await ctx.reader.readRows("following_list");
        const recovery = await ctx.recovery.check(listSignature("followers_list", rows, progress()), async () =>
          listSignature(await ctx.detector.classify(), await ctx.reader.readRows("following_list"), progress())
        );
        if (recovery === "failed") {
          ctx.stats.complete("recovery_failed");
          return "done";
        }
        if (recovery !== "progressing") return "continue";

        const row = this.nextCandidate(ctx, config, rows, processed);
        if (!row) {
          fruitless++;
          if (fruitless >= config.maxScrollAttempts) {
            ctx.stats.complete("no_more_targets");
            return "done";
          }
          await ctx.device.scrollList();
          await ctx.clock.sleep(1000);
          return "continue";
        }

        fruitless = 0;
        processed.add(row.identifier);
        await this.unfollow(ctx, row);
        return "continue";
      });
      if (step === "done" || ctx.stats.isComplete) break;

      await ctx.pacing.maybePause();
    }
  }

  private nextCandidate(
    ctx: WorkflowContext,
    config: UnfollowRunConfig,
    rows: readonly ProfileRowTarget[],
    processed: Set<string>
  ): ProfileRowTarget | null {
    for (const row of rows) {
      if (!row.identifier || processed.has(row.identifier)) continue;
      if (!row.statusLabel || !UNFOLLOWABLE.has(row.statusLabel)) continue;

      if (row.statusLabel === "Friends" && !config.includeFriends) {
        processed.add(row.identifier);
        ctx.stats.increment("already_friends");
        continue;
      }
      return row;
    }
    return null;
  }

  private async unfollow(ctx: WorkflowContext, row: ProfileRowTarget): Promise<void> {
    const button = row.actionBounds;
    let success = false;

    if (button) {
      const tapped = await ctx.device.tap((button.left + button.right) / 2, (button.top + button.bottom) / 2);
      if (tapped.ok) {
        await ctx.clock.sleep(800);
        if (await ctx.device.isPresent(locator("followers.unfollow_confirm"), 1500)) {
          success = await ctx.device.tryClick(locator("followers.unfollow_confirm"), 1500);
        } else {
          success = true;
        }
      }
    }

    if (success) {
      ctx.stats.increment("unfollowed");
      ctx.pacing.noteAction();
      ctx.log.info({ username: row.identifier, total: ctx.stats.get("unfollowed") }, "Unfollowed");
    } else {
      ctx.log.warn({ username: row.identifier }, "Unfollow did not go through");
    }

    await ctx.ledger.record(row.identifier, "unfollow", success);
    ctx.events.action({ action: "unfollow", target: row.identifier, success });
    ctx.events.stats(ctx.stats.toJSON());
    await ctx.pacing.humanDelay();
  }
}
