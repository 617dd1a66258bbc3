import { errorMessage } from "../../core/errors";
import { normalizeUsername, toIdentifier } from "../../core/normalize";
import {
  ScrapeRunConfigSchema,
  ScrapedProfileSchema,
  parseRunConfig,
  type CompletionReason,
  type ScrapeRunConfig,
  type ScrapeRunInput,
  type ScrapedProfile,
} from "../../domain/models";
import { videoSignature } from "../../domain/targets";
import type { WorkflowContext, WorkflowDependencies } from "../context";
import { BaseWorkflow, type Step } from "./base-workflow";

interface ScrapeRun {
  config: ScrapeRunConfig;
  collected: Map<string, ScrapedProfile>;
  pending: CompletionReason | null;
}

export class ScraperWorkflow extends BaseWorkflow<ScrapeRunConfig, ScrapeRunInput> {
  constructor(deps: WorkflowDependencies) {
    super(deps, "scrape");
  }

  protected parse(input: ScrapeRunInput): ScrapeRunConfig {
    return parseRunConfig(ScrapeRunConfigSchema, input);
  }

  protected scope(config: ScrapeRunConfig): string {
    if (config.scrapeType === "hashtag") return `#${normalizeUsername(config.hashtag.replace(/^#/, ""))}`;
    return config.targetUsernames.map((name) => normalizeUsername(name)).join(",");
  }

  protected async execute(ctx: WorkflowContext, config: ScrapeRunConfig): Promise<void> {
    const run: ScrapeRun = { config, collected: new Map(), pending: null };

    if (config.scrapeType === "hashtag") {
      await this.collectFromHashtag(ctx, run);
    } else {
      await this.collectFromTargets(ctx, run);
    }
    if (ctx.stats.isComplete) return;

    if (config.enrichProfiles && !this.control.shouldStop) {
      await this.enrich(ctx, run);
    }
    if (ctx.stats.isComplete) return;

    ctx.stats.complete(this.control.shouldStop ? "stopped_by_user" : (run.pending ?? "no_more_targets"));
  }

  private full(run: ScrapeRun): boolean {
    return run.collected.size >= run.config.maxProfiles;
  }

  private async collectFromTargets(ctx: WorkflowContext, run: ScrapeRun): Promise<void> {
    const origin = run.config.targetScrapeType === "following" ? "following_list" : "followers_list";

    for (const target of run.config.targetUsernames) {
      if (!(await this.proceed(ctx))) return;
      if (this.full(run)) break;

      const open = async () => {
        const entry =
          run.config.targetScrapeType === "following"
            ? await ctx.flows.openFollowingOf(target)
            : await ctx.flows.openFollowersOf(target);
        return entry.reached;
      };
      if (!(await this.reach(ctx, `${origin}:${normalizeUsername(target)}`, open))) return;

      let fruitless = 0;
      while (fruitless < run.config.maxScrollAttempts && !this.full(run)) {
        if (!(await this.proceed(ctx))) return;

        const step = await this.iterate(ctx, run.config, async (): Promise<Step> => {
          const rows = await ctx.reader.readRows(origin);
          let added = 0;
          for (const row of rows) {
            if (!row.identifier || this.full(run)) continue;
            if (await this.collect(ctx, run, { username: row.identifier, displayName: row.displayName })) added++;
          }
          fruitless = added > 0 ? 0 : fruitless + 1;
          if (!this.full(run)) {
            await ctx.device.scrollList();
            await ctx.clock.sleep(1000);
          }
          return "continue";
        });
        if (step === "done") return;
      }

      ctx.log.info({ target, collected: run.collected.size }, "Finished collecting from target");
    }

    run.pending = this.full(run) ? "max_profiles_reached" : "no_more_targets";
  }

  private async collectFromHashtag(ctx: WorkflowContext, run: ScrapeRun): Promise<void> {
    const tag = run.config.hashtag.replace(/^#/, "").trim();
    if (!(await this.reach(ctx, `hashtag:${tag}`, () => ctx.flows.searchVideos(`#${tag}`)))) return;

    let seen = 0;
    while (seen < run.config.maxVideos && !this.full(run)) {
      if (!(await this.proceed(ctx))) return;

      const step = await this.iterate(ctx, run.config, async (): Promise<Step> => {
        const state = await ctx.detector.classify();
        const video = await ctx.reader.readVideo("hashtag");

        const recovery = await ctx.recovery.check(videoSignature(video, state), async () =>
          videoSignature(await ctx.reader.readVideo("hashtag"), await ctx.detector.classify())
        );
        if (recovery === "failed") {
          ctx.stats.complete("recovery_failed");
          return "done";
        }
        if (recovery !== "progressing") return "continue";

        seen++;
        ctx.stats.increment("videos_watched");
        const username = toIdentifier(video.author);
        if (username) {
          await this.collect(ctx, run, { username });
        }

        await ctx.device.nextVideo();
        await ctx.pacing.humanDelay();
        return "continue";
      });
      if (step === "done") return;
    }

    run.pending = this.full(run) ? "max_profiles_reached" : "max_videos_reached";
  }

  private async collect(
    ctx: WorkflowContext,
    run: ScrapeRun,
    partial: { username: string; displayName?: string }
  ): Promise<boolean> {
    if (run.collected.has(partial.username)) return false;

    const profile = ScrapedProfileSchema.parse(partial);
    run.collected.set(profile.username, profile);
    ctx.stats.increment("profiles_scraped");
    ctx.events.profile(profile);
    await this.save(ctx, profile);
    return true;
  }

  private async enrich(ctx: WorkflowContext, run: ScrapeRun): Promise<void> {
    const usernames = [...run.collected.keys()].slice(0, run.config.maxProfilesToEnrich);
    ctx.log.info({ count: usernames.length }, "Enriching profiles");

    for (const username of usernames) {
      if (!(await this.proceed(ctx))) return;

      const step = await this.iterate(ctx, run.config, async (): Promise<Step> => {
        if (!(await this.reach(ctx, `profile:${username}`, () => ctx.flows.openProfile(username)))) return "done";

        const profile = await ctx.reader.readProfile(username);
        if (profile.username !== username) {
          ctx.stats.increment("errors");
          ctx.log.warn({ username, shown: profile.username }, "Search opened a different profile");
          return "continue";
        }
        run.collected.set(username, profile);
        ctx.stats.increment("profiles_enriched");
        ctx.events.profile(profile);
        await this.save(ctx, profile);
        await ctx.pacing.humanDelay();
        return "continue";
      });
      if (step === "done") return;

      await ctx.pacing.maybePause();
    }
  }

  private async save(ctx: WorkflowContext, profile: ScrapedProfile): Promise<void> {
    const sink = ctx.profiles;
    if (!sink) return;
    try {
      await sink.saveProfile(profile, ctx.ledger.currentSessionId);
    } catch (error) {
      ctx.stats.increment("errors");
      ctx.log.warn({ username: profile.username, error: errorMessage(error) }, "Could not save profile");
    }
  }
}
