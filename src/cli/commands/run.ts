import type { Command } from "commander";
import { readFileSync } from "fs";
import type { z } from "zod";
import { env } from "../../core/config";
import { logger } from "../../core/logger";
import { errorMessage } from "../../core/errors";
import { closeDb } from "../../db/client";
import { accountsRepo } from "../../db/repositories/accounts.repo";
import {
  FeedRunConfigSchema,
  FollowersRunConfigSchema,
  ScrapeRunConfigSchema,
  SearchRunConfigSchema,
  UnfollowRunConfigSchema,
  parseRunConfig,
} from "../../domain/models";
import type { WorkflowDependencies } from "../../orchestration/context";
import type { WorkflowStatsSnapshot } from "../../orchestration/stats";
import { FeedWorkflow } from "../../orchestration/workflows/feed-workflow";
import { FollowersWorkflow } from "../../orchestration/workflows/followers-workflow";
import { ScraperWorkflow } from "../../orchestration/workflows/scraper-workflow";
import { SearchWorkflow } from "../../orchestration/workflows/search-workflow";
import { UnfollowWorkflow } from "../../orchestration/workflows/unfollow-workflow";
import { SqliteInteractionLedger } from "../../services/sqlite-ledger";
import { SqliteProfileSink } from "../../services/profile-sink";
import { SqliteSessionStore } from "../../services/session-store";
import { loadScreenStateProvider } from "../../services/provider-loader";

interface CommonOptions {
  account: string;
  config?: string;
  device?: string;
  seed?: string;
}

interface EngagementOptions extends CommonOptions {
  likeProbability?: number;
  followProbability?: number;
  maxLikes?: number;
  maxFollows?: number;
}

interface RunnableWorkflow<TInput> {
  run(input: TInput): Promise<WorkflowStatsSnapshot>;
  stop(): void;
}

const toInt = (value: string) => parseInt(value, 10);
const toFloat = (value: string) => parseFloat(value);
const toList = (value: string) =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readConfigFile(path: string | undefined): Record<string, unknown> {
  if (!path) return {};
  const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
  if (!isRecord(parsed)) {
    throw new Error(`${path} must contain a JSON object`);
  }
  return parsed;
}

function defined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function buildConfig<S extends z.ZodTypeAny>(schema: S, options: CommonOptions, overrides: Record<string, unknown>) {
  return parseRunConfig(schema, {
    ...readConfigFile(options.config),
    ...defined({ seed: options.seed, ...overrides }),
  });
}

function engagementOverrides(options: EngagementOptions): Record<string, unknown> {
  return {
    likeProbability: options.likeProbability,
    followProbability: options.followProbability,
    maxLikesPerSession: options.maxLikes,
    maxFollowsPerSession: options.maxFollows,
  };
}

async function buildDependencies(options: CommonOptions): Promise<WorkflowDependencies> {
  const accountId = parseInt(options.account, 10);
  const account = await accountsRepo.findById(accountId);
  if (!account) {
    throw new Error(`Account ${options.account} not found`);
  }

  const provider = await loadScreenStateProvider(env.SCREEN_PROVIDER_MODULE, {
    deviceSerial: options.device ?? account.deviceSerial,
  });

  return {
    provider,
    accountId: account.id,
    ledger: new SqliteInteractionLedger(),
    sessions: new SqliteSessionStore(),
    profiles: new SqliteProfileSink(),
    events: {
      onAction: (event) => logger.debug(event, "Action"),
      onPause: (seconds) => logger.info({ seconds }, "Taking a break"),
    },
  };
}

async function execute<TInput>(workflow: RunnableWorkflow<TInput>, input: TInput): Promise<void> {
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn({ signal }, "Stop requested, finishing current step");
    workflow.stop();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const stats = await workflow.run(input);
    console.log(JSON.stringify(stats, null, 2));
    if (stats.completion_reason === "error" || stats.completion_reason === "recovery_failed") {
      process.exitCode = 1;
    }
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

function withCommonOptions(cmd: Command): Command {
  return cmd
    .requiredOption("--account <id>", "Operator account ID")
    .option("--config <file>", "JSON file with run configuration")
    .option("--device <serial>", "Device serial (defaults to the account's)")
    .option("--seed <seed>", "Seed for the random source");
}

function withEngagementOptions(cmd: Command): Command {
  return withCommonOptions(cmd)
    .option("--like-probability <p>", "Probability of liking a target", toFloat)
    .option("--follow-probability <p>", "Probability of following a target", toFloat)
    .option("--max-likes <n>", "Session like cap", toInt)
    .option("--max-follows <n>", "Session follow cap", toInt);
}

async function guarded(task: () => Promise<void>): Promise<void> {
  try {
    await task();
  } catch (error) {
    logger.error({ error: errorMessage(error) }, "Run failed");
    process.exitCode = 1;
  } finally {
    closeDb();
  }
}

export const commands = (program: Command) => {
  const runCmd = program.command("run").description("Run an automation workflow on a device");

  withEngagementOptions(runCmd.command("feed").description("Watch and engage with the For You feed"))
    .option("--max-videos <n>", "Videos to watch", toInt)
    .option("--follow-back", "Follow back suggested accounts")
    .action((options: EngagementOptions & { maxVideos?: number; followBack?: boolean }) =>
      guarded(async () => {
        const config = buildConfig(FeedRunConfigSchema, options, {
          ...engagementOverrides(options),
          maxVideos: options.maxVideos,
          followBackSuggestions: options.followBack,
        });
        const deps = await buildDependencies(options);
        await execute(new FeedWorkflow(deps), config);
      })
    );

  withEngagementOptions(runCmd.command("search").description("Engage with videos found by a search query"))
    .requiredOption("--query <query>", "Search query or #hashtag")
    .option("--max-videos <n>", "Videos to watch", toInt)
    .action((options: EngagementOptions & { query: string; maxVideos?: number }) =>
      guarded(async () => {
        const config = buildConfig(SearchRunConfigSchema, options, {
          ...engagementOverrides(options),
          searchQuery: options.query,
          maxVideos: options.maxVideos,
        });
        const deps = await buildDependencies(options);
        await execute(new SearchWorkflow(deps), config);
      })
    );

  withEngagementOptions(runCmd.command("followers").description("Visit and engage with a target's followers"))
    .requiredOption("--target <username>", "Account whose followers are visited")
    .option("--max-followers <n>", "Profiles to visit", toInt)
    .option("--posts <n>", "Posts to watch per profile", toInt)
    .action((options: EngagementOptions & { target: string; maxFollowers?: number; posts?: number }) =>
      guarded(async () => {
        const config = buildConfig(FollowersRunConfigSchema, options, {
          ...engagementOverrides(options),
          searchQuery: options.target,
          maxFollowers: options.maxFollowers,
          postsPerProfile: options.posts,
        });
        const deps = await buildDependencies(options);
        await execute(new FollowersWorkflow(deps), config);
      })
    );

  withCommonOptions(runCmd.command("scrape").description("Collect profiles from follower lists or a hashtag"))
    .option("--targets <usernames>", "Comma-separated usernames whose lists are scraped", toList)
    .option("--following", "Scrape following lists instead of followers")
    .option("--hashtag <tag>", "Scrape authors of a hashtag's videos instead")
    .option("--max-profiles <n>", "Profiles to collect", toInt)
    .option("--no-enrich", "Skip visiting collected profiles")
    .action(
      (
        options: CommonOptions & {
          targets?: string[];
          following?: boolean;
          hashtag?: string;
          maxProfiles?: number;
          enrich: boolean;
        }
      ) =>
        guarded(async () => {
          const config = buildConfig(ScrapeRunConfigSchema, options, {
            scrapeType: options.hashtag ? "hashtag" : options.targets ? "target" : undefined,
            targetUsernames: options.targets,
            targetScrapeType: options.following ? "following" : undefined,
            hashtag: options.hashtag,
            maxProfiles: options.maxProfiles,
            enrichProfiles: options.enrich ? undefined : false,
          });
          const deps = await buildDependencies(options);
          await execute(new ScraperWorkflow(deps), config);
        })
    );

  withCommonOptions(runCmd.command("unfollow").description("Unfollow accounts from the operator's following list"))
    .option("--max-unfollows <n>", "Accounts to unfollow", toInt)
    .option("--include-friends", "Also unfollow mutual follows")
    .action((options: CommonOptions & { maxUnfollows?: number; includeFriends?: boolean }) =>
      guarded(async () => {
        const config = buildConfig(UnfollowRunConfigSchema, options, {
          maxUnfollows: options.maxUnfollows,
          includeFriends: options.includeFriends,
        });
        const deps = await buildDependencies(options);
        await execute(new UnfollowWorkflow(deps), config);
      })
    );
};
