import { FeedRunConfigSchema, parseRunConfig, type FeedRunConfig, type FeedRunInput } from "../../domain/models";
import type { WorkflowContext, WorkflowDependencies } from "../context";
import { VideoLoopWorkflow } from "./video-loop";

export class FeedWorkflow extends VideoLoopWorkflow<FeedRunConfig, FeedRunInput> {
  protected readonly origin = "feed";

  constructor(deps: WorkflowDependencies) {
    super(deps, "feed");
  }

  protected parse(input: FeedRunInput): FeedRunConfig {
    return parseRunConfig(FeedRunConfigSchema, input);
  }

  protected scope(): string | null {
    return "for_you";
  }

  protected enter(ctx: WorkflowContext): Promise<boolean> {
    return ctx.flows.ensureFeed();
  }
}
