import { SearchRunConfigSchema, parseRunConfig, type SearchRunConfig, type SearchRunInput } from "../../domain/models";
import type { WorkflowContext, WorkflowDependencies } from "../context";
import { VideoLoopWorkflow } from "./video-loop";

export class SearchWorkflow extends VideoLoopWorkflow<SearchRunConfig, SearchRunInput> {
  protected readonly origin = "search";

  constructor(deps: WorkflowDependencies) {
    super(deps, "search");
  }

  protected parse(input: SearchRunInput): SearchRunConfig {
    return parseRunConfig(SearchRunConfigSchema, input);
  }

  protected scope(config: SearchRunConfig): string | null {
    return `search:${config.searchQuery.toLowerCase()}`;
  }

  protected enter(ctx: WorkflowContext, config: SearchRunConfig): Promise<boolean> {
    return ctx.flows.searchVideos(config.searchQuery);
  }
}
