import { systemClock } from "../../core/clock";
import { errorMessage } from "../../core/errors";
import { logger } from "../../core/logger";
import { attempt } from "../../core/result";
import type { CommonRunConfig, CompletionReason, SessionStatus, WorkflowType } from "../../domain/models";
import { createWorkflowContext, type WorkflowContext, type WorkflowDependencies } from "../context";
import { SafeEvents } from "../events";
import { SessionControl } from "../session-control";
import { WorkflowStats, type WorkflowStatsSnapshot } from "../stats";

const FAILED_REASONS: ReadonlySet<CompletionReason> = new Set(["error", "recovery_failed", "navigation_failed"]);

export function sessionStatusFor(reason: CompletionReason | null): SessionStatus {
  if (reason === "stopped_by_user") return "stopped";
  if (reason === null || FAILED_REASONS.has(reason)) return "failed";
  return "completed";
}

/** Outcome of one loop iteration. */
export type Step = "continue" | "done";

/**
 * Run lifecycle shared by every workflow: config parsing, session records,
 * the loop-boundary error policy and the control surface. `run()` never
 * throws; whatever happens it resolves to the run's stats.
 */
export abstract class BaseWorkflow<TConfig extends CommonRunConfig, TInput> {
  protected readonly control: SessionControl;
  private loopErrors = 0;

  constructor(
    protected deps: WorkflowDependencies,
    readonly type: WorkflowType
  ) {
    this.control = new SessionControl(deps.clock ?? systemClock);
  }

  protected abstract parse(input: TInput): TConfig;
  protected abstract scope(config: TConfig): string | null;
  protected abstract execute(ctx: WorkflowContext, config: TConfig): Promise<void>;

  stop(): void {
    this.control.stop();
  }

  pause(): void {
    this.control.pause();
  }

  resume(): void {
    this.control.resume();
  }

  get isRunning(): boolean {
    return this.control.isRunning;
  }

  async run(input: TInput): Promise<WorkflowStatsSnapshot> {
    let config: TConfig;
    try {
      config = this.parse(input);
    } catch (error) {
      const log = this.deps.logger ?? logger;
      log.error({ workflow: this.type, error: errorMessage(error) }, "Invalid workflow configuration");
      const stats = new WorkflowStats(this.deps.clock ?? systemClock);
      stats.increment("errors");
      stats.complete("error");
      const snapshot = stats.toJSON();
      new SafeEvents(this.deps.events ?? {}, log).stats(snapshot);
      return snapshot;
    }

    const ctx = createWorkflowContext(this.deps, this.type, config);
    this.loopErrors = 0;
    this.control.begin();
    ctx.log.info({ scope: this.scope(config) }, "Workflow started");

    const sessionId = await this.openSession(ctx, config);
    ctx.ledger.bindSession(sessionId);

    let failureMessage: string | null = null;
    try {
      await this.execute(ctx, config);
    } catch (error) {
      failureMessage = errorMessage(error);
      ctx.stats.increment("errors");
      ctx.log.error({ error: failureMessage }, "Workflow aborted");
      ctx.stats.complete("error");
    }

    if (!ctx.stats.isComplete) {
      ctx.stats.complete(this.control.shouldStop ? "stopped_by_user" : "no_more_targets");
    }
    this.control.end();

    const snapshot = ctx.stats.toJSON();
    await this.closeSession(ctx, sessionId, snapshot, failureMessage);
    ctx.events.stats(snapshot);
    ctx.log.info({ stats: snapshot }, "Workflow finished");
    return snapshot;
  }

  /**
   * Loop boundary. Errors thrown by one iteration are logged and counted;
   * the run aborts with "error" once they exceed `maxErrors`.
   */
  protected async iterate(ctx: WorkflowContext, config: TConfig, body: () => Promise<Step>): Promise<Step> {
    try {
      return await body();
    } catch (error) {
      this.loopErrors++;
      ctx.stats.increment("errors");
      ctx.log.error({ error: errorMessage(error), loopErrors: this.loopErrors }, "Iteration failed");
      if (this.loopErrors > config.maxErrors) {
        ctx.stats.complete("error");
        return "done";
      }
      return "continue";
    }
  }

  /** Honors pause and stop at a loop boundary. Returns false when the run must end. */
  protected async proceed(ctx: WorkflowContext): Promise<boolean> {
    if (await this.control.checkpoint()) return true;
    ctx.stats.complete("stopped_by_user");
    return false;
  }

  /**
   * Reaches a checkpoint screen through `open`, escalating to the recovery
   * supervisor when the flow fails.
   */
  protected async reach(ctx: WorkflowContext, name: string, open: () => Promise<boolean>): Promise<boolean> {
    ctx.recovery.setCheckpoint({ name, restore: open });
    if (await open()) return true;

    ctx.log.warn({ checkpoint: name }, "Navigation failed, escalating to recovery");
    const outcome = await ctx.recovery.recover(open);
    if (outcome === "failed") {
      ctx.stats.complete("recovery_failed");
      return false;
    }
    return true;
  }

  private async openSession(ctx: WorkflowContext, config: TConfig): Promise<number | null> {
    const store = this.deps.sessions;
    if (!store) return null;

    const result = await attempt(() =>
      store.start({ accountId: ctx.accountId, workflowType: this.type, scope: this.scope(config), config })
    );
    if (result.ok) return result.value;
    ctx.log.warn({ error: result.error.message }, "Could not open session record");
    return null;
  }

  private async closeSession(
    ctx: WorkflowContext,
    sessionId: number | null,
    snapshot: WorkflowStatsSnapshot,
    failureMessage: string | null
  ): Promise<void> {
    const store = this.deps.sessions;
    if (!store || sessionId === null) return;

    const result = await attempt(() =>
      store.finish(sessionId, {
        status: sessionStatusFor(snapshot.completion_reason),
        completionReason: snapshot.completion_reason,
        stats: snapshot,
        errorMessage: failureMessage,
      })
    );
    if (!result.ok) {
      ctx.log.warn({ sessionId, error: result.error.message }, "Could not close session record");
    }
  }
}
