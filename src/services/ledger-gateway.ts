import type { Logger } from "../core/logger";
import { attempt } from "../core/result";
import type { InteractionKind } from "../domain/models";
import type { InteractionLedger } from "../domain/ports";
import type { WorkflowStats } from "../orchestration/stats";

/**
 * Binds an InteractionLedger to one account and run. Ledger failures never
 * escape: lookups degrade to "not interacted", counts to zero, and every
 * failure is added to the run's error counter.
 */
export class LedgerGateway {
  private sessionId: number | null = null;

  constructor(
    private ledger: InteractionLedger,
    private accountId: number,
    private stats: WorkflowStats,
    private log: Logger
  ) {}

  bindSession(sessionId: number | null): void {
    this.sessionId = sessionId;
  }

  get currentSessionId(): number | null {
    return this.sessionId;
  }

  async hasRecent(targetIdentifier: string, kind: InteractionKind | "any", windowHours: number): Promise<boolean> {
    const result = await attempt(() =>
      this.ledger.hasRecentInteraction(this.accountId, targetIdentifier, kind, windowHours)
    );
    if (result.ok) return result.value;

    this.stats.increment("errors");
    this.log.warn({ target: targetIdentifier, kind, error: result.error.message }, "Ledger lookup failed, treating as new");
    return false;
  }

  async record(targetIdentifier: string, kind: InteractionKind, success: boolean): Promise<boolean> {
    const result = await attempt(() =>
      this.ledger.recordInteraction(this.accountId, targetIdentifier, kind, success, this.sessionId)
    );
    if (result.ok) return true;

    this.stats.increment("errors");
    this.log.warn({ target: targetIdentifier, kind, error: result.error.message }, "Ledger write failed");
    return false;
  }

  async countForScope(scope: string, windowHours: number): Promise<number> {
    const result = await attempt(() => this.ledger.countInteractionsForScope(this.accountId, scope, windowHours));
    if (result.ok) return result.value;

    this.stats.increment("errors");
    this.log.warn({ scope, error: result.error.message }, "Ledger scope count failed");
    return 0;
  }
}
