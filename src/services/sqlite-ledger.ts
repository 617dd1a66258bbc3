import { systemClock, unixSeconds, type Clock } from "../core/clock";
import { PersistenceError } from "../core/errors";
import { toIdentifier } from "../core/normalize";
import type { InteractionKind } from "../domain/models";
import type { InteractionLedger } from "../domain/ports";
import { InteractionsRepository, interactionsRepo } from "../db/repositories/interactions.repo";

export class SqliteInteractionLedger implements InteractionLedger {
  constructor(
    private repo: InteractionsRepository = interactionsRepo,
    private clock: Pick<Clock, "now"> = systemClock
  ) {}

  async hasRecentInteraction(
    accountId: number,
    targetIdentifier: string,
    kind: InteractionKind | "any",
    windowHours: number
  ): Promise<boolean> {
    const identifier = this.identifier(targetIdentifier);
    return this.repo.existsSince(accountId, identifier, kind, this.cutoff(windowHours));
  }

  async recordInteraction(
    accountId: number,
    targetIdentifier: string,
    kind: InteractionKind,
    success: boolean,
    sessionId: number | null
  ): Promise<void> {
    await this.repo.upsert({
      accountId,
      targetIdentifier: this.identifier(targetIdentifier),
      kind,
      success,
      sessionId,
      at: unixSeconds(this.clock),
    });
  }

  async countInteractionsForScope(accountId: number, scope: string, windowHours: number): Promise<number> {
    return this.repo.countDistinctTargetsForScope(accountId, scope, this.cutoff(windowHours));
  }

  private cutoff(windowHours: number): number {
    return unixSeconds(this.clock) - Math.round(windowHours * 3600);
  }

  private identifier(raw: string): string {
    const identifier = toIdentifier(raw);
    if (!identifier) {
      throw new PersistenceError(`Invalid target identifier: ${raw}`, "INVALID_IDENTIFIER");
    }
    return identifier;
  }
}
