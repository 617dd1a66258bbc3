import { systemClock, unixSeconds, type Clock } from "../core/clock";
import { computeSnapshotHash } from "../core/hash";
import type { SessionFinishInput, SessionStartInput, SessionStore } from "../domain/ports";
import { SessionsRepository, sessionsRepo } from "../db/repositories/sessions.repo";

export class SqliteSessionStore implements SessionStore {
  constructor(
    private repo: SessionsRepository = sessionsRepo,
    private clock: Pick<Clock, "now"> = systemClock
  ) {}

  async start(input: SessionStartInput): Promise<number> {
    const configJson = JSON.stringify(input.config ?? {});
    const session = await this.repo.create({
      accountId: input.accountId,
      workflowType: input.workflowType,
      target: input.scope,
      status: "running",
      configJson,
      configHash: computeSnapshotHash(configJson),
      startedAt: unixSeconds(this.clock),
    });
    return session.id;
  }

  async finish(sessionId: number, outcome: SessionFinishInput): Promise<void> {
    await this.repo.update(sessionId, {
      status: outcome.status,
      completionReason: outcome.completionReason,
      statsJson: JSON.stringify(outcome.stats),
      errorMessage: outcome.errorMessage ?? null,
      endedAt: unixSeconds(this.clock),
    });
  }
}
