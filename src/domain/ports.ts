import type { InteractionKind, ScrapedProfile, SessionStatus, WorkflowType, CompletionReason } from "./models";

/**
 * Durable at-most-once store of interactions, keyed by
 * (account, target identifier, kind). Implementations may throw; the engine
 * wraps every call and degrades on failure.
 */
export interface InteractionLedger {
  hasRecentInteraction(
    accountId: number,
    targetIdentifier: string,
    kind: InteractionKind | "any",
    windowHours: number
  ): Promise<boolean>;

  /** Idempotent: repeated calls for the same key leave exactly one record. */
  recordInteraction(
    accountId: number,
    targetIdentifier: string,
    kind: InteractionKind,
    success: boolean,
    sessionId: number | null
  ): Promise<void>;

  /** Distinct targets interacted with in sessions whose scope matches. */
  countInteractionsForScope(accountId: number, scope: string, windowHours: number): Promise<number>;
}

export interface SessionStartInput {
  accountId: number;
  workflowType: WorkflowType;
  scope: string | null;
  config: unknown;
}

export interface SessionFinishInput {
  status: SessionStatus;
  completionReason: CompletionReason | null;
  stats: Record<string, unknown>;
  errorMessage?: string | null;
}

export interface SessionStore {
  start(input: SessionStartInput): Promise<number>;
  finish(sessionId: number, outcome: SessionFinishInput): Promise<void>;
}

export interface ProfileSink {
  saveProfile(profile: ScrapedProfile, sessionId: number | null): Promise<void>;
}
