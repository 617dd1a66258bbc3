import type { WorkflowDependencies } from "../../src/orchestration/context";
import type { SessionFinishInput, SessionStartInput, SessionStore, ProfileSink } from "../../src/domain/ports";
import type { ScrapedProfile } from "../../src/domain/models";
import { FakeClock } from "./fake-clock";
import { FakeScreen } from "./fake-screen";
import { MemoryLedger } from "./memory-ledger";

export class MemorySessionStore implements SessionStore {
  readonly started: Array<SessionStartInput & { id: number }> = [];
  readonly finished = new Map<number, SessionFinishInput>();
  private nextId = 1;

  constructor(private ledger?: MemoryLedger) {}

  async start(input: SessionStartInput): Promise<number> {
    const id = this.nextId++;
    this.started.push({ ...input, id });
    if (this.ledger && input.scope) this.ledger.sessionScopes.set(id, input.scope);
    return id;
  }

  async finish(sessionId: number, outcome: SessionFinishInput): Promise<void> {
    this.finished.set(sessionId, outcome);
  }
}

export class MemoryProfileSink implements ProfileSink {
  readonly saved: Array<{ profile: ScrapedProfile; sessionId: number | null }> = [];

  async saveProfile(profile: ScrapedProfile, sessionId: number | null): Promise<void> {
    this.saved.push({ profile, sessionId });
  }
}

export interface Harness {
  screen: FakeScreen;
  clock: FakeClock;
  ledger: MemoryLedger;
  sessions: MemorySessionStore;
  profiles: MemoryProfileSink;
  deps: WorkflowDependencies;
}

/** Wires fakes into workflow dependencies with short timings and a fixed draw. */
export function createHarness(draw: number = 0.5): Harness {
  const screen = new FakeScreen();
  const clock = new FakeClock();
  const ledger = new MemoryLedger(clock);
  const sessions = new MemorySessionStore(ledger);
  const profiles = new MemoryProfileSink();

  return {
    screen,
    clock,
    ledger,
    sessions,
    profiles,
    deps: {
      provider: screen,
      ledger,
      accountId: 1,
      sessions,
      profiles,
      clock,
      rng: () => draw,
      timings: {
        defaultTimeoutMs: 1000,
        pollIntervalMs: 100,
        probeTimeoutMs: 10,
        recoverySettleMs: 0,
        navigationRetries: 1,
      },
    },
  };
}

/** Zero delays and no pauses, so runs only sleep where the flow itself waits. */
export const FAST_PACING = {
  minDelay: 0,
  maxDelay: 0,
  minWatchTime: 0,
  maxWatchTime: 0,
  pauseAfterActions: 0,
} as const;
