import type { Clock } from "../../core/clock";
import type { Logger } from "../../core/logger";
import { RecoveryError, errorMessage } from "../../core/errors";
import type { Rng } from "../../core/random";
import { attempt } from "../../core/result";
import { retryWithBackoff, type RetryOptions } from "../../core/retry";
import { validateTransition, type RecoveryPhase } from "../../domain/recovery-state-machine";
import { sameSignature, type ScreenSignature } from "../../domain/targets";
import type { DeviceSession } from "../../services/device-session";
import type { WorkflowStats } from "../stats";
import type { PopupHandler } from "./popup-handler";

export type RecoveryOutcome = "progressing" | "soft_recovered" | "hard_recovered" | "failed";

export interface RecoveryOptions {
  stuckThreshold: number;
  settleMs: number;
  restartRetry?: RetryOptions;
}

export interface Checkpoint {
  name: string;
  /** Re-navigates to the checkpoint after an app restart. */
  restore: () => Promise<boolean>;
}

const DEFAULT_RESTART_RETRY: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 2000,
  maxDelayMs: 8000,
  jitterMs: 500,
};

/**
 * Watches screen signatures for non-progress and escalates: popups and back
 * (soft), then an app restart followed by the checkpoint's re-navigation
 * (hard). A failed hard recovery is terminal for the run.
 */
export class RecoverySupervisor {
  private lastSignature: ScreenSignature | null = null;
  private repeatCount = 0;
  private phase: RecoveryPhase = "monitoring";
  private checkpoint: Checkpoint | null = null;

  constructor(
    private device: DeviceSession,
    private popups: PopupHandler,
    private clock: Clock,
    private rng: Rng,
    private stats: WorkflowStats,
    private log: Logger,
    private options: RecoveryOptions
  ) {}

  get currentPhase(): RecoveryPhase {
    return this.phase;
  }

  get repeats(): number {
    return this.repeatCount;
  }

  setCheckpoint(checkpoint: Checkpoint | null): void {
    this.checkpoint = checkpoint;
  }

  /**
   * Records a signature and reports whether the screen has now been identical
   * for `stuckThreshold` consecutive observations. Empty discriminators carry
   * no identity and reset the run.
   */
  observe(signature: ScreenSignature): boolean {
    if (!signature.discriminator) {
      this.reset(null);
      return false;
    }

    if (sameSignature(this.lastSignature, signature)) {
      this.repeatCount++;
    } else {
      this.lastSignature = signature;
      this.repeatCount = 1;
    }
    return this.repeatCount >= this.options.stuckThreshold;
  }

  /**
   * Observes `signature` and, when stuck, recovers. `readSignature` re-reads
   * the screen after the soft tier to tell whether it cleared the condition.
   */
  async check(signature: ScreenSignature, readSignature: () => Promise<ScreenSignature>): Promise<RecoveryOutcome> {
    if (!this.observe(signature)) return "progressing";

    this.log.warn({ state: signature.state, repeats: this.repeatCount }, "Screen not progressing");
    return this.recover(async () => !sameSignature(await readSignature(), signature));
  }

  /** Runs the soft tier, then the hard tier if `isCleared` still reports false. */
  async recover(isCleared: () => Promise<boolean>): Promise<RecoveryOutcome> {
    this.transition("soft_recovery");
    this.stats.increment("recoveries");
    await this.softRecover();

    if (await isCleared()) {
      this.log.info("Soft recovery cleared the screen");
      this.transition("monitoring");
      this.reset(null);
      return "soft_recovered";
    }

    this.transition("hard_recovery");
    if (await this.hardRecover()) {
      this.log.info({ checkpoint: this.checkpoint?.name ?? null }, "Hard recovery restored the checkpoint");
      this.transition("monitoring");
      this.reset(null);
      return "hard_recovered";
    }

    this.transition("failed");
    return "failed";
  }

  private async softRecover(): Promise<void> {
    await this.popups.closeSystemDialogs();
    await this.popups.closeInAppPopups();
    await this.device.back();
    await this.clock.sleep(1000);
  }

  private async hardRecover(): Promise<boolean> {
    try {
      await retryWithBackoff(
        async () => {
          const restarted = await this.device.restartApp();
          if (!restarted.ok) {
            throw new RecoveryError(restarted.error.message, "APP_RESTART_FAILED");
          }
        },
        this.options.restartRetry ?? DEFAULT_RESTART_RETRY,
        "restart-app",
        (ms) => this.clock.sleep(ms),
        this.rng
      );
    } catch (error) {
      this.log.error({ error: errorMessage(error) }, "App restart failed");
      return false;
    }

    await this.clock.sleep(this.options.settleMs);
    await this.popups.dismissAll();

    const checkpoint = this.checkpoint;
    if (!checkpoint) return true;

    const restored = await attempt(() => checkpoint.restore());
    if (!restored.ok || !restored.value) {
      this.log.error(
        { checkpoint: checkpoint.name, error: restored.ok ? null : restored.error.message },
        "Checkpoint re-navigation failed"
      );
      return false;
    }
    return true;
  }

  private transition(to: RecoveryPhase): void {
    validateTransition(this.phase, to);
    this.phase = to;
  }

  private reset(signature: ScreenSignature | null): void {
    this.lastSignature = signature;
    this.repeatCount = 0;
  }
}
