import type { Clock } from "../../core/clock";
import type { Logger } from "../../core/logger";
import { uniform, type Rng } from "../../core/random";
import type { SafeEvents } from "../events";

export interface PacingSettings {
  minDelay: number;
  maxDelay: number;
  pauseAfterActions: number;
  pauseDurationMin: number;
  pauseDurationMax: number;
}

export class PacingController {
  private actionsSincePause = 0;

  constructor(
    private settings: PacingSettings,
    private clock: Clock,
    private rng: Rng,
    private events: SafeEvents,
    private log: Logger
  ) {}

  noteAction(): void {
    this.actionsSincePause++;
  }

  get pendingActions(): number {
    return this.actionsSincePause;
  }

  /**
   * Rests once `pauseAfterActions` actions have accumulated. The pause runs to
   * completion; a stop requested meanwhile is seen by the caller afterwards.
   */
  async maybePause(): Promise<number | null> {
    const threshold = this.settings.pauseAfterActions;
    if (threshold <= 0 || this.actionsSincePause < threshold) return null;

    const duration = uniform(this.rng, this.settings.pauseDurationMin, this.settings.pauseDurationMax);
    const seconds = Math.round(duration);
    this.log.info({ seconds, actions: this.actionsSincePause }, "Taking a pause");
    this.events.pause(seconds);

    await this.clock.sleep(duration * 1000);
    this.actionsSincePause = 0;
    return seconds;
  }

  async humanDelay(): Promise<void> {
    await this.clock.sleep(uniform(this.rng, this.settings.minDelay, this.settings.maxDelay) * 1000);
  }

  /** Sleeps a uniform number of seconds in [min, max] and returns it. */
  async dwell(minSeconds: number, maxSeconds: number): Promise<number> {
    const seconds = uniform(this.rng, minSeconds, maxSeconds);
    await this.clock.sleep(seconds * 1000);
    return seconds;
  }
}
