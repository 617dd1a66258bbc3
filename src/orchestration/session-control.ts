import type { Clock } from "../core/clock";

/**
 * Cooperative run control. `stop()` is observed at loop boundaries;
 * `pause()` holds the loop at the next boundary until `resume()` or `stop()`.
 */
export class SessionControl {
  private running = false;
  private paused = false;
  private stopRequested = false;

  constructor(
    private clock: Clock,
    private pollIntervalMs: number = 250
  ) {}

  begin(): void {
    this.running = true;
    this.paused = false;
    this.stopRequested = false;
  }

  end(): void {
    this.running = false;
    this.paused = false;
  }

  stop(): void {
    this.stopRequested = true;
    this.paused = false;
  }

  pause(): void {
    if (this.running) this.paused = true;
  }

  resume(): void {
    this.paused = false;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  get shouldStop(): boolean {
    return this.stopRequested;
  }

  /** Waits out a pause. Resolves to false when a stop was requested. */
  async checkpoint(): Promise<boolean> {
    while (this.paused && !this.stopRequested) {
      await this.clock.sleep(this.pollIntervalMs);
    }
    return !this.stopRequested;
  }
}
