import type { Clock } from "../../core/clock";
import type { Logger } from "../../core/logger";
import type { PageState } from "../../domain/models";
import { locator } from "../../platforms/tiktok/selectors";
import type { DeviceSession } from "../../services/device-session";
import type { PageDetector } from "./page-detector";
import type { PopupHandler } from "./popup-handler";

export interface NavigationStep {
  name: string;
  perform: () => Promise<boolean>;
  /** Used instead of `perform` on retries. */
  alternate?: () => Promise<boolean>;
  /** State confirming the step; null when the step's own result is enough. */
  expected: PageState | null;
  timeoutMs?: number;
  maxRetries?: number;
}

export interface NavigatorOptions {
  defaultTimeoutMs: number;
  pollIntervalMs: number;
  defaultMaxRetries: number;
}

export class Navigator {
  constructor(
    private device: DeviceSession,
    private detector: PageDetector,
    private popups: PopupHandler,
    private clock: Clock,
    private log: Logger,
    private options: NavigatorOptions
  ) {}

  /**
   * Runs `steps` in order until `target` is confirmed. A no-op when the
   * screen is already in `target`. On an exhausted step it dismisses popups,
   * presses back once and reports failure.
   */
  async goto(target: PageState, steps: readonly NavigationStep[]): Promise<boolean> {
    if (await this.detector.is(target)) return true;

    for (const step of steps) {
      if (!(await this.runStep(step))) {
        this.log.warn({ target, step: step.name }, "Navigation step failed");
        await this.fallback();
        return false;
      }
    }

    const last = steps[steps.length - 1];
    if (last && last.expected === target) return true;
    return this.waitFor(target, this.options.defaultTimeoutMs);
  }

  async waitFor(state: PageState, timeoutMs: number): Promise<boolean> {
    const deadline = this.clock.now() + timeoutMs;
    for (;;) {
      if (await this.detector.is(state)) return true;
      if (this.clock.now() >= deadline) return false;
      await this.clock.sleep(this.options.pollIntervalMs);
    }
  }

  /** Presses back (closing stories on the way) until `state` is reached. */
  async backTo(state: PageState, maxPresses: number = 5): Promise<boolean> {
    for (let press = 0; press < maxPresses; press++) {
      const current = await this.detector.classify();
      if (current === state) return true;

      if (current === "story" && (await this.device.tryClick(locator("story.close_button"), 1000))) {
        this.log.debug("Closed story while returning");
      } else {
        await this.device.back();
      }
      await this.clock.sleep(this.options.pollIntervalMs);
    }
    return this.detector.is(state);
  }

  async fallback(): Promise<void> {
    await this.popups.dismissAll();
    await this.device.back();
    await this.clock.sleep(this.options.pollIntervalMs);
  }

  private async runStep(step: NavigationStep): Promise<boolean> {
    const maxRetries = step.maxRetries ?? this.options.defaultMaxRetries;
    const timeoutMs = step.timeoutMs ?? this.options.defaultTimeoutMs;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const action = attempt > 0 && step.alternate ? step.alternate : step.perform;
      const performed = await action();

      if (performed) {
        if (step.expected === null) return true;
        if (await this.waitFor(step.expected, timeoutMs)) return true;
      } else {
        await this.clock.sleep(this.options.pollIntervalMs);
      }

      this.log.debug({ step: step.name, attempt: attempt + 1, maxRetries }, "Navigation step not confirmed");
    }
    return false;
  }
}
