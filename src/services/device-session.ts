import type { Clock } from "../core/clock";
import type { Logger } from "../core/logger";
import { ScreenError } from "../core/errors";
import { attempt, err, failure, ok, type Result } from "../core/result";
import type { LocatorSet, ScreenElement, ScreenSize, ScreenStateProvider } from "../platforms/screen";

export interface DeviceSessionOptions {
  defaultTimeoutMs: number;
  transientRetries?: number;
  retryDelayMs?: number;
}

/**
 * Result-returning facade over a ScreenStateProvider. Every provider call is
 * classified here: a locator that does not resolve is `not_found`, a thrown
 * error is `transient` (retried a bounded number of times) unless it marks
 * itself fatal.
 */
export class DeviceSession {
  private size: ScreenSize | null = null;
  private readonly transientRetries: number;
  private readonly retryDelayMs: number;

  constructor(
    private provider: ScreenStateProvider,
    private clock: Clock,
    private log: Logger,
    private options: DeviceSessionOptions
  ) {
    this.transientRetries = options.transientRetries ?? 1;
    this.retryDelayMs = options.retryDelayMs ?? 500;
  }

  get defaultTimeoutMs(): number {
    return this.options.defaultTimeoutMs;
  }

  async exists(locator: LocatorSet, timeoutMs: number = this.defaultTimeoutMs): Promise<Result<boolean>> {
    return this.call(`exists:${locator.name}`, () => this.provider.exists(locator, timeoutMs));
  }

  async click(locator: LocatorSet, timeoutMs: number = this.defaultTimeoutMs): Promise<Result<void>> {
    const result = await this.call(`click:${locator.name}`, () => this.provider.click(locator, timeoutMs));
    if (!result.ok) return result;
    return result.value ? ok(undefined) : err(failure("not_found", `${locator.name} not found`));
  }

  async text(locator: LocatorSet, timeoutMs: number = this.defaultTimeoutMs): Promise<Result<string>> {
    const result = await this.call(`text:${locator.name}`, () => this.provider.getText(locator, timeoutMs));
    if (!result.ok) return result;
    const value = result.value?.trim();
    return value ? ok(value) : err(failure("not_found", `${locator.name} has no text`));
  }

  async findAll(locator: LocatorSet, timeoutMs: number = this.defaultTimeoutMs): Promise<Result<ScreenElement[]>> {
    return this.call(`findAll:${locator.name}`, () => this.provider.findAll(locator, timeoutMs));
  }

  async setText(locator: LocatorSet, text: string, timeoutMs: number = this.defaultTimeoutMs): Promise<Result<void>> {
    const result = await this.call(`setText:${locator.name}`, () => this.provider.setText(locator, text, timeoutMs));
    if (!result.ok) return result;
    return result.value ? ok(undefined) : err(failure("not_found", `${locator.name} not found`));
  }

  async tap(x: number, y: number): Promise<Result<void>> {
    return this.call("tap", () => this.provider.tap(Math.round(x), Math.round(y)));
  }

  async swipe(x1: number, y1: number, x2: number, y2: number, durationMs: number): Promise<Result<void>> {
    return this.call("swipe", () =>
      this.provider.swipe(Math.round(x1), Math.round(y1), Math.round(x2), Math.round(y2), durationMs)
    );
  }

  async pressBack(): Promise<Result<void>> {
    return this.call("pressBack", () => this.provider.pressBack());
  }

  async restartApp(): Promise<Result<void>> {
    return this.call("restartApp", () => this.provider.restartApp());
  }

  async screenSize(): Promise<Result<ScreenSize>> {
    if (this.size) return ok(this.size);
    const result = await this.call("screenSize", () => this.provider.screenSize());
    if (result.ok) this.size = result.value;
    return result;
  }

  /** Vertical swipe across the middle of the screen; `fraction` of the height, upwards when positive. */
  async swipeVertical(fraction: number, durationMs: number = 400): Promise<Result<void>> {
    const size = await this.screenSize();
    if (!size.ok) return size;
    const { width, height } = size.value;
    const x = width / 2;
    const travel = (height * fraction) / 2;
    return this.swipe(x, height / 2 + travel, x, height / 2 - travel, durationMs);
  }

  /** Next item in a full-screen video pager. */
  async nextVideo(): Promise<Result<void>> {
    return this.swipeVertical(0.5, 300);
  }

  /** Scrolls a list by roughly two thirds of a screen. */
  async scrollList(): Promise<Result<void>> {
    return this.swipeVertical(0.4, 600);
  }

  // Boolean views used by capabilities. Not-found and exhausted transient
  // failures read as "no"; fatal failures are raised to the loop boundary.

  async isPresent(locator: LocatorSet, timeoutMs: number = this.defaultTimeoutMs): Promise<boolean> {
    return this.orRaise(await this.exists(locator, timeoutMs), false);
  }

  async tryClick(locator: LocatorSet, timeoutMs: number = this.defaultTimeoutMs): Promise<boolean> {
    const result = await this.click(locator, timeoutMs);
    return this.orRaise(result.ok ? ok(true) : result, false);
  }

  async readText(locator: LocatorSet, timeoutMs: number = this.defaultTimeoutMs): Promise<string | null> {
    return this.orRaise<string | null>(await this.text(locator, timeoutMs), null);
  }

  async typeInto(locator: LocatorSet, text: string, timeoutMs: number = this.defaultTimeoutMs): Promise<boolean> {
    const result = await this.setText(locator, text, timeoutMs);
    return this.orRaise(result.ok ? ok(true) : result, false);
  }

  async back(): Promise<boolean> {
    const result = await this.pressBack();
    return this.orRaise(result.ok ? ok(true) : result, false);
  }

  private orRaise<T>(result: Result<T>, fallback: T): T {
    if (result.ok) return result.value;
    if (result.error.kind === "fatal") {
      throw new ScreenError(result.error.message, "SCREEN_FATAL");
    }
    return fallback;
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<Result<T>> {
    let result = await attempt(fn);
    for (let retry = 1; !result.ok && result.error.kind === "transient" && retry <= this.transientRetries; retry++) {
      this.log.debug({ operation, retry, error: result.error.message }, "Retrying screen call");
      await this.clock.sleep(this.retryDelayMs * retry);
      result = await attempt(fn);
    }
    if (!result.ok) {
      this.log.warn({ operation, kind: result.error.kind, error: result.error.message }, "Screen call failed");
    }
    return result;
  }
}
