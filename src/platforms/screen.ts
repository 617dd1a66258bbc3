import type { Bounds } from "../domain/targets";

/** A named group of alternative selectors; providers try each until one resolves. */
export interface LocatorSet {
  name: string;
  selectors: readonly string[];
}

export interface ScreenElement {
  text: string;
  bounds: Bounds;
}

export interface ScreenSize {
  width: number;
  height: number;
}

/**
 * Low-level device automation consumed by the engine. Implementations retry
 * internally across a locator's selectors and report a single outcome.
 * Any method may throw; errors carrying `fatal: true` end the current step
 * as unrecoverable.
 */
export interface ScreenStateProvider {
  exists(locator: LocatorSet, timeoutMs: number): Promise<boolean>;
  click(locator: LocatorSet, timeoutMs: number): Promise<boolean>;
  getText(locator: LocatorSet, timeoutMs: number): Promise<string | null>;
  findAll(locator: LocatorSet, timeoutMs: number): Promise<ScreenElement[]>;
  setText(locator: LocatorSet, text: string, timeoutMs: number): Promise<boolean>;
  tap(x: number, y: number): Promise<void>;
  swipe(x1: number, y1: number, x2: number, y2: number, durationMs: number): Promise<void>;
  pressBack(): Promise<void>;
  restartApp(): Promise<void>;
  screenSize(): Promise<ScreenSize>;
}
