import type { Logger } from "../core/logger";
import { errorMessage } from "../core/errors";
import type { InteractionKind, ScrapedProfile } from "../domain/models";
import type { WorkflowStatsSnapshot } from "./stats";

export interface ActionEvent {
  action: InteractionKind;
  target: string;
  success: boolean;
}

/** Consumer callbacks. All are optional and fire-and-forget. */
export interface WorkflowEvents {
  onStats?: (stats: WorkflowStatsSnapshot) => void;
  onAction?: (event: ActionEvent) => void;
  onPause?: (seconds: number) => void;
  onVideo?: (video: Record<string, unknown>) => void;
  onProfile?: (profile: ScrapedProfile) => void;
}

/**
 * Wraps consumer callbacks so that an exception thrown inside one is logged
 * and dropped instead of reaching the workflow loop.
 */
export class SafeEvents {
  constructor(
    private handlers: WorkflowEvents,
    private log: Logger
  ) {}

  stats(snapshot: WorkflowStatsSnapshot): void {
    this.emit("onStats", () => this.handlers.onStats?.(snapshot));
  }

  action(event: ActionEvent): void {
    this.emit("onAction", () => this.handlers.onAction?.(event));
  }

  pause(seconds: number): void {
    this.emit("onPause", () => this.handlers.onPause?.(seconds));
  }

  video(video: Record<string, unknown>): void {
    this.emit("onVideo", () => this.handlers.onVideo?.(video));
  }

  profile(profile: ScrapedProfile): void {
    this.emit("onProfile", () => this.handlers.onProfile?.(profile));
  }

  private emit(name: keyof WorkflowEvents, invoke: () => void): void {
    try {
      invoke();
    } catch (error) {
      this.log.warn({ callback: name, error: errorMessage(error) }, "Event callback failed");
    }
  }
}
