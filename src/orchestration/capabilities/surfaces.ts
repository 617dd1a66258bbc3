import type { Clock } from "../../core/clock";
import type { ActionKind } from "../../domain/models";
import type { VideoTarget } from "../../domain/targets";
import { locator } from "../../platforms/tiktok/selectors";
import type { DeviceSession } from "../../services/device-session";
import type { ActionSurface } from "./action-engine";

/** Actions on the video currently shown in the player. */
export class VideoSurface implements ActionSurface {
  constructor(
    private device: DeviceSession,
    private clock: Clock,
    private video: VideoTarget
  ) {}

  async isInState(kind: ActionKind): Promise<boolean> {
    switch (kind) {
      case "like":
        return this.video.isLiked;
      case "favorite":
        return this.video.isFavorited;
      case "follow":
        return !(await this.device.isPresent(locator("video.follow_button"), 500));
      default:
        return false;
    }
  }

  async perform(kind: ActionKind, context: { commentText: string | null }): Promise<boolean> {
    switch (kind) {
      case "like":
        return this.device.tryClick(locator("video.like_button"), 2000);
      case "follow":
        return this.device.tryClick(locator("video.follow_button"), 2000);
      case "favorite":
        return this.device.tryClick(locator("video.favorite_button"), 2000);
      case "comment":
        return context.commentText !== null && this.comment(context.commentText);
      case "share":
        return this.share();
    }
  }

  private async comment(text: string): Promise<boolean> {
    if (!(await this.device.tryClick(locator("video.comment_button"), 2000))) return false;
    await this.clock.sleep(1000);

    const posted =
      (await this.device.typeInto(locator("comment.input"), text, 3000)) &&
      (await this.device.tryClick(locator("comment.send_button"), 2000));

    await this.clock.sleep(500);
    if (!(await this.device.tryClick(locator("comment.close_button"), 1000))) {
      await this.device.back();
    }
    return posted;
  }

  private async share(): Promise<boolean> {
    if (!(await this.device.tryClick(locator("video.share_button"), 2000))) return false;
    await this.clock.sleep(800);

    const copied = await this.device.tryClick(locator("share.copy_link"), 2000);
    if (!copied) {
      await this.device.back();
    }
    return copied;
  }
}

/** Follow decision taken on an open profile page. */
export class ProfileSurface implements ActionSurface {
  constructor(private device: DeviceSession) {}

  async isInState(kind: ActionKind): Promise<boolean> {
    if (kind !== "follow") return false;
    return !(await this.device.isPresent(locator("profile.follow_button"), 500));
  }

  async perform(kind: ActionKind): Promise<boolean> {
    if (kind !== "follow") return false;
    return this.device.tryClick(locator("profile.follow_button"), 2000);
  }
}
