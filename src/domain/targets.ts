import type { PageState, TargetOrigin } from "./models";

export interface Bounds {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface Target {
  /** Lower-cased username; empty when the screen did not expose a valid one. */
  identifier: string;
  origin: TargetOrigin;
  statusLabel: string | null;
}

export interface VideoTarget extends Target {
  kind: "video";
  author: string;
  likeCountText: string;
  likeCount: number | null;
  description: string;
  isLiked: boolean;
  isFavorited: boolean;
  isAd: boolean;
}

export interface ProfileRowTarget extends Target {
  kind: "profile_row";
  displayName: string;
  bounds: Bounds | null;
  /** The row's follow-state button. */
  actionBounds: Bounds | null;
}

export type AnyTarget = VideoTarget | ProfileRowTarget;

export interface ScreenSignature {
  state: PageState;
  discriminator: string;
}

export function videoSignature(video: VideoTarget, state: PageState = "video_player"): ScreenSignature {
  return {
    state,
    discriminator: video.author ? `${video.author}_${video.likeCountText}` : "",
  };
}

/**
 * Fingerprint of a list screen: the first and last visible rows plus a
 * progress marker, so an unchanged list only repeats while nothing settles.
 */
export function listSignature(
  state: PageState,
  rows: readonly ProfileRowTarget[],
  progress: string | number
): ScreenSignature {
  const first = rows[0];
  const last = rows[rows.length - 1];
  if (!first || !last) return { state, discriminator: "" };
  return {
    state,
    discriminator: `${first.identifier || first.displayName}|${last.identifier || last.displayName}|${progress}`,
  };
}

export function sameSignature(a: ScreenSignature | null, b: ScreenSignature | null): boolean {
  if (!a || !b) return false;
  return a.state === b.state && a.discriminator === b.discriminator;
}

export function describeTarget(target: AnyTarget): Record<string, unknown> {
  if (target.kind === "video") {
    return {
      author: target.author,
      like_count: target.likeCountText,
      description: target.description,
      is_liked: target.isLiked,
      is_favorited: target.isFavorited,
      is_ad: target.isAd,
      origin: target.origin,
    };
  }
  return {
    username: target.identifier,
    display_name: target.displayName,
    status: target.statusLabel,
    origin: target.origin,
  };
}
