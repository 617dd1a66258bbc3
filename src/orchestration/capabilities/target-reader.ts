import { isValidUsername, normalizeUsername, parseCount, toIdentifier } from "../../core/normalize";
import type { ScrapedProfile, TargetOrigin } from "../../domain/models";
import type { ProfileRowTarget, VideoTarget } from "../../domain/targets";
import { locator } from "../../platforms/tiktok/selectors";
import { pairListRows, parseAuthor, parseCounterText } from "../../platforms/tiktok/parsers";
import type { DeviceSession } from "../../services/device-session";

/** Reads typed targets off the current screen. */
export class TargetReader {
  constructor(
    private device: DeviceSession,
    private probeTimeoutMs: number = 500
  ) {}

  async readVideo(origin: TargetOrigin): Promise<VideoTarget> {
    const author = parseAuthor(await this.device.readText(locator("video.author"), 1500));
    const likeCountText = (await this.device.readText(locator("video.like_count"), this.probeTimeoutMs)) ?? "";
    const description = (await this.device.readText(locator("video.description"), this.probeTimeoutMs)) ?? "";

    return {
      kind: "video",
      identifier: toIdentifier(author) ?? "",
      origin,
      statusLabel: null,
      author,
      likeCountText,
      likeCount: parseCount(likeCountText),
      description,
      isLiked: await this.device.isPresent(locator("video.liked_indicator"), this.probeTimeoutMs),
      isFavorited: await this.device.isPresent(locator("video.favorited_indicator"), this.probeTimeoutMs),
      isAd: await this.device.isPresent(locator("video.ad_label"), this.probeTimeoutMs),
    };
  }

  /** Rows of a followers/following list, top to bottom. */
  async readRows(origin: TargetOrigin): Promise<ProfileRowTarget[]> {
    const usernames = await this.device.findAll(locator("followers.row_username"), this.probeTimeoutMs);
    if (!usernames.ok) return [];
    const buttons = await this.device.findAll(locator("followers.row_button"), this.probeTimeoutMs);
    const names = await this.device.findAll(locator("followers.row_display_name"), this.probeTimeoutMs);

    return pairListRows(usernames.value, buttons.ok ? buttons.value : [], names.ok ? names.value : []).map((row) => ({
      kind: "profile_row",
      identifier: isValidUsername(row.username) ? row.username : "",
      origin,
      statusLabel: row.status,
      displayName: row.displayName,
      bounds: row.bounds,
      actionBounds: row.buttonBounds,
    }));
  }

  async readProfileUsername(): Promise<string | null> {
    return toIdentifier(await this.device.readText(locator("profile.username"), 1500));
  }

  async readFollowersTotal(): Promise<number | null> {
    return parseCounterText(await this.device.readText(locator("profile.followers_counter"), this.probeTimeoutMs));
  }

  async readProfile(fallbackUsername: string): Promise<ScrapedProfile> {
    const shown = await this.device.readText(locator("profile.username"), 1500);
    return {
      username: toIdentifier(shown) ?? normalizeUsername(fallbackUsername),
      displayName: (await this.device.readText(locator("profile.display_name"), this.probeTimeoutMs)) ?? "",
      followersCount: await this.readFollowersTotal(),
      followingCount: parseCounterText(await this.device.readText(locator("profile.following_counter"), this.probeTimeoutMs)),
      likesCount: parseCounterText(await this.device.readText(locator("profile.likes_counter"), this.probeTimeoutMs)),
      bio: (await this.device.readText(locator("profile.bio"), this.probeTimeoutMs)) ?? "",
      isPrivate: await this.device.isPresent(locator("profile.private_indicator"), this.probeTimeoutMs),
      isVerified: await this.device.isPresent(locator("profile.verified_badge"), this.probeTimeoutMs),
      isEnriched: true,
    };
  }

  async countGridItems(): Promise<number> {
    const items = await this.device.findAll(locator("profile.grid_item"), this.probeTimeoutMs);
    return items.ok ? items.value.length : 0;
  }
}
