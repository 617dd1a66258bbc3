import type { Logger } from "../../core/logger";
import { locator } from "../../platforms/tiktok/selectors";
import type { DeviceSession } from "../../services/device-session";
import type { Navigator, NavigationStep } from "./navigator";
import type { TargetReader } from "./target-reader";

export interface ProfileListEntry {
  reached: boolean;
  username: string | null;
  followersTotal: number | null;
}

/** Composite flows built from Navigator steps. */
export class NavigationFlows {
  constructor(
    private navigator: Navigator,
    private device: DeviceSession,
    private reader: TargetReader,
    private log: Logger
  ) {}

  async ensureFeed(): Promise<boolean> {
    return this.navigator.goto("feed", [
      {
        name: "open-home",
        perform: () => this.device.tryClick(locator("nav.home_tab")),
        alternate: async () => (await this.device.back()) && this.device.tryClick(locator("nav.home_tab")),
        expected: null,
        maxRetries: 4,
      },
      {
        name: "select-for-you",
        perform: () => this.device.tryClick(locator("feed.for_you_tab")),
        expected: "feed",
      },
    ]);
  }

  /** Search, switch to Users, open the first account, then its followers list. */
  async openFollowersOf(query: string): Promise<ProfileListEntry> {
    const onProfile = await this.openProfile(query);
    if (!onProfile) return { reached: false, username: null, followersTotal: null };

    const username = await this.reader.readProfileUsername();
    const followersTotal = await this.reader.readFollowersTotal();

    const reached = await this.navigator.goto("followers_list", [this.counterStep("open-followers", "profile.followers_counter")]);
    this.log.info({ query, username, followersTotal, reached }, "Opened followers list");
    return { reached, username, followersTotal };
  }

  /** Search, switch to Users, open the first account, then the accounts it follows. */
  async openFollowingOf(query: string): Promise<ProfileListEntry> {
    const onProfile = await this.openProfile(query);
    if (!onProfile) return { reached: false, username: null, followersTotal: null };

    const username = await this.reader.readProfileUsername();
    const reached = await this.navigator.goto("followers_list", [this.counterStep("open-following", "profile.following_counter")]);
    return { reached, username, followersTotal: null };
  }

  async openOwnFollowing(): Promise<boolean> {
    return this.navigator.goto("followers_list", [
      {
        name: "open-own-profile",
        perform: () => this.device.tryClick(locator("nav.profile_tab")),
        alternate: async () => (await this.device.back()) && this.device.tryClick(locator("nav.profile_tab")),
        expected: "profile",
      },
      this.counterStep("open-following", "profile.following_counter"),
    ]);
  }

  async openProfileGridItem(index: number = 0): Promise<boolean> {
    return this.navigator.goto("video_player", [
      {
        name: "open-grid-item",
        perform: async () => {
          const items = await this.device.findAll(locator("profile.grid_item"));
          const item = items.ok ? items.value[index] : undefined;
          if (!item) return false;
          const tapped = await this.device.tap(
            (item.bounds.left + item.bounds.right) / 2,
            (item.bounds.top + item.bounds.bottom) / 2
          );
          return tapped.ok;
        },
        alternate: () => this.device.tryClick(locator("profile.grid_item")),
        expected: "video_player",
      },
    ]);
  }

  /** Search, switch to Videos and open the first result in the player. */
  async searchVideos(query: string): Promise<boolean> {
    if (!(await this.ensureFeed())) return false;
    return this.navigator.goto("video_player", [
      ...this.searchSteps(query),
      {
        name: "videos-tab",
        perform: () => this.device.tryClick(locator("search.videos_tab")),
        expected: "search_results",
      },
      {
        name: "first-video",
        perform: () => this.device.tryClick(locator("search.first_video_result")),
        expected: "video_player",
      },
    ]);
  }

  /** Search, switch to Users and open the first account. */
  async openProfile(query: string): Promise<boolean> {
    if (!(await this.ensureFeed())) return false;
    return this.navigator.goto("profile", [
      ...this.searchSteps(query),
      {
        name: "users-tab",
        perform: () => this.device.tryClick(locator("search.users_tab")),
        expected: "search_results",
      },
      {
        name: "first-user",
        perform: () => this.device.tryClick(locator("search.first_user_result")),
        expected: "profile",
      },
    ]);
  }

  private searchSteps(query: string): NavigationStep[] {
    return [
      {
        name: "open-search",
        perform: () => this.device.tryClick(locator("nav.search_button")),
        expected: null,
      },
      {
        name: "type-query",
        perform: () => this.device.typeInto(locator("search.input"), query),
        expected: null,
      },
      {
        name: "submit-query",
        perform: () => this.device.tryClick(locator("search.submit")),
        expected: "search_results",
      },
    ];
  }

  private counterStep(name: string, counter: "profile.followers_counter" | "profile.following_counter"): NavigationStep {
    return {
      name,
      perform: () => this.device.tryClick(locator(counter)),
      expected: "followers_list",
    };
  }
}
