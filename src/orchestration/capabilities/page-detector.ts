import type { PageState } from "../../domain/models";
import type { LocatorSet } from "../../platforms/screen";
import { locator, locators } from "../../platforms/tiktok/selectors";
import type { DeviceSession } from "../../services/device-session";

export interface DetectionRule {
  state: PageState;
  indicators: LocatorSet[];
  minMatches: number;
  /** Any present exclusion disqualifies the rule even when enough indicators matched. */
  excludes?: LocatorSet[];
}

// Evaluated top-down; the first satisfied rule wins.
export const DEFAULT_DETECTION_RULES: readonly DetectionRule[] = [
  {
    state: "inbox",
    indicators: locators("inbox.indicator", "inbox.new_followers"),
    minMatches: 1,
  },
  {
    state: "story",
    indicators: locators("story.close_button", "story.timestamp", "story.message_input", "story.progress_bar"),
    minMatches: 2,
  },
  {
    state: "followers_list",
    indicators: locators("followers.list_indicator"),
    minMatches: 1,
    excludes: [locator("profile.username")],
  },
  {
    state: "profile",
    indicators: locators("profile.username", "profile.followers_counter", "profile.following_counter", "profile.grid_item"),
    minMatches: 2,
    excludes: [locator("followers.list_indicator")],
  },
  {
    state: "search_results",
    indicators: locators("search.users_tab", "search.videos_tab", "search.results_indicator"),
    minMatches: 2,
  },
  {
    state: "feed",
    indicators: locators("feed.for_you_tab_selected", "video.page_indicator"),
    minMatches: 2,
  },
  {
    state: "video_player",
    indicators: locators("video.page_indicator", "video.like_button"),
    minMatches: 1,
  },
];

/** Classifies the current screen using existence checks only. */
export class PageDetector {
  constructor(
    private device: DeviceSession,
    private rules: readonly DetectionRule[] = DEFAULT_DETECTION_RULES,
    private probeTimeoutMs: number = 500
  ) {}

  async classify(): Promise<PageState> {
    for (const rule of this.rules) {
      if (await this.matches(rule)) return rule.state;
    }
    return "unknown";
  }

  async is(state: PageState): Promise<boolean> {
    return (await this.classify()) === state;
  }

  private async matches(rule: DetectionRule): Promise<boolean> {
    let matched = 0;
    for (const indicator of rule.indicators) {
      if (await this.device.isPresent(indicator, this.probeTimeoutMs)) {
        matched++;
        if (matched >= rule.minMatches) break;
      }
    }
    if (matched < rule.minMatches) return false;

    for (const exclusion of rule.excludes ?? []) {
      if (await this.device.isPresent(exclusion, this.probeTimeoutMs)) return false;
    }
    return true;
  }
}
