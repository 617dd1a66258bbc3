import { describe, it, expect } from "vitest";
import { FollowersWorkflow } from "../../src/orchestration/workflows/followers-workflow";
import { ScraperWorkflow } from "../../src/orchestration/workflows/scraper-workflow";
import { UnfollowWorkflow } from "../../src/orchestration/workflows/unfollow-workflow";
import type { ActionEvent } from "../../src/orchestration/events";
import { FakeApp } from "../fakes/fake-app";
import { FAST_PACING, createHarness } from "../fakes/harness";

describe("Followers workflow", () => {
  it("should visit new followers, act on their posts and follow them", async () => {
    const h = createHarness();
    const app = new FakeApp(h.screen);
    app.addProfile({ username: "creator", followers: "2" });
    app.addProfile({ username: "alice", followers: "10", posts: 2 });
    app.rows = [
      { username: "alice", status: "Follow" },
      { username: "bob", status: "Friends" },
    ];

    const stats = await new FollowersWorkflow(h.deps).run({
      ...FAST_PACING,
      searchQuery: "creator",
      likeProbability: 1,
      followProbability: 1,
      favoriteProbability: 0,
      postsPerProfile: 1,
      maxFollowers: 2,
    });

    expect(stats.profiles_visited).toBe(1);
    expect(stats.followers_seen).toBe(2);
    expect(stats.already_friends).toBe(1);
    expect(stats.videos_watched).toBe(1);
    expect(stats.videos_liked).toBe(1);
    expect(stats.users_followed).toBe(1);
    expect(stats.completion_reason).toBe("no_more_targets");
    expect(h.screen.swipes).toHaveLength(5);
    expect(app.profile("alice").followed).toBe(true);
    expect(h.ledger.has("alice", "follow")).toBe(true);
    expect(h.sessions.started[0]?.scope).toBe("creator");

    expect(h.profiles.saved).toHaveLength(1);
    expect(h.profiles.saved[0]).toMatchObject({
      profile: { username: "alice", followersCount: 10, isEnriched: true },
      sessionId: 1,
    });
  });

  it("should like a story opened from the list and continue on the profile", async () => {
    const h = createHarness();
    const app = new FakeApp(h.screen);
    app.addProfile({ username: "creator", followers: "1" });
    app.addProfile({ username: "alice", story: true });
    app.rows = [{ username: "alice", status: "Follow" }];

    const stats = await new FollowersWorkflow(h.deps).run({
      ...FAST_PACING,
      searchQuery: "@Creator",
      likeProbability: 0,
      followProbability: 0,
      favoriteProbability: 0,
      storyLikeProbability: 1,
      postsPerProfile: 0,
      maxFollowers: 1,
    });

    expect(stats.stories_viewed).toBe(1);
    expect(stats.videos_liked).toBe(1);
    expect(stats.profiles_visited).toBe(1);
    expect(stats.completion_reason).toBe("max_profiles_reached");
    expect(h.screen.count("click:story.like_button")).toBe(1);
    expect(h.ledger.has("alice", "like")).toBe(true);
  });
});

describe("Followers workflow on an unresponsive list", () => {
  it("should restart the app and reopen the followers list when taps stop landing", async () => {
    const h = createHarness();
    const app = new FakeApp(h.screen);
    app.addProfile({ username: "creator", followers: "3" });
    app.rows = [
      { username: "alice", status: "Follow" },
      { username: "bob", status: "Follow" },
      { username: "carol", status: "Follow" },
    ];
    app.freezeNextList = true;

    const stats = await new FollowersWorkflow(h.deps).run({
      ...FAST_PACING,
      searchQuery: "creator",
      likeProbability: 0,
      followProbability: 0,
      favoriteProbability: 0,
      postsPerProfile: 0,
      maxFollowers: 3,
    });

    expect(stats.recoveries).toBe(1);
    expect(h.screen.count("restartApp")).toBe(1);
    expect(h.screen.typed.map((entry) => entry.text)).toEqual(["creator", "creator"]);
    expect(stats.errors).toBe(2);
    expect(stats.followers_seen).toBe(3);
    expect(stats.profiles_visited).toBe(1);
    expect(h.profiles.saved.map((entry) => entry.profile.username)).toEqual(["carol"]);
    expect(stats.completion_reason).toBe("no_more_targets");
  });
});

describe("Scraper workflow", () => {
  it("should escalate a list that cannot be opened to an app restart", async () => {
    const h = createHarness();
    const app = new FakeApp(h.screen);
    app.addProfile({ username: "creator" });
    app.rows = [{ username: "alice", status: "Follow" }];
    h.screen.frozen = true;

    const stats = await new ScraperWorkflow(h.deps).run({
      ...FAST_PACING,
      targetUsernames: ["creator"],
      maxScrollAttempts: 1,
      enrichProfiles: false,
    });

    expect(stats.recoveries).toBe(1);
    expect(h.screen.count("restartApp")).toBe(1);
    expect(stats.profiles_scraped).toBe(1);
    expect(stats.errors).toBe(0);
    expect(stats.completion_reason).toBe("no_more_targets");
  });


  it("should collect valid usernames from a target's followers and enrich them", async () => {
    const h = createHarness();
    const app = new FakeApp(h.screen);
    app.addProfile({ username: "creator" });
    app.addProfile({ username: "alice", displayName: "Alice A", followers: "10" });
    app.rows = [
      { username: "alice", status: "Follow" },
      { username: "bob", status: "Follow" },
      { username: "Not Valid", status: "Follow" },
    ];

    const stats = await new ScraperWorkflow(h.deps).run({
      ...FAST_PACING,
      targetUsernames: ["creator"],
      maxScrollAttempts: 2,
      maxProfilesToEnrich: 1,
    });

    expect(stats.profiles_scraped).toBe(2);
    expect(stats.profiles_enriched).toBe(1);
    expect(stats.completion_reason).toBe("no_more_targets");
    expect(h.screen.swipes).toHaveLength(3);
    expect(h.screen.typed.map((entry) => entry.text)).toEqual(["creator", "alice"]);

    expect(h.profiles.saved.map((entry) => entry.profile.username)).toEqual(["alice", "bob", "alice"]);
    expect(h.profiles.saved[2]?.profile).toMatchObject({
      username: "alice",
      displayName: "Alice A",
      followersCount: 10,
      isEnriched: true,
    });
  });

  it("should collect unique authors from hashtag videos", async () => {
    const h = createHarness();
    const app = new FakeApp(h.screen);
    app.hashtagAuthors = ["alice", "bob", "alice", "carol"];

    const stats = await new ScraperWorkflow(h.deps).run({
      ...FAST_PACING,
      scrapeType: "hashtag",
      hashtag: "#Cats",
      maxVideos: 3,
      enrichProfiles: false,
    });

    expect(stats.videos_watched).toBe(3);
    expect(stats.profiles_scraped).toBe(2);
    expect(stats.completion_reason).toBe("max_videos_reached");
    expect(h.screen.typed).toEqual([{ name: "search.input", text: "#Cats" }]);
    expect(h.sessions.started[0]?.scope).toBe("#cats");
    expect(h.profiles.saved.map((entry) => entry.profile.isEnriched)).toEqual([false, false]);
  });

  it("should reject a target run without usernames", async () => {
    const h = createHarness();

    const stats = await new ScraperWorkflow(h.deps).run({ scrapeType: "target" });

    expect(stats.completion_reason).toBe("error");
    expect(h.sessions.started).toEqual([]);
  });
});

describe("Unfollow workflow", () => {
  it("should unfollow followed accounts and leave friends alone", async () => {
    const h = createHarness();
    const app = new FakeApp(h.screen);
    app.rows = [
      { username: "alice", status: "Following" },
      { username: "bob", status: "Friends" },
      { username: "carol", status: "Follow back" },
    ];
    const actions: ActionEvent[] = [];

    const stats = await new UnfollowWorkflow({ ...h.deps, events: { onAction: (event) => actions.push(event) } }).run({
      ...FAST_PACING,
      maxScrollAttempts: 2,
    });

    expect(stats.unfollowed).toBe(1);
    expect(stats.already_friends).toBe(1);
    expect(stats.completion_reason).toBe("no_more_targets");
    expect(h.screen.swipes).toHaveLength(1);
    expect(app.rows[0]?.status).toBe("Follow");
    expect(actions).toEqual([{ action: "unfollow", target: "alice", success: true }]);
    expect(h.ledger.records.get("1|alice|unfollow")).toMatchObject({ success: true, sessionId: 1 });
  });

  it("should stop at the unfollow cap", async () => {
    const h = createHarness();
    const app = new FakeApp(h.screen);
    app.rows = [
      { username: "alice", status: "Following" },
      { username: "bob", status: "Following" },
    ];

    const stats = await new UnfollowWorkflow(h.deps).run({ ...FAST_PACING, maxUnfollows: 1 });

    expect(stats.unfollowed).toBe(1);
    expect(stats.completion_reason).toBe("max_unfollows_reached");
    expect(app.rows[1]?.status).toBe("Following");
  });
});
