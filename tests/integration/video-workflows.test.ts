import { describe, it, expect } from "vitest";
import { FeedWorkflow } from "../../src/orchestration/workflows/feed-workflow";
import { SearchWorkflow } from "../../src/orchestration/workflows/search-workflow";
import type { ActionEvent } from "../../src/orchestration/events";
import type { WorkflowStatsSnapshot } from "../../src/orchestration/stats";
import { FakeApp } from "../fakes/fake-app";
import { FakeScreen } from "../fakes/fake-screen";
import { FAST_PACING, createHarness } from "../fakes/harness";

const NO_ACTIONS = { likeProbability: 0, followProbability: 0, favoriteProbability: 0 } as const;

describe("Feed workflow", () => {
  it("should stop on the like cap after liking once across two videos", async () => {
    const h = createHarness();
    new FakeApp(h.screen, ["alice", "bob", "carol"]);
    const actions: ActionEvent[] = [];

    const stats = await new FeedWorkflow({ ...h.deps, events: { onAction: (event) => actions.push(event) } }).run({
      ...FAST_PACING,
      ...NO_ACTIONS,
      likeProbability: 1,
      maxLikesPerSession: 1,
      maxVideos: 10,
    });

    expect(stats.videos_watched).toBe(2);
    expect(stats.videos_liked).toBe(1);
    expect(stats.completion_reason).toBe("max_likes_reached");
    expect(actions).toEqual([{ action: "like", target: "alice", success: true }]);
    expect(h.screen.count("click:video.like_button")).toBe(1);
    expect(h.ledger.records.get("1|alice|like")).toMatchObject({ success: true, sessionId: 1 });
  });

  it("should soft-recover once from a screen that stops changing", async () => {
    const h = createHarness();
    const app = new FakeApp(h.screen, ["alice", "bob"]);
    app.feedAdvances = false;
    app.onRootBack = () => {
      app.feedIndex = 1;
    };

    const stats = await new FeedWorkflow(h.deps).run({ ...FAST_PACING, ...NO_ACTIONS, maxVideos: 4, stuckThreshold: 3 });

    expect(stats.recoveries).toBe(1);
    expect(stats.videos_watched).toBe(4);
    expect(stats.completion_reason).toBe("max_videos_reached");
    expect(h.screen.count("pressBack")).toBe(1);
    expect(h.screen.count("restartApp")).toBe(0);
  });

  it("should keep running when the ledger fails and count the failures", async () => {
    const h = createHarness();
    new FakeApp(h.screen, ["alice", "bob", "carol", "dave"]);
    h.ledger.failWith = new Error("database is locked");

    const stats = await new FeedWorkflow(h.deps).run({
      ...FAST_PACING,
      ...NO_ACTIONS,
      likeProbability: 1,
      maxLikesPerSession: 10,
      maxVideos: 3,
    });

    expect(stats.videos_liked).toBe(3);
    expect(stats.errors).toBe(6);
    expect(stats.completion_reason).toBe("max_videos_reached");
    expect(h.sessions.finished.get(1)?.status).toBe("completed");
  });

  it("should skip sponsored videos without watching them", async () => {
    const h = createHarness();
    const app = new FakeApp(h.screen, ["sponsor", "bob"]);
    app.adIndexes.add(0);

    const stats = await new FeedWorkflow(h.deps).run({ ...FAST_PACING, ...NO_ACTIONS, maxVideos: 1 });

    expect(stats.ads_skipped).toBe(1);
    expect(stats.videos_watched).toBe(1);
    expect(stats.completion_reason).toBe("max_videos_reached");
  });

  it("should skip authors it interacted with recently", async () => {
    const h = createHarness();
    new FakeApp(h.screen, ["alice", "bob"]);
    await h.ledger.recordInteraction(1, "alice", "follow", true, null);

    const stats = await new FeedWorkflow(h.deps).run({ ...FAST_PACING, ...NO_ACTIONS, maxVideos: 1 });

    expect(stats.videos_skipped).toBe(1);
    expect(stats.videos_watched).toBe(1);
  });

  it("should reach maxVideos when every video is filtered out", async () => {
    const h = createHarness();
    new FakeApp(h.screen, Array.from({ length: 10 }, (_, index) => `creator${index}`));
    const seen: Array<Record<string, unknown>> = [];

    const stats = await new FeedWorkflow({ ...h.deps, events: { onVideo: (video) => seen.push(video) } }).run({
      ...FAST_PACING,
      ...NO_ACTIONS,
      likeProbability: 1,
      requiredHashtags: ["never"],
      maxVideos: 3,
    });

    expect(stats.videos_watched).toBe(3);
    expect(stats.videos_skipped).toBe(3);
    expect(stats.videos_liked).toBe(0);
    expect(stats.completion_reason).toBe("max_videos_reached");
    expect(seen.map((video) => video.author)).toEqual(["creator0", "creator1", "creator2"]);
    expect(h.screen.count("click:video.like_button")).toBe(0);
  });

  it("should keep running when only the comment cap is reached", async () => {
    const h = createHarness();
    new FakeApp(h.screen, ["alice", "bob", "carol"]);

    const stats = await new FeedWorkflow(h.deps).run({
      ...FAST_PACING,
      ...NO_ACTIONS,
      commentProbability: 1,
      commentTemplates: ["nice"],
      maxCommentsPerSession: 0,
      maxVideos: 2,
    });

    expect(stats.videos_watched).toBe(2);
    expect(stats.comments).toBe(0);
    expect(stats.completion_reason).toBe("max_videos_reached");
    expect(h.screen.count("click:video.comment_button")).toBe(0);
  });

  it("should end as stopped_by_user when stopped from a callback", async () => {
    const h = createHarness();
    new FakeApp(h.screen, ["alice", "bob", "carol"]);
    const workflow: FeedWorkflow = new FeedWorkflow({
      ...h.deps,
      events: { onAction: () => workflow.stop() },
    });

    const stats = await workflow.run({ ...FAST_PACING, ...NO_ACTIONS, likeProbability: 1, maxVideos: 10 });

    expect(stats.videos_watched).toBe(1);
    expect(stats.completion_reason).toBe("stopped_by_user");
    expect(h.sessions.finished.get(1)?.status).toBe("stopped");
    expect(workflow.isRunning).toBe(false);
  });

  it("should return error stats for an invalid configuration without touching the device", async () => {
    const h = createHarness();
    new FakeApp(h.screen);
    const emitted: WorkflowStatsSnapshot[] = [];

    const stats = await new FeedWorkflow({ ...h.deps, events: { onStats: (s) => emitted.push(s) } }).run({
      likeProbability: 2,
    });

    expect(stats.errors).toBe(1);
    expect(stats.completion_reason).toBe("error");
    expect(emitted).toEqual([stats]);
    expect(h.sessions.started).toEqual([]);
    expect(h.screen.calls).toEqual([]);
  });

  it("should fail with recovery_failed when the feed cannot be reached", async () => {
    const h = createHarness();
    const screen = new FakeScreen();

    const stats = await new FeedWorkflow({ ...h.deps, provider: screen }).run({ ...FAST_PACING, maxVideos: 3 });

    expect(stats.completion_reason).toBe("recovery_failed");
    expect(stats.recoveries).toBe(1);
    expect(screen.count("restartApp")).toBe(1);
    expect(h.sessions.finished.get(1)).toMatchObject({ status: "failed", completionReason: "recovery_failed" });
  });

  it("should abort with error once loop failures exceed maxErrors", async () => {
    const h = createHarness();
    new FakeApp(h.screen, ["alice", "bob"]);
    h.screen.errors.set("click:video.like_button", Object.assign(new Error("device gone"), { fatal: true }));

    const stats = await new FeedWorkflow(h.deps).run({
      ...FAST_PACING,
      ...NO_ACTIONS,
      likeProbability: 1,
      maxVideos: 10,
      maxErrors: 1,
    });

    expect(stats.errors).toBe(2);
    expect(stats.videos_watched).toBe(2);
    expect(stats.completion_reason).toBe("error");
    expect(h.sessions.finished.get(1)?.status).toBe("failed");
  });

  it("should open a session scoped to the For You feed", async () => {
    const h = createHarness();
    new FakeApp(h.screen, ["alice"]);

    await new FeedWorkflow(h.deps).run({ ...FAST_PACING, ...NO_ACTIONS, maxVideos: 1 });

    expect(h.sessions.started).toHaveLength(1);
    expect(h.sessions.started[0]).toMatchObject({ accountId: 1, workflowType: "feed", scope: "for_you" });
  });
});

describe("Search workflow", () => {
  it("should search, open the first video and engage with results", async () => {
    const h = createHarness();
    const app = new FakeApp(h.screen, ["feed_author"]);
    app.hashtagAuthors = ["alice", "bob"];

    const stats = await new SearchWorkflow(h.deps).run({
      ...FAST_PACING,
      ...NO_ACTIONS,
      searchQuery: "#Cats",
      likeProbability: 1,
      maxVideos: 2,
    });

    expect(h.screen.typed).toEqual([{ name: "search.input", text: "#Cats" }]);
    expect(stats.videos_watched).toBe(2);
    expect(stats.videos_liked).toBe(2);
    expect(stats.completion_reason).toBe("max_videos_reached");
    expect(h.ledger.has("alice", "like")).toBe(true);
    expect(h.ledger.has("bob", "like")).toBe(true);
    expect(h.sessions.started[0]?.scope).toBe("search:#cats");
  });
});
