import { describe, it, expect, beforeEach } from "vitest";
import { RecoverySupervisor } from "../../src/orchestration/capabilities/recovery";
import { PopupHandler } from "../../src/orchestration/capabilities/popup-handler";
import { WorkflowStats } from "../../src/orchestration/stats";
import { DeviceSession } from "../../src/services/device-session";
import type { ScreenSignature } from "../../src/domain/targets";
import { logger } from "../../src/core/logger";
import { FakeClock } from "../fakes/fake-clock";
import { FakeScreen } from "../fakes/fake-screen";

const stuck: ScreenSignature = { state: "video_player", discriminator: "alice_120" };

describe("RecoverySupervisor", () => {
  let screen: FakeScreen;
  let clock: FakeClock;
  let stats: WorkflowStats;
  let supervisor: RecoverySupervisor;

  beforeEach(() => {
    screen = new FakeScreen();
    clock = new FakeClock();
    stats = new WorkflowStats(clock);
    const device = new DeviceSession(screen, clock, logger, { defaultTimeoutMs: 100 });
    supervisor = new RecoverySupervisor(device, new PopupHandler(device, stats, logger), clock, () => 0, stats, logger, {
      stuckThreshold: 3,
      settleMs: 4000,
      restartRetry: { maxAttempts: 2, baseDelayMs: 10, maxDelayMs: 10, jitterMs: 0 },
    });
  });

  describe("observe", () => {
    it("should report stuck on the threshold-th identical signature", () => {
      expect(supervisor.observe(stuck)).toBe(false);
      expect(supervisor.observe(stuck)).toBe(false);
      expect(supervisor.observe(stuck)).toBe(true);
      expect(supervisor.repeats).toBe(3);
    });

    it("should restart the count when the signature changes", () => {
      supervisor.observe(stuck);
      supervisor.observe(stuck);
      expect(supervisor.observe({ state: "video_player", discriminator: "bob_7" })).toBe(false);
      expect(supervisor.repeats).toBe(1);
    });

    it("should treat the same discriminator in another state as different", () => {
      supervisor.observe(stuck);
      supervisor.observe(stuck);
      expect(supervisor.observe({ state: "feed", discriminator: "alice_120" })).toBe(false);
    });

    it("should never count empty discriminators", () => {
      for (let i = 0; i < 5; i++) {
        expect(supervisor.observe({ state: "unknown", discriminator: "" })).toBe(false);
      }
      expect(supervisor.repeats).toBe(0);
    });
  });

  describe("check", () => {
    it("should report progress while under the threshold", async () => {
      expect(await supervisor.check(stuck, async () => stuck)).toBe("progressing");
      expect(stats.get("recoveries")).toBe(0);
    });

    it("should stop at the soft tier when the screen changes", async () => {
      const after: ScreenSignature = { state: "video_player", discriminator: "bob_7" };
      supervisor.observe(stuck);
      supervisor.observe(stuck);

      expect(await supervisor.check(stuck, async () => after)).toBe("soft_recovered");
      expect(stats.get("recoveries")).toBe(1);
      expect(screen.count("pressBack")).toBe(1);
      expect(screen.count("restartApp")).toBe(0);
      expect(supervisor.currentPhase).toBe("monitoring");
      expect(supervisor.repeats).toBe(0);
    });

    it("should close popups during the soft tier", async () => {
      screen.show("popup.collections_not_now");
      supervisor.observe(stuck);
      supervisor.observe(stuck);

      await supervisor.check(stuck, async () => ({ state: "feed", discriminator: "x_1" }));
      expect(stats.get("popups_closed")).toBe(1);
    });
  });

  describe("recover", () => {
    it("should restart the app and restore the checkpoint when soft recovery does not help", async () => {
      let restored = 0;
      supervisor.setCheckpoint({
        name: "feed",
        restore: async () => {
          restored++;
          return true;
        },
      });

      expect(await supervisor.recover(async () => false)).toBe("hard_recovered");
      expect(screen.count("restartApp")).toBe(1);
      expect(restored).toBe(1);
      expect(clock.sleeps).toEqual([1000, 4000]);
      expect(stats.get("recoveries")).toBe(1);
      expect(supervisor.currentPhase).toBe("monitoring");
    });

    it("should fail when the checkpoint cannot be restored", async () => {
      supervisor.setCheckpoint({ name: "feed", restore: async () => false });

      expect(await supervisor.recover(async () => false)).toBe("failed");
      expect(supervisor.currentPhase).toBe("failed");
    });

    it("should fail when the checkpoint restore throws", async () => {
      supervisor.setCheckpoint({
        name: "feed",
        restore: async () => {
          throw new Error("navigation exploded");
        },
      });

      expect(await supervisor.recover(async () => false)).toBe("failed");
    });

    it("should fail after exhausting app restart attempts", async () => {
      screen.errors.set("restartApp", new Error("adb offline"));

      expect(await supervisor.recover(async () => false)).toBe("failed");
      // Two backoff attempts, each retried once by the device session.
      expect(screen.count("restartApp")).toBe(4);
    });

    it("should refuse to recover again once failed", async () => {
      supervisor.setCheckpoint({ name: "feed", restore: async () => false });
      await supervisor.recover(async () => false);

      await expect(supervisor.recover(async () => true)).rejects.toThrow("Invalid recovery transition: failed -> soft_recovery");
    });
  });
});
