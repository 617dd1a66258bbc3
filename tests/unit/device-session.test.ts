import { describe, it, expect, beforeEach } from "vitest";
import { DeviceSession } from "../../src/services/device-session";
import { ScreenError } from "../../src/core/errors";
import { logger } from "../../src/core/logger";
import { locator } from "../../src/platforms/tiktok/selectors";
import { FakeClock } from "../fakes/fake-clock";
import { FakeScreen } from "../fakes/fake-screen";

describe("DeviceSession", () => {
  let screen: FakeScreen;
  let clock: FakeClock;
  let device: DeviceSession;

  beforeEach(() => {
    screen = new FakeScreen();
    clock = new FakeClock();
    device = new DeviceSession(screen, clock, logger, { defaultTimeoutMs: 100 });
  });

  it("should report existence as a value", async () => {
    screen.show("video.like_button");
    expect(await device.exists(locator("video.like_button"))).toEqual({ ok: true, value: true });
    expect(await device.exists(locator("video.share_button"))).toEqual({ ok: true, value: false });
  });

  it("should classify an unresolved click as not_found", async () => {
    const result = await device.click(locator("video.like_button"));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("not_found");
      expect(result.error.message).toBe("video.like_button not found");
    }
  });

  it("should trim text and treat blank text as not_found", async () => {
    screen.text("video.author", "  @alice ");
    expect(await device.text(locator("video.author"))).toEqual({ ok: true, value: "@alice" });

    screen.text("video.author", "   ");
    const blank = await device.text(locator("video.author"));
    expect(blank.ok ? null : blank.error.kind).toBe("not_found");
  });

  it("should retry a thrown error once as transient", async () => {
    screen.show("video.like_button");
    screen.errors.set("click:video.like_button", new Error("socket hang up"));

    const result = await device.click(locator("video.like_button"));

    expect(result.ok ? null : result.error.kind).toBe("transient");
    expect(screen.count("click:video.like_button")).toBe(2);
    expect(clock.sleeps).toEqual([500]);
  });

  it("should read exhausted transient failures as false in boolean helpers", async () => {
    screen.show("video.like_button");
    screen.errors.set("click:video.like_button", new Error("socket hang up"));

    expect(await device.tryClick(locator("video.like_button"))).toBe(false);
  });

  it("should raise fatal failures without retrying", async () => {
    screen.errors.set("pressBack", Object.assign(new Error("device disconnected"), { fatal: true }));

    await expect(device.back()).rejects.toBeInstanceOf(ScreenError);
    expect(screen.count("pressBack")).toBe(1);
  });

  it("should swipe up across the middle of the screen for the next video", async () => {
    await device.nextVideo();
    await device.scrollList();

    expect(screen.swipes).toEqual([
      [540, 1440, 540, 480, 300],
      [540, 1344, 540, 576, 600],
    ]);
    expect(screen.count("screenSize")).toBe(1);
  });

  it("should round tap coordinates", async () => {
    await device.tap(10.4, 20.6);
    expect(screen.calls).toEqual(["tap:10,21"]);
  });
});
