import { describe, it, expect, vi } from "vitest";

import { LinkedScrollError } from "../src/errors";
import { createMemoryDriver } from "../src/memory";
import { ScrollPosition } from "../src/position";
import {
  createManualScheduler,
  createSpyLogger,
  linearAnimator,
} from "./_helpers";

const createPosition = (initialOffset = 0, maxExtent = 1000) =>
  new ScrollPosition({
    initialOffset,
    maxExtent,
    scheduler: createManualScheduler(),
  });

describe("ScrollPosition offsets", () => {
  it("starts idle at its initial offset", () => {
    const p = createPosition(20);
    expect(p.offset).toBe(20);
    expect(p.userScrollDirection).toBe("idle");
    expect(p.activity.kind).toBe("idle");
    expect(p.attached).toBe(false);
  });

  it("clamps setOffset and returns the distance moved", () => {
    const p = createPosition(0, 100);
    expect(p.setOffset(150)).toBe(100);
    expect(p.offset).toBe(100);
    expect(p.setOffset(100)).toBe(0);
    expect(p.setOffset(-10)).toBe(-100);
    expect(p.offset).toBe(0);
  });

  it("forceOffset ignores the extents", () => {
    const p = createPosition(0, 100);
    p.forceOffset(150);
    expect(p.offset).toBe(150);
  });

  it("reports the origin of the current activity", () => {
    const p = createPosition();
    const listener = vi.fn();
    p.signal.on(listener);

    p.setOffset(10);
    p.drag().update(5);

    expect(listener.mock.calls).toEqual([
      [10, "program"],
      [15, "user"],
    ]);
  });
});

describe("ScrollPosition direction", () => {
  it("follows a drag and resets when the position stops", () => {
    const p = createPosition(50);
    const listener = vi.fn();
    p.onUserScrollDirectionChange(listener);
    const drag = p.drag();

    drag.update(10);
    drag.update(-5);
    drag.end();

    expect(listener.mock.calls).toEqual([["forward"], ["reverse"], ["idle"]]);
    expect(p.offset).toBe(55);
  });

  it("keeps notifying after a listener throws", () => {
    const logger = createSpyLogger();
    const p = new ScrollPosition({ logger, scheduler: createManualScheduler() });
    const second = vi.fn();
    p.onUserScrollDirectionChange(() => {
      throw new Error("boom");
    });
    p.onUserScrollDirectionChange(second);

    p.updateUserScrollDirection("forward");

    expect(second).toHaveBeenCalledWith("forward");
    expect(logger.error).toHaveBeenCalledWith(
      "direction listener threw",
      expect.objectContaining({ direction: "forward" }),
    );
  });
});

describe("ScrollPosition attachment", () => {
  it("writes its offset to the driver and adopts its limit", () => {
    const driver = createMemoryDriver(500);
    const p = createPosition(40);

    p.attach(driver);
    p.setOffset(60);

    expect(p.attached).toBe(true);
    expect(p.maxExtent).toBe(500);
    expect(driver.writes).toEqual([40, 60]);
  });

  it("takes user scrolls as a drag without writing them back", () => {
    const driver = createMemoryDriver(500);
    const p = createPosition();
    p.attach(driver);

    driver.userScroll(90);

    expect(p.offset).toBe(90);
    expect(p.activity.kind).toBe("drag");
    expect(driver.writes).toEqual([0]);
  });

  it("holds on a grab", () => {
    const driver = createMemoryDriver(500);
    const p = createPosition();
    p.attach(driver);

    driver.grab();

    expect(p.activity.kind).toBe("hold");
  });

  it("rejects a second attach and an attach after dispose", () => {
    const p = createPosition();
    p.attach(createMemoryDriver());
    expect(() => p.attach(createMemoryDriver())).toThrow(LinkedScrollError);

    p.dispose();
    expect(p.disposed).toBe(true);
    expect(() => p.attach(createMemoryDriver())).toThrow(
      "scrolltether: cannot attach a disposed position",
    );
  });

  it("stops writing and goes idle on detach", () => {
    const driver = createMemoryDriver(500);
    const p = createPosition();
    p.attach(driver);
    const drag = p.drag();
    drag.update(10);

    p.detach();
    p.forceOffset(30);
    driver.userScroll(70);

    expect(drag.disposed).toBe(true);
    expect(p.activity.kind).toBe("idle");
    expect(p.offset).toBe(30);
    expect(driver.writes).toEqual([0]);
  });

  it("jumps inside a limit that shrank", () => {
    const driver = createMemoryDriver(500);
    const p = createPosition();
    p.attach(driver);
    p.setOffset(400);

    driver.setLimit(300);
    p.updateExtents();

    expect(p.maxExtent).toBe(300);
    expect(p.offset).toBe(300);
  });
});

describe("ScrollPosition.hold", () => {
  it("fires the cancel callback once when replaced", () => {
    const p = createPosition();
    const onCancel = vi.fn();
    p.hold(onCancel);

    p.drag();
    p.goIdle();

    expect(onCancel).toHaveBeenCalledTimes(1);
  });

  it("goes idle on cancel", () => {
    const p = createPosition();
    const onCancel = vi.fn();

    p.hold(onCancel).cancel();

    expect(p.activity.kind).toBe("idle");
    expect(onCancel).toHaveBeenCalledTimes(1);
  });
});

describe("ScrollPosition.jumpTo", () => {
  it("moves without clamping and ends idle", () => {
    const p = createPosition(0, 100);
    p.drag();

    p.jumpTo(250);

    expect(p.offset).toBe(250);
    expect(p.activity.kind).toBe("idle");
  });
});

describe("ScrollPosition.animateTo", () => {
  it("steps once per frame until the target", async () => {
    const scheduler = createManualScheduler();
    const p = new ScrollPosition({ maxExtent: 1000, scheduler });

    const done = p.animateTo(100, { animator: linearAnimator(25) });

    expect(p.activity.kind).toBe("animate");
    expect(scheduler.runFrames()).toBe(4);
    await expect(done).resolves.toBe(true);
    expect(p.offset).toBe(100);
    expect(p.activity.kind).toBe("idle");
  });

  it("clamps the target", async () => {
    const scheduler = createManualScheduler();
    const p = new ScrollPosition({ maxExtent: 50, scheduler });

    const done = p.animateTo(200, { animator: linearAnimator(25) });
    scheduler.runFrames();

    await expect(done).resolves.toBe(true);
    expect(p.offset).toBe(50);
  });

  it("resolves at once when already at the target", async () => {
    const scheduler = createManualScheduler();
    const p = new ScrollPosition({ initialOffset: 40, scheduler });

    await expect(p.animateTo(40)).resolves.toBe(true);
    expect(scheduler.pending).toBe(0);
  });

  it("resolves false when another activity takes over", async () => {
    const scheduler = createManualScheduler();
    const p = new ScrollPosition({ maxExtent: 1000, scheduler });
    const done = p.animateTo(100, { animator: linearAnimator(25) });
    scheduler.frame(16);

    p.drag();

    await expect(done).resolves.toBe(false);
    expect(scheduler.pending).toBe(0);
    expect(p.offset).toBe(25);
  });

  it("rejects and goes idle when a frame throws", async () => {
    const scheduler = createManualScheduler();
    const p = new ScrollPosition({ maxExtent: 1000, scheduler });
    const done = p.animateTo(100, {
      animator: {
        step() {
          throw new Error("bad step");
        },
      },
    });

    scheduler.frame(16);

    await expect(done).rejects.toThrow("bad step");
    expect(p.activity.kind).toBe("idle");
    expect(scheduler.pending).toBe(0);
    expect(p.offset).toBe(0);
  });

  it("eases with the default animator and lands on the target", async () => {
    const scheduler = createManualScheduler();
    const p = new ScrollPosition({ maxExtent: 1000, scheduler });

    const done = p.animateTo(100);
    const frames = scheduler.runFrames();

    await expect(done).resolves.toBe(true);
    expect(frames).toBeGreaterThan(10);
    expect(p.offset).toBe(100);
  });
});
