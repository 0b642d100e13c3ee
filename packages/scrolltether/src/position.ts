import {
  AnimateActivity,
  DragActivity,
  HoldActivity,
  IdleActivity,
} from "./activity";
import type { ScrollActivity } from "./activity";
import type {
  AnimateOptions,
  Animator,
  HoldHandle,
  Scheduler,
  ScrollDriver,
  UserScrollDirection,
} from "./core";
import { clamp, ScrollSignal } from "./core";
import type { LinkedScrollGroupOptions, PositionExtents } from "./config";
import { resolveGroupOptions } from "./config";
import { invariant } from "./errors";
import type { Logger } from "./logger";

export interface ScrollPositionOptions
  extends LinkedScrollGroupOptions,
    PositionExtents {
  initialOffset?: number;
}

export type DirectionListener = (direction: UserScrollDirection) => void;

/**
 * One view's scroll offset. Clamps to its extents, keeps the user scroll
 * direction, and runs exactly one activity at a time. While attached, every
 * change not made by the user on the view itself is written back to the
 * driver.
 */
export class ScrollPosition {
  readonly signal: ScrollSignal;
  minExtent: number;
  maxExtent: number;

  protected readonly log: Logger;
  private readonly scheduler: Scheduler;
  private readonly animator: Animator;

  private _activity: ScrollActivity;
  private _direction: UserScrollDirection = "idle";
  private _disposed = false;
  private driver: ScrollDriver | null = null;
  private unsubs: (() => void)[] = [];
  private readonly directionListeners = new Set<DirectionListener>();

  constructor(opts: ScrollPositionOptions = {}) {
    const { initialOffset = 0, minExtent = 0, maxExtent = Infinity } = opts;
    const { scheduler, animator, logger } = resolveGroupOptions(opts);

    this.minExtent = minExtent;
    this.maxExtent = maxExtent;
    this.scheduler = scheduler;
    this.animator = animator;
    this.log = logger;
    this.signal = new ScrollSignal(initialOffset, logger);
    this._activity = new IdleActivity(this);
  }

  get offset(): number {
    return this.signal.value;
  }

  get userScrollDirection(): UserScrollDirection {
    return this._direction;
  }

  get activity(): ScrollActivity {
    return this._activity;
  }

  get attached(): boolean {
    return this.driver !== null;
  }

  get disposed(): boolean {
    return this._disposed;
  }

  /* ------------------------------------------------------------------------ */
  /*  lifecycle                                                               */
  /* ------------------------------------------------------------------------ */

  attach(driver: ScrollDriver): void {
    invariant(!this._disposed, "cannot attach a disposed position");
    invariant(this.driver === null, "position is already attached");

    this.maxExtent = Math.max(this.minExtent, driver.limit());
    // a view shorter than its peers starts at its own end, peers stay put
    this.correctOffset();
    this.driver = driver;
    driver.write(this.offset);

    this.unsubs = [
      // the view already shows what the user did to it
      this.signal.on((pos, origin) => {
        if (origin !== "user") driver.write(pos);
      }),
      driver.onUserScroll((pos) => this.userScrollTo(pos)),
    ];
    if (driver.onGrab) {
      this.unsubs.push(
        driver.onGrab(() => {
          this.hold();
        }),
      );
    }
  }

  detach(): void {
    if (this.driver === null) return;
    this.unsubs.forEach((u) => u());
    this.unsubs = [];
    this.driver = null;
    this.goIdle();
  }

  dispose(): void {
    if (this._disposed) return;
    this.detach();
    this._activity.dispose();
    this._disposed = true;
    this.signal.clear();
    this.directionListeners.clear();
  }

  /**
   * Re-reads the driver's limit and moves this position alone back inside
   * it. Peers of a linked position keep their offsets.
   */
  updateExtents(): void {
    if (this.driver === null) return;
    this.maxExtent = Math.max(this.minExtent, this.driver.limit());
    this.correctOffset();
  }

  /** Clamps into the extents without going through setOffset overrides. */
  protected correctOffset(): void {
    const clamped = clamp(this.minExtent, this.offset, this.maxExtent);
    if (clamped === this.offset) return;
    this.goIdle();
    this.signal.set(clamped, "program");
  }

  /* ------------------------------------------------------------------------ */
  /*  offset                                                                  */
  /* ------------------------------------------------------------------------ */

  /** Clamping apply. Returns the distance actually moved. */
  setOffset(newOffset: number): number {
    const previous = this.offset;
    if (newOffset === previous) return 0;
    const clamped = clamp(this.minExtent, newOffset, this.maxExtent);
    this.signal.set(clamped, this._activity.origin);
    return clamped - previous;
  }

  /** Unconditional apply, no clamping. */
  forceOffset(value: number): void {
    this.signal.set(value, this._activity.origin);
  }

  updateUserScrollDirection(value: UserScrollDirection): void {
    if (this._direction === value) return;
    this._direction = value;
    this.directionListeners.forEach((l) => {
      try {
        l(value);
      } catch (error) {
        this.log.error("direction listener threw", { direction: value, error });
      }
    });
  }

  onUserScrollDirectionChange(fn: DirectionListener): () => void {
    this.directionListeners.add(fn);
    return () => {
      this.directionListeners.delete(fn);
    };
  }

  /* ------------------------------------------------------------------------ */
  /*  activities                                                              */
  /* ------------------------------------------------------------------------ */

  beginActivity(activity: ScrollActivity): void {
    this._activity.dispose();
    this._activity = activity;
    if (!activity.isScrolling) this.updateUserScrollDirection("idle");
  }

  goIdle(): void {
    this.beginActivity(new IdleActivity(this));
  }

  hold(onCancel?: () => void): HoldHandle {
    const hold = new HoldActivity(this, onCancel);
    this.beginActivity(hold);
    return hold;
  }

  drag(): DragActivity {
    const drag = new DragActivity(this);
    this.beginActivity(drag);
    return drag;
  }

  /** A scroll the view has already performed (scrollbar, wheel, keyboard). */
  userScrollTo(pos: number): void {
    const current = this._activity;
    if (current.shouldIgnorePointer) {
      // not a gesture we follow: put the view back where the position is
      if (pos !== this.offset) this.driver?.write(this.offset);
      return;
    }
    const drag = current instanceof DragActivity ? current : this.drag();
    drag.moveTo(pos);
  }

  jumpTo(value: number): void {
    this.goIdle();
    if (this.offset !== value) this.forceOffset(value);
    this.goIdle();
  }

  animateTo(value: number, opts: AnimateOptions = {}): Promise<boolean> {
    const target = clamp(this.minExtent, value, this.maxExtent);
    if (target === this.offset) {
      this.goIdle();
      return Promise.resolve(true);
    }
    const activity = new AnimateActivity(
      this,
      target,
      opts.animator ?? this.animator,
      opts.scheduler ?? this.scheduler,
    );
    this.beginActivity(activity);
    activity.start();
    return activity.done;
  }
}
