import type {
  Animator,
  DragHandle,
  HoldHandle,
  Origin,
  Scheduler,
} from "./core";
import type { ScrollPosition } from "./position";

export type ActivityKind = "idle" | "hold" | "drag" | "animate" | "mirror";

/**
 * The reason a position's offset is currently changing. A position has
 * exactly one activity; beginning a new one disposes the previous.
 */
export abstract class ScrollActivity {
  private _disposed = false;

  constructor(protected readonly delegate: ScrollPosition) {}

  abstract readonly kind: ActivityKind;
  /** Reported with every offset change made while this activity is current */
  abstract readonly origin: Origin;
  abstract readonly isScrolling: boolean;

  /** Input on the view is an echo, not a gesture, while this is true */
  get shouldIgnorePointer(): boolean {
    return false;
  }

  get velocity(): number {
    return 0;
  }

  get disposed(): boolean {
    return this._disposed;
  }

  dispose(): void {
    this._disposed = true;
  }
}

export class IdleActivity extends ScrollActivity {
  readonly kind = "idle";
  readonly origin: Origin = "program";
  readonly isScrolling = false;
}

export class HoldActivity extends ScrollActivity implements HoldHandle {
  readonly kind = "hold";
  readonly origin: Origin = "user";
  readonly isScrolling = false;

  constructor(
    delegate: ScrollPosition,
    private readonly onCancel?: () => void,
  ) {
    super(delegate);
  }

  cancel(): void {
    if (!this.disposed) this.delegate.goIdle();
  }

  // fires whether the hold was cancelled or replaced by another activity
  override dispose(): void {
    if (this.disposed) return;
    super.dispose();
    this.onCancel?.();
  }
}

export class DragActivity extends ScrollActivity implements DragHandle {
  readonly kind = "drag";
  readonly origin: Origin = "user";
  readonly isScrolling = true;

  update(delta: number): void {
    this.moveTo(this.delegate.offset + delta);
  }

  moveTo(pos: number): void {
    if (this.disposed || pos === this.delegate.offset) return;
    this.delegate.updateUserScrollDirection(
      pos > this.delegate.offset ? "forward" : "reverse",
    );
    this.delegate.setOffset(pos);
  }

  end(): void {
    if (!this.disposed) this.delegate.goIdle();
  }
}

/**
 * Steps an animator once per scheduler frame and applies each step through
 * the position's public `setOffset`, so a linked position fans every frame
 * out to its peers.
 */
export class AnimateActivity extends ScrollActivity {
  readonly kind = "animate";
  readonly origin: Origin = "program";
  readonly isScrolling = true;
  /**
   * true once the target is reached, false if another activity took over.
   * Rejects with whatever a frame threw; the position is then idle.
   */
  readonly done: Promise<boolean>;

  private settle: (reached: boolean) => void = () => {};
  private fail: (error: unknown) => void = () => {};
  private failure: { error: unknown } | null = null;
  private handle: number | null = null;
  private lastTime = 0;
  private reached = false;

  constructor(
    delegate: ScrollPosition,
    readonly target: number,
    private readonly animator: Animator,
    private readonly scheduler: Scheduler,
  ) {
    super(delegate);
    this.done = new Promise<boolean>((resolve, reject) => {
      this.settle = resolve;
      this.fail = reject;
    });
  }

  start(): void {
    if (this.disposed || this.handle !== null) return;
    this.handle = this.scheduler.start(this.tick);
  }

  private readonly tick = (time: number): void => {
    this.handle = null;
    if (this.disposed) return;

    const dt = this.lastTime ? time - this.lastTime : 0;
    this.lastTime = time;

    try {
      const next = this.animator.step(this.delegate.offset, dt, this.target);
      if (next === null) {
        this.reached = true;
        this.delegate.setOffset(this.target);
        if (!this.disposed) this.delegate.goIdle();
        return;
      }
      this.delegate.setOffset(next);
    } catch (error) {
      // nothing above the scheduler would see it; hand it to `done`
      this.failure = { error };
      if (!this.disposed) this.delegate.goIdle();
      return;
    }

    if (!this.disposed) this.handle = this.scheduler.start(this.tick);
  };

  override dispose(): void {
    if (this.disposed) return;
    if (this.handle !== null) {
      this.scheduler.stop(this.handle);
      this.handle = null;
    }
    super.dispose();
    if (this.failure) this.fail(this.failure.error);
    else this.settle(this.reached);
  }
}
