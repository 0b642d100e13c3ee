import type { Logger } from "./logger";
import { silentLogger } from "./logger";

export type ScrollAxisKeyword = "block" | "inline";
export type UserScrollDirection = "forward" | "reverse" | "idle";

export type CurrentPosition = number | null;

export const clamp = (min: number, v: number, max: number) =>
  Math.max(min, Math.min(v, max));

/* -------------------------------------------------------------------------- */
/*  reactive ScrollSignal                                                     */
/* -------------------------------------------------------------------------- */

/**
 * Who moved the offset: a gesture on this view, a program (jump, animation),
 * or a peer driving this view through a mirror.
 */
export type Origin = "user" | "program" | "mirror";
export type Signal = (p: number, o: Origin) => void;

export class ScrollSignal {
  private _value: number;
  private listeners = new Set<Signal>();

  constructor(
    initial = 0,
    private readonly log: Logger = silentLogger,
  ) {
    this._value = initial;
  }

  get value() {
    return this._value;
  }
  on(fn: Signal) {
    this.listeners.add(fn);
    return () => {
      this.listeners.delete(fn);
    };
  }
  set(v: number, o: Origin) {
    if (v === this._value) return;
    this._value = v;
    this.listeners.forEach((l) => {
      try {
        l(v, o);
      } catch (error) {
        this.log.error("signal listener threw", { value: v, origin: o, error });
      }
    });
  }
  clear() {
    this.listeners.clear();
  }
}

/* -------------------------------------------------------------------------- */
/*  Scheduler & Animator                                                      */
/* -------------------------------------------------------------------------- */

export interface Scheduler {
  start(cb: (t: number) => void): number;
  stop(h?: number): void;
}

export interface Animator {
  step(current: number, dt: number, target: number): CurrentPosition;
}

/* -------------------------------------------------------------------------- */
/*  Host view                                                                 */
/* -------------------------------------------------------------------------- */

export interface ScrollDriver {
  read(): number;
  write(pos: number): void;
  limit(): number;
  onUserScroll(cb: (pos: number) => void): () => void;
  /** pointer down, touch start or wheel: the user is about to take over */
  onGrab?(cb: () => void): () => void;
}

export interface Axis {
  scrollProp: "scrollLeft" | "scrollTop";
  scrollSizeProp: "scrollWidth" | "scrollHeight";
  clientSizeProp: "clientWidth" | "clientHeight";
}
export const AXIS: Record<ScrollAxisKeyword, Axis> = {
  inline: {
    scrollProp: "scrollLeft",
    scrollSizeProp: "scrollWidth",
    clientSizeProp: "clientWidth",
  },
  block: {
    scrollProp: "scrollTop",
    scrollSizeProp: "scrollHeight",
    clientSizeProp: "clientHeight",
  },
} as const;

export interface HoldHandle {
  cancel(): void;
}

export interface DragHandle {
  update(delta: number): void;
  moveTo(pos: number): void;
  end(): void;
}

export interface AnimateOptions {
  animator?: Animator;
  scheduler?: Scheduler;
}
