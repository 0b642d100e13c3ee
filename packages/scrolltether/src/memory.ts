import { clamp } from "./core";
import type { ScrollDriver } from "./core";

/** A headless view: for server rendering, non-DOM hosts and tests. */
export interface MemoryDriver extends ScrollDriver {
  /** Every value written by the position, in order */
  readonly writes: readonly number[];
  /** Simulates the user scrolling the view to `pos` */
  userScroll(pos: number): void;
  /** Simulates a pointer landing on the view */
  grab(): void;
  setLimit(limit: number): void;
}

export function createMemoryDriver(initialLimit = Infinity): MemoryDriver {
  let pos = 0;
  let max = initialLimit;
  const writes: number[] = [];
  const scrollListeners = new Set<(pos: number) => void>();
  const grabListeners = new Set<() => void>();

  return {
    writes,
    read: () => pos,
    write(next) {
      writes.push(next);
      pos = clamp(0, next, max);
    },
    limit: () => max,
    onUserScroll(cb) {
      scrollListeners.add(cb);
      return () => {
        scrollListeners.delete(cb);
      };
    },
    onGrab(cb) {
      grabListeners.add(cb);
      return () => {
        grabListeners.delete(cb);
      };
    },
    userScroll(next) {
      pos = clamp(0, next, max);
      scrollListeners.forEach((l) => l(pos));
    },
    grab() {
      grabListeners.forEach((l) => l());
    },
    setLimit(limit) {
      max = limit;
    },
  };
}
