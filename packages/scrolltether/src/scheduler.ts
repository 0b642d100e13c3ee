import type { Scheduler } from "./core";

export function createRafScheduler(): Scheduler {
  return {
    start(cb) {
      return requestAnimationFrame(cb);
    },

    stop(h) {
      if (h !== undefined) cancelAnimationFrame(h);
    },
  };
}

/** Timer-backed frames, for hosts without requestAnimationFrame. */
export function createTimeoutScheduler(frameMs = 16): Scheduler {
  const timers = new Map<number, ReturnType<typeof setTimeout>>();
  let nextHandle = 0;

  return {
    start(cb) {
      const handle = ++nextHandle;
      timers.set(
        handle,
        setTimeout(() => {
          timers.delete(handle);
          cb(Date.now());
        }, frameMs),
      );
      return handle;
    },

    stop(h) {
      if (h === undefined) return;
      const timer = timers.get(h);
      if (timer !== undefined) {
        clearTimeout(timer);
        timers.delete(h);
      }
    },
  };
}

export function defaultScheduler(): Scheduler {
  return typeof requestAnimationFrame === "function"
    ? createRafScheduler()
    : createTimeoutScheduler();
}
