import type { Animator, Scheduler } from "./core";
import type { Logger } from "./logger";
import { createConsoleLogger, silentLogger } from "./logger";
import { expAnimator } from "./animators";
import { defaultScheduler } from "./scheduler";

export interface LinkedScrollGroupOptions {
  /** Frame source for `animateTo` (default: rAF when available, else timers) */
  scheduler?: Scheduler;
  /** Easing used by `animateTo` (default: `expAnimator(0.1)`) */
  animator?: Animator;
  logger?: Logger;
  /** Log to the console when no `logger` is given */
  debug?: boolean;
}

export interface ResolvedGroupOptions {
  scheduler: Scheduler;
  animator: Animator;
  logger: Logger;
}

export interface PositionExtents {
  minExtent?: number;
  /** Replaced by the driver's limit on attach */
  maxExtent?: number;
}

export function resolveGroupOptions(
  opts: LinkedScrollGroupOptions = {},
): ResolvedGroupOptions {
  const { scheduler, animator, logger, debug = false } = opts;
  return {
    scheduler: scheduler ?? defaultScheduler(),
    animator: animator ?? expAnimator(0.1),
    logger: logger ?? (debug ? createConsoleLogger() : silentLogger),
  };
}
