import type { Animator } from "./core";
import { invariant } from "./errors";

const FRAME_MS = 1000 / 60;

/**
 * Frame-rate independent exponential easing. `lerp` is the fraction of the
 * remaining distance covered per 60fps frame; the animation ends once it is
 * within `settleDistance` pixels of the target.
 */
export function expAnimator(lerp = 0.1, settleDistance = 0.25): Animator {
  invariant(lerp > 0 && lerp < 1, `lerp must be between 0 and 1, got ${lerp}`);
  // per-millisecond decay rate that leaves (1 - lerp) of the gap after one frame
  const decay = -Math.log(1 - lerp) / FRAME_MS;

  return {
    step(current, dt, target) {
      const remaining = (target - current) * Math.exp(-decay * dt);
      return Math.abs(remaining) < settleDistance ? null : target - remaining;
    },
  };
}
