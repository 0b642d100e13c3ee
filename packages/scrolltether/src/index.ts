export * from "./dom";
export type {
  Animator,
  AnimateOptions,
  CurrentPosition,
  DragHandle,
  HoldHandle,
  Origin,
  Scheduler,
  ScrollAxisKeyword,
  ScrollDriver,
  Signal,
  UserScrollDirection,
} from "./core";
export { ScrollSignal, clamp } from "./core";

export {
  ScrollActivity,
  IdleActivity,
  HoldActivity,
  DragActivity,
  AnimateActivity,
} from "./activity";
export type { ActivityKind } from "./activity";
export { ScrollPosition } from "./position";
export type { ScrollPositionOptions, DirectionListener } from "./position";
export { LinkedPosition } from "./linked";
export { MirrorActivity } from "./mirror";
export { LinkedScrollGroup } from "./group";

export { expAnimator } from "./animators";
export {
  createRafScheduler,
  createTimeoutScheduler,
  defaultScheduler,
} from "./scheduler";
export { createMemoryDriver } from "./memory";
export type { MemoryDriver } from "./memory";

export { resolveGroupOptions } from "./config";
export type {
  LinkedScrollGroupOptions,
  PositionExtents,
  ResolvedGroupOptions,
} from "./config";
export { LinkedScrollError, invariant } from "./errors";
export { createConsoleLogger, silentLogger } from "./logger";
export type { Logger, LogData } from "./logger";
