import { AXIS, clamp } from "./core";
import type { ScrollAxisKeyword, ScrollDriver } from "./core";

/** The slice of an element a driver needs; any HTMLElement qualifies. */
export interface ScrollPane {
  scrollTop: number;
  scrollLeft: number;
  readonly scrollHeight: number;
  readonly scrollWidth: number;
  readonly clientHeight: number;
  readonly clientWidth: number;
  addEventListener(
    type: string,
    handler: () => void,
    options?: AddEventListenerOptions,
  ): void;
  removeEventListener(type: string, handler: () => void): void;
}

// keydown covers keyboard scrolling, which sends no pointer event
const GRAB_EVENTS = ["pointerdown", "touchstart", "wheel", "keydown"] as const;

// scroll events landing within this distance of our last write, as the pane
// clamped it, are echoes
const ECHO_TOLERANCE = 1;

export function createDOMDriver(
  pane: ScrollPane,
  axisKeyword: ScrollAxisKeyword = "block",
): ScrollDriver {
  const ax = AXIS[axisKeyword];

  let lastWritten: number | null = null;

  const read = () => pane[ax.scrollProp];

  const limit = () =>
    Math.max(0, pane[ax.scrollSizeProp] - pane[ax.clientSizeProp]);

  const write = (pos: number) => {
    if (read() === pos) return;
    lastWritten = pos;
    pane[ax.scrollProp] = pos;
  };

  const onUserScroll = (cb: (n: number) => void) => {
    const h = () => {
      const pos = read();
      const echo =
        lastWritten !== null &&
        Math.abs(pos - clamp(0, lastWritten, limit())) < ECHO_TOLERANCE;
      lastWritten = null;
      if (!echo) cb(pos);
    };
    pane.addEventListener("scroll", h, { passive: true });
    return () => pane.removeEventListener("scroll", h);
  };

  const onGrab = (cb: () => void) => {
    const h = () => cb();
    GRAB_EVENTS.forEach((type) =>
      pane.addEventListener(type, h, { passive: true }),
    );
    return () =>
      GRAB_EVENTS.forEach((type) => pane.removeEventListener(type, h));
  };

  return {
    read,
    write,
    limit,
    onUserScroll,
    onGrab,
  };
}
