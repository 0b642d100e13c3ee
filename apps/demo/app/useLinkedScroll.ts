"use client";

import { useEffect, useRef } from "react";
import type { RefObject } from "react";
import { createDOMDriver } from "scrolltether";
import type { LinkedScrollGroup, ScrollAxisKeyword } from "scrolltether";

/**
 * Links the returned element's scroll offset into `group` while mounted.
 * Each mount gets a fresh position; it is removed again on unmount.
 */
export function useLinkedScroll<T extends HTMLElement>(
  group: LinkedScrollGroup,
  axis: ScrollAxisKeyword = "block",
): RefObject<T> {
  const ref = useRef<T>(null);

  useEffect(() => {
    const el = ref.current;
    if (!el) return;
    const position = group.createPosition();
    position.attach(createDOMDriver(el, axis));
    return () => group.removePosition(position);
  }, [group, axis]);

  return ref;
}
