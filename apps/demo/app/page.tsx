"use client";

import { useEffect, useMemo, useState } from "react";
import { LinkedScrollGroup } from "scrolltether";
import type { UserScrollDirection } from "scrolltether";
import { useLinkedScroll } from "./useLinkedScroll";

const HOURS = Array.from({ length: 24 }, (_, h) => `${String(h).padStart(2, "0")}:00`);
const ROOMS = ["Atlas", "Birch", "Cedar", "Delta", "Elm", "Fjord", "Grove", "Harbor"];
const COLUMN_WIDTH = 120;

function Timetable({ group }: { group: LinkedScrollGroup }) {
  const header = useLinkedScroll<HTMLDivElement>(group, "inline");
  const body = useLinkedScroll<HTMLDivElement>(group, "inline");
  const footer = useLinkedScroll<HTMLDivElement>(group, "inline");

  const row = (label: string) => (
    <div className="flex" style={{ width: HOURS.length * COLUMN_WIDTH }}>
      {HOURS.map((hour) => (
        <div
          key={hour}
          className="shrink-0 border-r border-neutral-800 px-2 py-1 text-xs"
          style={{ width: COLUMN_WIDTH }}
        >
          {label === "header" ? hour : ""}
        </div>
      ))}
    </div>
  );

  return (
    <div className="rounded border border-neutral-800">
      <div ref={header} className="overflow-x-auto bg-neutral-900">
        {row("header")}
      </div>
      <div ref={body} className="h-80 overflow-x-auto overflow-y-hidden">
        {ROOMS.map((room) => (
          <div key={room} className="flex h-10 items-center border-b border-neutral-800">
            <div
              className="flex"
              style={{ width: HOURS.length * COLUMN_WIDTH }}
            >
              {HOURS.map((hour, i) => (
                <div
                  key={hour}
                  className="shrink-0 px-2 text-xs text-neutral-400"
                  style={{ width: COLUMN_WIDTH }}
                >
                  {(i + room.length) % 5 === 0 ? `${room} booked` : ""}
                </div>
              ))}
            </div>
          </div>
        ))}
      </div>
      <div ref={footer} className="overflow-x-auto bg-neutral-900">
        {row("footer")}
      </div>
    </div>
  );
}

export default function LinkedPanesDemo() {
  const group = useMemo(() => new LinkedScrollGroup({ debug: true }), []);
  const [offset, setOffset] = useState(0);
  const [showFooter, setShowFooter] = useState(true);
  const [direction, setDirection] = useState<UserScrollDirection>("idle");

  useEffect(
    () =>
      group.onOffsetChange((value) => {
        setOffset(Math.round(value));
        const [leader] = group.livePeers();
        setDirection(leader ? leader.userScrollDirection : "idle");
      }),
    [group],
  );

  return (
    <main className="mx-auto max-w-4xl space-y-4 p-8">
      <h1 className="text-2xl font-semibold">Linked panes</h1>
      <p className="text-sm text-neutral-400">
        Scroll any strip; the others follow. Offset {offset}px, direction {direction}.
      </p>

      <div className="flex gap-2">
        <button className="rounded bg-neutral-800 px-3 py-1" onClick={() => group.resetAll()}>
          Reset
        </button>
        <button
          className="rounded bg-neutral-800 px-3 py-1"
          onClick={() => void group.animateTo(COLUMN_WIDTH * 12)}
        >
          Noon
        </button>
        <button
          className="rounded bg-neutral-800 px-3 py-1"
          onClick={() => setShowFooter((v) => !v)}
        >
          {showFooter ? "Unmount" : "Mount"} second table
        </button>
      </div>

      <Timetable group={group} />
      {showFooter && <Timetable group={group} />}
    </main>
  );
}
