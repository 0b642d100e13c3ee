import type { AnimateOptions, Signal } from "./core";
import { ScrollSignal } from "./core";
import type {
  LinkedScrollGroupOptions,
  PositionExtents,
  ResolvedGroupOptions,
} from "./config";
import { resolveGroupOptions } from "./config";
import { invariant } from "./errors";
import type { Logger } from "./logger";
import { LinkedPosition } from "./linked";
import type { MirrorActivity } from "./mirror";

/**
 * Sets up a collection of scroll positions that mirror their movements to
 * each other.
 *
 * Positions are added with {@link LinkedScrollGroup.createPosition}; a new
 * position starts at the current offset of the group. Every position must be
 * handed back to {@link LinkedScrollGroup.removePosition} when its view goes
 * away.
 *
 * Hosts that mount and unmount views must create a fresh position per view
 * instance. Reusing a removed position for a new view lets offsets drift out
 * of sync, and nothing here can detect it.
 */
export class LinkedScrollGroup {
  private readonly members = new Set<LinkedPosition>();
  private readonly options: ResolvedGroupOptions;
  private readonly signal: ScrollSignal;
  private nextId = 0;

  constructor(opts: LinkedScrollGroupOptions = {}) {
    this.options = resolveGroupOptions(opts);
    this.signal = new ScrollSignal(0, this.options.logger);
  }

  private get log(): Logger {
    return this.options.logger;
  }

  get positions(): readonly LinkedPosition[] {
    return [...this.members];
  }

  get size(): number {
    return this.members.size;
  }

  /** Offset of the first attached position. */
  get offset(): number {
    const [first] = this.livePeers();
    invariant(first !== undefined, "group has no attached positions");
    return first.offset;
  }

  createPosition(extents: PositionExtents = {}): LinkedPosition {
    const [first] = this.livePeers();
    const initialOffset = first ? first.offset : 0;
    const position = new LinkedPosition(this, ++this.nextId, {
      ...this.options,
      ...extents,
      initialOffset,
    });
    position.signal.on((offset, origin) => {
      if (origin !== "mirror") this.signal.set(offset, origin);
    });
    this.members.add(position);
    this.log.debug("position created", { id: position.id, initialOffset });
    return position;
  }

  removePosition(position: LinkedPosition): void {
    invariant(
      this.members.has(position),
      `position ${position.id} is not a member of this group`,
    );
    position.detach();
    this.members.delete(position);
    position.dispose();
    this.log.debug("position removed", { id: position.id, size: this.size });
  }

  /** Attached members other than `excluding`, computed fresh on every call. */
  livePeers(excluding?: LinkedPosition): LinkedPosition[] {
    return [...this.members].filter((p) => p.attached && p !== excluding);
  }

  canLinkWithPeers(driver: LinkedPosition): boolean {
    return this.livePeers(driver).length > 0;
  }

  linkWithPeers(driver: LinkedPosition): MirrorActivity[] {
    const peers = this.livePeers(driver);
    invariant(peers.length > 0, `position ${driver.id} has no peers to link`);
    const activities: MirrorActivity[] = [];
    for (const peer of peers) {
      if (!peer.attached) continue;
      activities.push(peer.link(driver));
    }
    return activities;
  }

  resetAll(): void {
    this.log.debug("reset", { size: this.size });
    this.jumpTo(0);
  }

  /** Jumps every attached position on its own; nothing is mirrored. */
  jumpTo(value: number): void {
    for (const position of this.livePeers()) {
      position.jumpToInternal(value);
    }
  }

  /** Animates the first attached position; the rest follow through fan-out. */
  animateTo(value: number, opts?: AnimateOptions): Promise<boolean> {
    const [leader] = this.livePeers();
    if (!leader) return Promise.resolve(false);
    return leader.animateTo(value, opts);
  }

  /** Called once per change made by a driving position. */
  onOffsetChange(fn: Signal): () => void {
    return this.signal.on(fn);
  }
}
