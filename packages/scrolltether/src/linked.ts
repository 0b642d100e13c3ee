import type { ScrollActivity } from "./activity";
import type { AnimateOptions, HoldHandle } from "./core";
import { invariant } from "./errors";
import type { LinkedScrollGroup } from "./group";
import { MirrorActivity } from "./mirror";
import { ScrollPosition } from "./position";
import type { ScrollPositionOptions } from "./position";

// Whenever setOffset or forceOffset is called on a LinkedPosition (by a drag,
// an animation or a program), it links every live peer to itself through a
// MirrorActivity and pushes the new offset into each of them. When the
// position begins any new activity, it stops driving those peers.

/**
 * A scroll position that mirrors its movements to every other attached
 * position of its group.
 */
export class LinkedPosition extends ScrollPosition {
  /** Mirrors this position asked its peers to run; dropped on the next activity */
  private readonly peerActivities = new Set<MirrorActivity>();

  constructor(
    readonly group: LinkedScrollGroup,
    readonly id: number,
    opts: ScrollPositionOptions = {},
  ) {
    super(opts);
  }

  get peerActivityCount(): number {
    return this.peerActivities.size;
  }

  override beginActivity(newActivity: ScrollActivity): void {
    this.unlinkPeerActivities();
    super.beginActivity(newActivity);
  }

  override dispose(): void {
    this.unlinkPeerActivities();
    super.dispose();
  }

  override setOffset(newOffset: number): number {
    invariant(this.attached, `position ${this.id} has no attached view`);
    if (newOffset === this.offset) return 0;
    this.updateUserScrollDirection(
      newOffset - this.offset > 0 ? "forward" : "reverse",
    );
    this.fanOut((activity) => activity.moveTo(newOffset));
    return this.setOffsetInternal(newOffset);
  }

  override forceOffset(value: number): void {
    invariant(this.attached, `position ${this.id} has no attached view`);
    if (value === this.offset) return;
    this.updateUserScrollDirection(
      value - this.offset > 0 ? "forward" : "reverse",
    );
    this.fanOut((activity) => activity.jumpTo(value));
    this.forceOffsetInternal(value);
  }

  override animateTo(value: number, opts?: AnimateOptions): Promise<boolean> {
    invariant(this.attached, `position ${this.id} has no attached view`);
    return super.animateTo(value, opts);
  }

  setOffsetInternal(newOffset: number): number {
    return super.setOffset(newOffset);
  }

  forceOffsetInternal(value: number): void {
    super.forceOffset(value);
  }

  /** Jumps without fan-out, for when the whole group moves at once. */
  jumpToInternal(value: number): void {
    this.goIdle();
    this.forceOffsetInternal(value);
    this.goIdle();
  }

  // Peers are held silently: no cancel callback and no further fan-out.
  override hold(onCancel?: () => void): HoldHandle {
    for (const peer of this.group.livePeers(this)) {
      peer.holdInternal();
    }
    return super.hold(onCancel);
  }

  holdInternal(): void {
    super.hold();
  }

  link(driver: LinkedPosition): MirrorActivity {
    invariant(this.attached, `position ${this.id} has no attached view`);
    const current = this.activity;
    const activity =
      current instanceof MirrorActivity ? current : this.beginMirroring(driver);
    activity.link(driver);
    return activity;
  }

  unlink(activity: MirrorActivity): void {
    this.peerActivities.delete(activity);
  }

  override toString(): string {
    return (
      `LinkedPosition#${this.id}(offset: ${this.offset}, ` +
      `direction: ${this.userScrollDirection}, activity: ${this.activity.kind}, ` +
      `${this.attached ? "attached" : "detached"})`
    );
  }

  private beginMirroring(driver: LinkedPosition): MirrorActivity {
    const activity = new MirrorActivity(this, this.log);
    this.beginActivity(activity);
    this.log.debug("mirroring", { position: this.id, driver: driver.id });
    return activity;
  }

  private fanOut(apply: (activity: MirrorActivity) => void): void {
    if (!this.group.canLinkWithPeers(this)) return;
    for (const activity of this.group.linkWithPeers(this)) {
      this.peerActivities.add(activity);
    }
    // a peer detached mid fan-out has already torn its mirror down
    for (const activity of [...this.peerActivities]) {
      if (activity.disposed || !activity.owner.attached) continue;
      apply(activity);
    }
  }

  private unlinkPeerActivities(): void {
    for (const activity of [...this.peerActivities]) {
      activity.unlink(this);
    }
    this.peerActivities.clear();
  }
}
