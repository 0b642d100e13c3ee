import { ScrollActivity } from "./activity";
import type { Origin, UserScrollDirection } from "./core";
import { invariant } from "./errors";
import type { Logger } from "./logger";
import type { LinkedPosition } from "./linked";

/**
 * "This position moves because its peers move." Not self-propelled: it only
 * relays offsets pushed by its drivers, through the owner's internal apply
 * so the relay never fans out again.
 */
export class MirrorActivity extends ScrollActivity {
  readonly kind = "mirror";
  readonly origin: Origin = "mirror";
  readonly isScrolling = true;

  private readonly _drivers = new Set<LinkedPosition>();

  constructor(
    readonly owner: LinkedPosition,
    private readonly log: Logger,
  ) {
    super(owner);
  }

  override get shouldIgnorePointer(): boolean {
    return true;
  }

  get drivers(): readonly LinkedPosition[] {
    return [...this._drivers];
  }

  link(driver: LinkedPosition): void {
    this._drivers.add(driver);
  }

  unlink(driver: LinkedPosition): void {
    this._drivers.delete(driver);
    if (this._drivers.size === 0 && !this.disposed) this.owner.goIdle();
  }

  moveTo(newOffset: number): void {
    this.adoptDriverDirection();
    this.owner.setOffsetInternal(newOffset);
  }

  jumpTo(newOffset: number): void {
    this.adoptDriverDirection();
    this.owner.forceOffsetInternal(newOffset);
  }

  // drivers that disagree leave the owner idle
  private adoptDriverDirection(): void {
    invariant(
      this._drivers.size > 0,
      `mirror on position ${this.owner.id} has no drivers`,
    );
    let common: UserScrollDirection | null = null;
    for (const driver of this._drivers) {
      const direction = driver.userScrollDirection;
      if (common === null) {
        common = direction;
      } else if (direction !== common) {
        common = "idle";
        break;
      }
    }
    this.owner.updateUserScrollDirection(common ?? "idle");
  }

  override dispose(): void {
    if (this.disposed) return;
    super.dispose();
    const drivers = [...this._drivers];
    this._drivers.clear();
    for (const driver of drivers) driver.unlink(this);
    this.log.debug("mirror torn down", {
      position: this.owner.id,
      drivers: drivers.map((d) => d.id),
    });
  }
}
