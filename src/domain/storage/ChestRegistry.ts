import { injectable } from "inversify";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import type { TemporaryMembershipScope } from "@/shared/types/storage";
import type { Position } from "@/shared/types/world";
import { freezePositions, toKey } from "@/shared/utils/PositionUtils";

/**
 * Default membership of the storage provider: the containers the player
 * registered by hand. A temporary override replaces it while a scope is open.
 */
@injectable()
export class ChestRegistry {
  private readonly positions = new Map<string, Readonly<Position>>();
  private override: readonly Readonly<Position>[] | null = null;

  public register(position: Position): boolean {
    const key = toKey(position);
    if (this.positions.has(key)) return false;
    this.positions.set(key, Object.freeze({ x: position.x, y: position.y }));
    return true;
  }

  public unregister(position: Position): boolean {
    return this.positions.delete(toKey(position));
  }

  public isRegistered(position: Position): boolean {
    return this.positions.has(toKey(position));
  }

  public getPositions(): readonly Readonly<Position>[] {
    return [...this.positions.values()];
  }

  public count(): number {
    return this.positions.size;
  }

  public clear(): void {
    this.positions.clear();
  }

  /**
   * Drops registrations whose container no longer exists.
   * @returns number of entries removed
   */
  public validate(existsAt: (position: Readonly<Position>) => boolean): number {
    let removed = 0;
    for (const [key, position] of this.positions) {
      if (!existsAt(position)) {
        this.positions.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      logger.info(
        `🧹 [REGISTRY] Removed ${removed} stale container registration(s)`,
        LogCategory.STORAGE,
      );
    }
    return removed;
  }

  /**
   * Positions provider operations act on right now.
   */
  public getActivePositions(): readonly Readonly<Position>[] {
    return this.override ?? this.getPositions();
  }

  public isUsingTemporaryPositions(): boolean {
    return this.override !== null;
  }

  public getTemporaryPositions(): readonly Readonly<Position>[] | null {
    return this.override;
  }

  /**
   * Narrows membership to `positions` until the returned scope is restored.
   * Each scope restores the membership that was active when it was opened,
   * so nested scopes must be restored innermost first.
   */
  public useTemporaryPositions(
    positions: Iterable<Readonly<Position>>,
  ): TemporaryMembershipScope {
    const previous = this.override;
    const active = freezePositions(positions);
    this.override = active;

    let restored = false;
    return {
      positions: active,
      get isActive(): boolean {
        return !restored;
      },
      restore: (): void => {
        if (restored) return;
        restored = true;
        this.override = previous;
      },
    };
  }
}
