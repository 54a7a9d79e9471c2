import { NetworkNodeKind } from "@/shared/constants/NetworkEnums";
import type { NetworkTile, Position, TileLookup } from "@/shared/types/world";
import { positionKey } from "@/shared/utils/PositionUtils";

/**
 * In-memory tile grid holding network tiles only.
 * Every placement or removal bumps the revision.
 */
export class TileGrid implements TileLookup {
  private readonly cells = new Map<string, NetworkTile>();
  private readonly anchors = new Map<string, NetworkTile>();
  private revision = 0;

  public place(
    kind: NetworkNodeKind,
    x: number,
    y: number,
    width = 1,
    height = 1,
  ): boolean {
    if (![x, y, width, height].every(Number.isInteger)) return false;
    if (width < 1 || height < 1) return false;

    for (let dx = 0; dx < width; dx++) {
      for (let dy = 0; dy < height; dy++) {
        if (this.cells.has(positionKey(x + dx, y + dy))) return false;
      }
    }

    const tile: NetworkTile = Object.freeze({
      kind,
      anchor: Object.freeze({ x, y }),
      width,
      height,
    });
    for (let dx = 0; dx < width; dx++) {
      for (let dy = 0; dy < height; dy++) {
        this.cells.set(positionKey(x + dx, y + dy), tile);
      }
    }
    this.anchors.set(positionKey(x, y), tile);
    this.revision++;
    return true;
  }

  /**
   * Removes the whole object covering (x, y).
   */
  public remove(x: number, y: number): NetworkTile | undefined {
    const tile = this.cells.get(positionKey(x, y));
    if (!tile) return undefined;

    for (let dx = 0; dx < tile.width; dx++) {
      for (let dy = 0; dy < tile.height; dy++) {
        this.cells.delete(positionKey(tile.anchor.x + dx, tile.anchor.y + dy));
      }
    }
    this.anchors.delete(positionKey(tile.anchor.x, tile.anchor.y));
    this.revision++;
    return tile;
  }

  public getNetworkTile(x: number, y: number): NetworkTile | undefined {
    return this.cells.get(positionKey(x, y));
  }

  public getRevision(): number {
    return this.revision;
  }

  public getTiles(kind?: NetworkNodeKind): NetworkTile[] {
    const tiles = [...this.anchors.values()];
    return kind ? tiles.filter((tile) => tile.kind === kind) : tiles;
  }

  public isAnchor(position: Position): boolean {
    return this.anchors.has(positionKey(position.x, position.y));
  }
}
