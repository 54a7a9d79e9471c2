import { inject, injectable } from "inversify";
import { TYPES } from "@/config/Types";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import {
  NetworkErrorCode,
  NetworkNodeKind,
} from "@/shared/constants/NetworkEnums";
import type { SessionSettings } from "@/shared/types/session";
import type {
  NetworkResolution,
  StorageNetworkResult,
} from "@/shared/types/storage";
import type { NetworkTile, Position, TileLookup } from "@/shared/types/world";
import {
  comparePositions,
  freezePositions,
  positionKey,
  toKey,
} from "@/shared/utils/PositionUtils";

type Exploration =
  | { tooLarge: false; nodes: NetworkTile[] }
  | { tooLarge: true; visited: number };

const EMPTY_RESULT: StorageNetworkResult = Object.freeze({
  hasRoot: false,
  rootPosition: null,
  unitPositions: Object.freeze([]),
  unitCount: 0,
  nodeCount: 0,
});

/**
 * Cells orthogonally adjacent to a node's footprint. A 1x1 node gets its
 * 4-neighbourhood, a 2x2 node the 8 cells around its edges.
 */
export function getPerimeterCells(tile: NetworkTile): Position[] {
  const { x, y } = tile.anchor;
  const cells: Position[] = [];
  for (let dy = 0; dy < tile.height; dy++) cells.push({ x: x - 1, y: y + dy });
  for (let dx = 0; dx < tile.width; dx++) cells.push({ x: x + dx, y: y - 1 });
  for (let dy = 0; dy < tile.height; dy++) {
    cells.push({ x: x + tile.width, y: y + dy });
  }
  for (let dx = 0; dx < tile.width; dx++) {
    cells.push({ x: x + dx, y: y + tile.height });
  }
  return cells;
}

/**
 * Resolves which storage units belong to the network reachable from a tile.
 *
 * Traversal is a breadth-first search over network tiles, normalized to the
 * anchor of each multi-tile object and bounded by `maxNetworkNodes`. When a
 * component holds several roots, the root chosen is the first one met by a
 * traversal started at the component's canonical anchor (smallest y, then x),
 * so every origin inside the component gets the same answer.
 */
@injectable()
export class StorageNetworkResolver {
  private readonly maxNodes: number;
  private readonly cache = new Map<string, NetworkResolution>();
  private cacheRevision = -1;

  constructor(
    @inject(TYPES.TileLookup) private readonly tiles: TileLookup,
    @inject(TYPES.SessionSettings) settings: SessionSettings,
  ) {
    this.maxNodes = settings.maxNetworkNodes;
  }

  public tryResolveNetwork(origin: Position): NetworkResolution {
    const originTile = this.tiles.getNetworkTile(origin.x, origin.y);
    if (!originTile) {
      return {
        success: false,
        result: EMPTY_RESULT,
        error: NetworkErrorCode.NETWORK_NOT_FOUND,
        message: `No network tile at ${toKey(origin)}`,
      };
    }

    const exploration = this.explore(originTile);
    if (exploration.tooLarge) {
      logger.warn(
        `🕸️ [NETWORK] Traversal from ${toKey(origin)} exceeded ${this.maxNodes} nodes`,
        LogCategory.NETWORK,
      );
      return {
        success: false,
        result: EMPTY_RESULT,
        error: NetworkErrorCode.NETWORK_TOO_LARGE,
        message: `Network exceeds ${this.maxNodes} nodes`,
      };
    }

    let nodes = exploration.nodes;
    const units = nodes
      .filter((node) => node.kind === NetworkNodeKind.UNIT)
      .map((node) => node.anchor)
      .sort(comparePositions);
    let roots = nodes.filter((node) => node.kind === NetworkNodeKind.ROOT);

    if (roots.length > 1) {
      const canonical = nodes.reduce((best, node) =>
        comparePositions(node.anchor, best.anchor) < 0 ? node : best,
      );
      if (toKey(canonical.anchor) !== toKey(originTile.anchor)) {
        const ordered = this.explore(canonical);
        if (!ordered.tooLarge) {
          nodes = ordered.nodes;
          roots = nodes.filter((node) => node.kind === NetworkNodeKind.ROOT);
        }
      }
      logger.warn(
        `🕸️ [NETWORK] ${roots.length} roots connected; using ${toKey(roots[0].anchor)}`,
        LogCategory.NETWORK,
        { roots: roots.map((root) => toKey(root.anchor)) },
      );
    }

    const unitPositions = freezePositions(units);
    const result: StorageNetworkResult = Object.freeze({
      hasRoot: roots.length > 0,
      rootPosition:
        roots.length > 0
          ? Object.freeze({ x: roots[0].anchor.x, y: roots[0].anchor.y })
          : null,
      unitPositions,
      unitCount: unitPositions.length,
      nodeCount: nodes.length,
    });

    if (!result.hasRoot) {
      return {
        success: false,
        result,
        error: NetworkErrorCode.NO_ROOT_CONNECTED,
        message: "No root reachable from this tile",
      };
    }

    logger.debug(
      `🕸️ [NETWORK] Resolved ${result.unitCount} unit(s) from ${toKey(origin)}`,
      LogCategory.NETWORK,
    );
    return { success: true, result };
  }

  /**
   * Same contract as tryResolveNetwork, memoized until the tile revision moves.
   */
  public resolveCached(origin: Position): NetworkResolution {
    const revision = this.tiles.getRevision();
    if (revision !== this.cacheRevision) {
      this.cache.clear();
      this.cacheRevision = revision;
    }

    const key = toKey(origin);
    const cached = this.cache.get(key);
    if (cached) return cached;

    const resolution = this.tryResolveNetwork(origin);
    this.cache.set(key, resolution);
    return resolution;
  }

  public invalidate(): void {
    this.cache.clear();
    this.cacheRevision = -1;
  }

  /**
   * Rooted networks with at least one unit whose access point or root lies
   * within `radius` tiles (square scan) of `center`, one entry per root.
   */
  public findNearbyNetworks(center: Position, radius: number): StorageNetworkResult[] {
    const networks: StorageNetworkResult[] = [];
    const seenAnchors = new Set<string>();
    const seenRoots = new Set<string>();
    const r = Math.max(0, Math.floor(radius));

    for (let y = center.y - r; y <= center.y + r; y++) {
      for (let x = center.x - r; x <= center.x + r; x++) {
        const tile = this.tiles.getNetworkTile(x, y);
        if (!tile) continue;
        if (tile.kind !== NetworkNodeKind.ACCESS && tile.kind !== NetworkNodeKind.ROOT) {
          continue;
        }
        const anchorKey = toKey(tile.anchor);
        if (seenAnchors.has(anchorKey)) continue;
        seenAnchors.add(anchorKey);

        const resolution = this.resolveCached(tile.anchor);
        const { result } = resolution;
        if (!resolution.success || !result.rootPosition || result.unitCount === 0) {
          continue;
        }
        const rootKey = toKey(result.rootPosition);
        if (seenRoots.has(rootKey)) continue;
        seenRoots.add(rootKey);
        networks.push(result);
      }
    }

    return networks;
  }

  /**
   * Breadth-first search from `start`, one visit per anchor.
   */
  private explore(start: NetworkTile): Exploration {
    const visited = new Set<string>([toKey(start.anchor)]);
    const nodes: NetworkTile[] = [];
    const queue: NetworkTile[] = [start];

    for (let head = 0; head < queue.length; head++) {
      const node = queue[head];
      nodes.push(node);

      for (const cell of getPerimeterCells(node)) {
        const neighbour = this.tiles.getNetworkTile(cell.x, cell.y);
        if (!neighbour) continue;
        const key = positionKey(neighbour.anchor.x, neighbour.anchor.y);
        if (visited.has(key)) continue;
        visited.add(key);
        if (visited.size > this.maxNodes) {
          return { tooLarge: true, visited: visited.size };
        }
        queue.push(neighbour);
      }
    }

    return { tooLarge: false, nodes };
  }
}
