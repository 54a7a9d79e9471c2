import { describe, it, expect, beforeEach } from "vitest";
import { TileGrid } from "../../src/domain/world/TileGrid";
import { NetworkNodeKind } from "../../src/shared/constants/NetworkEnums";

describe("TileGrid", () => {
  let grid: TileGrid;

  beforeEach(() => {
    grid = new TileGrid();
  });

  it("debe cubrir todas las celdas de un objeto grande", () => {
    expect(grid.place(NetworkNodeKind.UNIT, 0, 0, 2, 2)).toBe(true);

    const tile = grid.getNetworkTile(1, 1);
    expect(tile?.anchor).toEqual({ x: 0, y: 0 });
    expect(tile?.kind).toBe(NetworkNodeKind.UNIT);
    expect(grid.isAnchor({ x: 0, y: 0 })).toBe(true);
    expect(grid.isAnchor({ x: 1, y: 1 })).toBe(false);
  });

  it("debe rechazar solapamientos sin cambiar la revisión", () => {
    grid.place(NetworkNodeKind.UNIT, 0, 0, 2, 2);
    const revision = grid.getRevision();

    expect(grid.place(NetworkNodeKind.CONNECTOR, 1, 0)).toBe(false);
    expect(grid.getRevision()).toBe(revision);
  });

  it("debe rechazar tamaños y coordenadas inválidos", () => {
    expect(grid.place(NetworkNodeKind.ROOT, 0, 0, 0, 1)).toBe(false);
    expect(grid.place(NetworkNodeKind.ROOT, 0.5, 0)).toBe(false);
    expect(grid.getRevision()).toBe(0);
  });

  it("debe quitar el objeto entero desde cualquier celda", () => {
    grid.place(NetworkNodeKind.ROOT, 4, 4, 2, 2);

    const removed = grid.remove(5, 5);

    expect(removed?.anchor).toEqual({ x: 4, y: 4 });
    expect(grid.getNetworkTile(4, 4)).toBeUndefined();
    expect(grid.getTiles()).toEqual([]);
    expect(grid.getRevision()).toBe(2);
    expect(grid.remove(5, 5)).toBeUndefined();
  });

  it("debe filtrar por tipo", () => {
    grid.place(NetworkNodeKind.ROOT, 0, 0);
    grid.place(NetworkNodeKind.UNIT, 1, 0);
    grid.place(NetworkNodeKind.UNIT, 2, 0);

    expect(grid.getTiles(NetworkNodeKind.UNIT).map((t) => t.anchor.x)).toEqual([1, 2]);
    expect(grid.getTiles()).toHaveLength(3);
  });
});
