import { describe, it, expect, beforeEach } from "vitest";
import { SandboxWorld } from "../../src/domain/world/SandboxWorld";
import { TEST_ITEMS } from "../setup";

describe("SandboxWorld", () => {
  let world: SandboxWorld;

  beforeEach(() => {
    world = new SandboxWorld(TEST_ITEMS, { x: 3, y: 3 });
  });

  it("debe crear el contenedor de cada unidad", () => {
    const container = world.placeUnit(1, 1, { width: 2, height: 2, slots: 5 });

    expect(container?.slots).toHaveLength(5);
    expect(world.containers.has({ x: 1, y: 1 })).toBe(true);
    expect(world.placeUnit(2, 2)).toBeUndefined();
  });

  it("debe repartir el stock respetando el máximo por slot", () => {
    world.placeUnit(0, 0);

    expect(world.stock({ x: 0, y: 0 }, "wooden_box", 150)).toBe(150);

    const slots = world.containers.getContainerAt({ x: 0, y: 0 })?.slots ?? [];
    expect(slots[0]?.stack).toBe(99);
    expect(slots[1]?.stack).toBe(51);
  });

  it("debe devolver solo lo que cupo", () => {
    world.placeUnit(0, 0, { slots: 1 });

    expect(world.stock({ x: 0, y: 0 }, "wood", 1200)).toBe(999);
    expect(world.countInContainer({ x: 0, y: 0 }, "wood")).toBe(999);
    expect(world.stock({ x: 9, y: 9 }, "wood", 1)).toBe(0);
  });

  it("no debe quitar una unidad con objetos", () => {
    world.placeUnit(0, 0);
    world.stock({ x: 0, y: 0 }, "gel", 2);

    expect(world.removeNode(0, 0)).toBe(false);
    expect(world.tiles.getNetworkTile(0, 0)).toBeDefined();
  });

  it("debe quitar una unidad vacía y su contenedor", () => {
    world.placeUnit(0, 0);
    world.placeConnector(1, 0);

    expect(world.removeNode(0, 0)).toBe(true);
    expect(world.containers.has({ x: 0, y: 0 })).toBe(false);
    expect(world.removeNode(1, 0)).toBe(true);
    expect(world.removeNode(1, 0)).toBe(false);
  });

  it("debe ubicar el inventario en la posición del jugador", () => {
    expect(world.inventory.getPosition()).toEqual({ x: 3, y: 3 });
  });
});
