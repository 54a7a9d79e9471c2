import { describe, it, expect, vi } from "vitest";
import { SandboxWorld } from "../../src/domain/world/SandboxWorld";
import { CraftErrorCode } from "../../src/shared/constants/CraftingEnums";
import type { CraftStep, RecipeCatalog } from "../../src/shared/types/crafting";
import { TEST_ITEMS, createTestSession, dumpWorld, recipe, type TestSession } from "../setup";

const unit = { x: 1, y: 0 };

const TORCH_CATALOG: RecipeCatalog = {
  recipes: [recipe("torch", 1, { wood: 1, gel: 1 })],
};

function stockedSession(
  catalog: RecipeCatalog,
  stock: Record<string, number>,
  slots?: number,
): { world: SandboxWorld; session: TestSession } {
  const world = new SandboxWorld(TEST_ITEMS);
  world.placeRoot(0, 0);
  world.placeUnit(unit.x, unit.y, { slots });
  for (const [itemId, amount] of Object.entries(stock)) world.stock(unit, itemId, amount);
  return { world, session: createTestSession({ world, catalog, registered: [unit] }) };
}

function firstStep(session: TestSession, itemId: string, quantity: number): CraftStep {
  const analysis = session.checker.analyze(itemId, quantity, session.provider.getMaterialView());
  const [step] = analysis.steps;
  if (!step) throw new Error(`${itemId} is not craftable in this fixture`);
  return step;
}

describe("CraftingExecutor", () => {
  it("debe consumir ingredientes y depositar el producto en el almacenamiento", () => {
    const { world, session } = stockedSession(TORCH_CATALOG, { wood: 5, gel: 5 });
    const step = firstStep(session, "torch", 2);

    const outcome = session.executor.executeStep(step);

    expect(outcome.success).toBe(true);
    expect(outcome.consumed).toEqual([
      { itemId: "wood", fromStorage: 2, fromInventory: 0 },
      { itemId: "gel", fromStorage: 2, fromInventory: 0 },
    ]);
    expect(outcome.producedToStorage).toBe(2);
    expect(outcome.producedToInventory).toBe(0);
    expect(world.countInContainer(unit, "wood")).toBe(3);
    expect(world.countInContainer(unit, "gel")).toBe(3);
    expect(world.countInContainer(unit, "torch")).toBe(2);
  });

  it("debe desbordar el producto al inventario cuando el almacenamiento se llena", () => {
    const { world, session } = stockedSession(
      { recipes: [recipe("torch", 3, { wood: 1 })] },
      {},
      1,
    );
    world.containers.put(unit, 0, "torch", 998);
    world.inventory.setSlot(0, "wood", 1);
    const step = firstStep(session, "torch", 3);

    const outcome = session.executor.executeStep(step);

    expect(outcome.success).toBe(true);
    expect(outcome.consumed).toEqual([{ itemId: "wood", fromStorage: 0, fromInventory: 1 }]);
    expect(outcome.producedToStorage).toBe(1);
    expect(outcome.producedToInventory).toBe(2);
    expect(world.countInContainer(unit, "torch")).toBe(999);
    expect(world.inventory.countOf("torch")).toBe(2);
    expect(world.inventory.countOf("wood")).toBe(0);
  });

  it("debe rechazar el paso sin tocar nada si faltan materiales", () => {
    const { world, session } = stockedSession(TORCH_CATALOG, { wood: 5, gel: 5 });
    const step = firstStep(session, "torch", 2);
    world.containers.put(unit, 0, "wood", 1);
    const before = dumpWorld(world);

    const outcome = session.executor.executeStep(step);

    expect(outcome.success).toBe(false);
    expect(outcome.error).toBe(CraftErrorCode.INSUFFICIENT_MATERIALS);
    expect(outcome.consumed).toEqual([]);
    expect(dumpWorld(world)).toBe(before);
  });

  it("debe rechazar el paso si el producto no cabe en ningún lado", () => {
    const { world, session } = stockedSession(
      { recipes: [recipe("torch", 1, { wood: 1 })] },
      { wood: 2 },
      1,
    );
    for (let i = 0; i < world.inventory.slots.length; i++) {
      world.inventory.setSlot(i, "sword", 1);
    }
    const step = firstStep(session, "torch", 1);
    const before = dumpWorld(world);

    const outcome = session.executor.executeStep(step);

    expect(outcome.error).toBe(CraftErrorCode.NO_CAPACITY);
    expect(dumpWorld(world)).toBe(before);
  });

  it("debe usar el slot que libera el último ingrediente para el producto", () => {
    const { world, session } = stockedSession(
      { recipes: [recipe("torch", 1, { wood: 1 })] },
      { wood: 1 },
      1,
    );
    for (let i = 0; i < world.inventory.slots.length; i++) {
      world.inventory.setSlot(i, "sword", 1);
    }
    const step = firstStep(session, "torch", 1);

    const outcome = session.executor.executeStep(step);

    expect(outcome.success).toBe(true);
    expect(outcome.producedToStorage).toBe(1);
    expect(world.countInContainer(unit, "torch")).toBe(1);
    expect(world.countInContainer(unit, "wood")).toBe(0);
  });

  it("debe devolver lo retirado si el host entrega menos de lo validado", () => {
    const { world, session } = stockedSession(TORCH_CATALOG, { wood: 5, gel: 5 });
    const step = firstStep(session, "torch", 2);
    const before = dumpWorld(world);
    const realWithdraw = session.provider.tryWithdraw.bind(session.provider);
    vi.spyOn(session.provider, "tryWithdraw").mockImplementation((itemId, count) =>
      itemId === "gel" ? 0 : realWithdraw(itemId, count),
    );

    const outcome = session.executor.executeStep(step);

    expect(outcome.success).toBe(false);
    expect(outcome.error).toBe(CraftErrorCode.WRITE_CONFLICT);
    expect(dumpWorld(world)).toBe(before);
  });

  it("debe devolver los ingredientes si el depósito del producto falla", () => {
    const { world, session } = stockedSession(TORCH_CATALOG, { wood: 5, gel: 5 });
    const step = firstStep(session, "torch", 2);
    const before = dumpWorld(world);
    vi.spyOn(session.provider, "tryDeposit").mockReturnValueOnce(2);
    vi.spyOn(session.provider, "tryDepositToInventory").mockReturnValueOnce(2);

    const outcome = session.executor.executeStep(step);

    expect(outcome.error).toBe(CraftErrorCode.WRITE_CONFLICT);
    expect(dumpWorld(world)).toBe(before);
  });

  it("debe rechazar pasos sin repeticiones o sin ingredientes", () => {
    const { session } = stockedSession(TORCH_CATALOG, { wood: 5, gel: 5 });
    const step = firstStep(session, "torch", 1);

    expect(session.executor.executeStep({ ...step, repeatCount: 0 }).error).toBe(
      CraftErrorCode.INVALID_REQUEST,
    );
    expect(session.executor.executeStep({ ...step, ingredientSources: [] }).error).toBe(
      CraftErrorCode.INVALID_REQUEST,
    );
  });
});
