import { describe, it, expect, beforeEach, vi } from "vitest";
import { SandboxWorld } from "../../src/domain/world/SandboxWorld";
import {
  CraftErrorCode,
  CraftRequestState,
} from "../../src/shared/constants/CraftingEnums";
import { NetworkErrorCode } from "../../src/shared/constants/NetworkEnums";
import { StorageEventType } from "../../src/shared/constants/StorageEventEnums";
import type { RecipeCatalog } from "../../src/shared/types/crafting";
import { TEST_ITEMS, createTestSession, dumpWorld, recipe, type TestSession } from "../setup";

const root = { x: 0, y: 0 };
const unit = { x: 1, y: 0 };

const SMELTING: RecipeCatalog = {
  recipes: [recipe("iron_bar", 1, { iron_ore: 1 }, { stations: ["furnace"] })],
};

describe("CraftingService", () => {
  let world: SandboxWorld;
  let session: TestSession;

  beforeEach(() => {
    world = new SandboxWorld(TEST_ITEMS);
    world.placeRoot(root.x, root.y);
    world.placeUnit(unit.x, unit.y);
    world.stock(unit, "iron_ore", 5);
    world.stations.setStations(["furnace"]);
    session = createTestSession({ world, catalog: SMELTING });
  });

  describe("request", () => {
    it("debe fabricar desde la red resuelta en el origen", () => {
      const outcome = session.service.request("iron_bar", 3, root);

      expect(outcome.state).toBe(CraftRequestState.COMPLETED);
      expect(outcome.transitions).toEqual([
        CraftRequestState.IDLE,
        CraftRequestState.CHECKING,
        CraftRequestState.PLANNING,
        CraftRequestState.EXECUTING,
        CraftRequestState.COMPLETED,
      ]);
      expect(outcome.error).toBeUndefined();
      expect(outcome.network?.unitPositions).toEqual([unit]);
      expect(outcome.execution?.producedQuantity).toBe(3);
      expect(world.countInContainer(unit, "iron_ore")).toBe(2);
      expect(world.countInContainer(unit, "iron_bar")).toBe(3);
      expect(session.service.getState()).toBe(CraftRequestState.COMPLETED);
    });

    it("debe restaurar la membresía al terminar", () => {
      session.service.request("iron_bar", 3, root);

      expect(session.registry.isUsingTemporaryPositions()).toBe(false);
    });

    it("debe emitir cada transición con el id de correlación", () => {
      const seen: string[] = [];
      const ids = new Set<string>();
      session.events.onEvent(StorageEventType.CRAFT_STATE_CHANGED, (payload) => {
        seen.push(payload.to);
        ids.add(payload.correlationId);
      });

      const outcome = session.service.request("iron_bar", 1, root);
      session.events.flushEvents();

      expect(outcome.correlationId.startsWith("craft-")).toBe(true);
      expect(seen).toEqual([
        CraftRequestState.CHECKING,
        CraftRequestState.PLANNING,
        CraftRequestState.EXECUTING,
        CraftRequestState.COMPLETED,
      ]);
      expect([...ids]).toEqual([outcome.correlationId]);
    });

    it("debe usar solo las unidades de la red aunque haya cofres registrados", () => {
      const registered = { x: 30, y: 30 };
      world.placeUnit(registered.x, registered.y);
      world.stock(registered, "iron_ore", 10);
      world.containers.put(unit, 0, "iron_ore", 1);
      session.registry.register(registered);

      const fromNetwork = session.service.request("iron_bar", 3, root);

      expect(fromNetwork.state).toBe(CraftRequestState.INFEASIBLE);
      expect(fromNetwork.error).toBe(CraftErrorCode.INSUFFICIENT_MATERIALS);
      expect(fromNetwork.network?.unitCount).toBe(1);
      expect(world.countInContainer(registered, "iron_ore")).toBe(10);

      const fromRegistered = session.service.request("iron_bar", 3);

      expect(fromRegistered.state).toBe(CraftRequestState.COMPLETED);
      expect(fromRegistered.network).toBeUndefined();
      expect(world.countInContainer(registered, "iron_ore")).toBe(7);
      expect(world.countInContainer(registered, "iron_bar")).toBe(3);
      expect(world.countInContainer(unit, "iron_ore")).toBe(1);
    });

    it("debe terminar en Infeasible sin plan cuando faltan materiales", () => {
      const outcome = session.service.request("iron_bar", 6, root);

      expect(outcome.state).toBe(CraftRequestState.INFEASIBLE);
      expect(outcome.transitions).toEqual([
        CraftRequestState.IDLE,
        CraftRequestState.CHECKING,
        CraftRequestState.INFEASIBLE,
      ]);
      expect(outcome.check?.shortages).toEqual([
        { itemId: "iron_ore", required: 6, available: 5, missing: 1 },
      ]);
      expect(outcome.plan).toBeUndefined();
      expect(outcome.execution).toBeUndefined();
    });

    it("debe rechazar cantidades inválidas", () => {
      const outcome = session.service.request("iron_bar", 0, root);

      expect(outcome.state).toBe(CraftRequestState.INFEASIBLE);
      expect(outcome.error).toBe(CraftErrorCode.INVALID_REQUEST);
    });

    it("debe reportar NetworkNotFound cuando el origen está vacío", () => {
      const outcome = session.service.request("iron_bar", 1, { x: 5, y: 5 });

      expect(outcome.state).toBe(CraftRequestState.INFEASIBLE);
      expect(outcome.error).toBe(NetworkErrorCode.NETWORK_NOT_FOUND);
      expect(outcome.check).toBeUndefined();
      expect(outcome.network?.unitCount).toBe(0);
    });

    it("debe reportar NoRootConnected para una red sin raíz", () => {
      world.placeUnit(10, 10);

      const outcome = session.service.request("iron_bar", 1, { x: 10, y: 10 });

      expect(outcome.error).toBe(NetworkErrorCode.NO_ROOT_CONNECTED);
      expect(outcome.transitions).toEqual([
        CraftRequestState.IDLE,
        CraftRequestState.CHECKING,
        CraftRequestState.INFEASIBLE,
      ]);
    });

    it("debe terminar en PartialCraftFailure si un paso falla", () => {
      vi.spyOn(session.executor, "executeStep").mockReturnValueOnce({
        success: false,
        error: CraftErrorCode.WRITE_CONFLICT,
        message: "Withdrew 0/2 iron_ore",
        consumed: [],
        producedToStorage: 0,
        producedToInventory: 0,
      });

      const outcome = session.service.request("iron_bar", 2, root);

      expect(outcome.state).toBe(CraftRequestState.PARTIAL_CRAFT_FAILURE);
      expect(outcome.error).toBe(CraftErrorCode.PARTIAL_CRAFT_FAILURE);
      expect(outcome.transitions.slice(-2)).toEqual([
        CraftRequestState.EXECUTING,
        CraftRequestState.PARTIAL_CRAFT_FAILURE,
      ]);
      expect(outcome.execution?.failedStep?.cause).toBe(CraftErrorCode.WRITE_CONFLICT);
      expect(world.countInContainer(unit, "iron_ore")).toBe(5);
    });
  });

  describe("check", () => {
    it("debe evaluar contra la red sin mover nada", () => {
      const before = dumpWorld(world);

      const outcome = session.service.check("iron_bar", 5, root);

      expect(outcome.feasible).toBe(true);
      expect(outcome.network?.unitCount).toBe(1);
      expect(outcome.check?.stepCount).toBe(1);
      expect(dumpWorld(world)).toBe(before);
      expect(session.registry.isUsingTemporaryPositions()).toBe(false);
    });

    it("debe devolver el error de red sin análisis", () => {
      const outcome = session.service.check("iron_bar", 1, { x: 40, y: 40 });

      expect(outcome.feasible).toBe(false);
      expect(outcome.error).toBe(NetworkErrorCode.NETWORK_NOT_FOUND);
      expect(outcome.check).toBeUndefined();
    });

    it("no debe dejar eventos en la cola tras checks repetidos", () => {
      for (let i = 0; i < 100; i++) session.service.check("iron_bar", 1, root);

      expect(session.events.getQueueSize()).toBe(0);
    });

    it("debe usar los cofres registrados cuando no hay origen", () => {
      expect(session.service.check("iron_bar", 1).feasible).toBe(false);

      session.registry.register(unit);

      expect(session.service.check("iron_bar", 1).feasible).toBe(true);
    });
  });
});
