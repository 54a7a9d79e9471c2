import { describe, it, expect, beforeEach, vi } from "vitest";
import type { Request, Response } from "express";
import { SandboxWorld } from "../../src/domain/world/SandboxWorld";
import { StorageController } from "../../src/infrastructure/controllers/storageController";
import { StorageEventType } from "../../src/shared/constants/StorageEventEnums";
import { TEST_ITEMS, createTestSession, type TestSession } from "../setup";

describe("StorageController", () => {
  const unit = { x: 1, y: 0 };
  let world: SandboxWorld;
  let session: TestSession;
  let controller: StorageController;
  let mockReq: Partial<Request>;
  let mockRes: Partial<Response>;
  let json: ReturnType<typeof vi.fn>;
  let status: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    world = new SandboxWorld(TEST_ITEMS);
    world.placeRoot(0, 0);
    world.placeUnit(unit.x, unit.y);
    world.stock(unit, "wood", 10);
    session = createTestSession({ world, registered: [unit] });
    controller = new StorageController(
      session.provider,
      session.events,
      session.resolver,
      world.inventory,
    );

    mockReq = { body: {}, query: {} };
    json = vi.fn();
    status = vi.fn().mockReturnThis();
    mockRes = { json, status };
  });

  it("healthCheck debe contar los contenedores registrados", () => {
    controller.healthCheck(mockReq as Request, mockRes as Response);

    expect(json).toHaveBeenCalledWith({ status: "ok", containers: 1 });
  });

  it("healthCheck debe responder 503 si el proveedor falla", () => {
    vi.spyOn(session.provider, "getRegisteredContainers").mockImplementation(() => {
      throw new Error("Registry unavailable");
    });

    controller.healthCheck(mockReq as Request, mockRes as Response);

    expect(status).toHaveBeenCalledWith(503);
    expect(json).toHaveBeenCalledWith({ status: "error", message: "Storage unavailable" });
  });

  describe("getItems", () => {
    it("debe listar todos los objetos visibles", () => {
      controller.getItems(mockReq as Request, mockRes as Response);

      expect(json).toHaveBeenCalledWith({ items: session.provider.getAllItems() });
    });

    it("debe filtrar por rango", () => {
      mockReq.query = { x: "50", y: "50", range: "5" };

      controller.getItems(mockReq as Request, mockRes as Response);

      expect(json).toHaveBeenCalledWith({ items: [] });
    });

    it("debe responder 400 sin rango", () => {
      mockReq.query = { x: "0", y: "0" };

      controller.getItems(mockReq as Request, mockRes as Response);

      expect(status).toHaveBeenCalledWith(400);
    });
  });

  it("getContainers debe describir cada contenedor registrado", () => {
    controller.getContainers(mockReq as Request, mockRes as Response);

    const [info] = json.mock.calls[0][0].containers;
    expect(info.position).toEqual(unit);
    expect(info.itemCount).toBe(10);
    expect(info.usedSlots).toBe(1);
  });

  describe("quickStack", () => {
    it("debe mover los stacks conocidos y vaciar los eventos", () => {
      world.inventory.setSlot(12, "wood", 4);
      world.inventory.setSlot(13, "gel", 2);
      const moved: number[] = [];
      session.events.onEvent(StorageEventType.QUICK_STACK_COMPLETED, (payload) => {
        moved.push(payload.moved);
      });

      controller.quickStack(mockReq as Request, mockRes as Response);

      expect(json).toHaveBeenCalledWith({
        moved: 4,
        transfers: [{ itemId: "wood", stack: 4, fromSlot: 12, destination: unit }],
      });
      expect(moved).toEqual([4]);
      expect(world.inventory.countOf("gel")).toBe(2);
    });

    it("debe respetar la barra rápida salvo que se incluya", () => {
      world.inventory.setSlot(0, "wood", 3);

      controller.quickStack(mockReq as Request, mockRes as Response);
      expect(json.mock.calls[0][0].moved).toBe(0);

      mockReq.body = { includeHotbar: true };
      controller.quickStack(mockReq as Request, mockRes as Response);
      expect(json.mock.calls[1][0].moved).toBe(3);
    });

    it("debe depositar en cada red cercana con nearby", () => {
      const far = { x: 60, y: 0 };
      world.placeRoot(9, 9);
      world.placeUnit(10, 9);
      world.stock({ x: 10, y: 9 }, "gel", 1);
      world.placeRoot(59, 0);
      world.placeUnit(far.x, far.y);
      world.stock(far, "gel", 1);
      world.inventory.setSlot(12, "wood", 4);
      world.inventory.setSlot(13, "gel", 2);
      mockReq.body = { nearby: true };

      controller.quickStack(mockReq as Request, mockRes as Response);

      expect(json).toHaveBeenCalledWith({
        moved: 6,
        transfers: [
          { itemId: "wood", stack: 4, fromSlot: 12, destination: unit },
          { itemId: "gel", stack: 2, fromSlot: 13, destination: { x: 10, y: 9 } },
        ],
        networks: 2,
      });
      expect(world.countInContainer(unit, "wood")).toBe(14);
      expect(world.countInContainer({ x: 10, y: 9 }, "gel")).toBe(3);
      expect(world.countInContainer(far, "gel")).toBe(1);
      expect(session.registry.isUsingTemporaryPositions()).toBe(false);
      expect(session.events.getQueueSize()).toBe(0);
    });

    it("no debe mover nada con nearby si no hay redes cerca", () => {
      const lonely = new SandboxWorld(TEST_ITEMS, { x: 200, y: 200 });
      lonely.inventory.setSlot(12, "wood", 4);
      const lonelySession = createTestSession({ world: lonely });
      const lonelyController = new StorageController(
        lonelySession.provider,
        lonelySession.events,
        lonelySession.resolver,
        lonely.inventory,
      );
      mockReq.body = { nearby: true };

      lonelyController.quickStack(mockReq as Request, mockRes as Response);

      expect(json).toHaveBeenCalledWith({ moved: 0, transfers: [], networks: 0 });
      expect(lonely.inventory.countOf("wood")).toBe(4);
    });
  });

  describe("depositSlot", () => {
    it("debe depositar un solo objeto cuando se pide", () => {
      world.inventory.setSlot(20, "gel", 6);
      mockReq.body = { slot: 20, singleItemOnly: true };

      controller.depositSlot(mockReq as Request, mockRes as Response);

      expect(json).toHaveBeenCalledWith({ moved: 1 });
      expect(world.inventory.countOf("gel")).toBe(5);
      expect(world.countInContainer(unit, "gel")).toBe(1);
    });

    it("debe responder 400 con un slot inválido", () => {
      mockReq.body = { slot: -1 };

      controller.depositSlot(mockReq as Request, mockRes as Response);

      expect(status).toHaveBeenCalledWith(400);
      expect(json).toHaveBeenCalledWith({ error: "A non-negative integer slot is required" });
    });
  });
});
