import { describe, it, expect, beforeEach } from "vitest";
import { StorageEventBus } from "../../src/domain/storage/StorageEventBus";
import { CraftRequestState } from "../../src/shared/constants/CraftingEnums";
import { StorageEventType } from "../../src/shared/constants/StorageEventEnums";

describe("StorageEventBus", () => {
  let bus: StorageEventBus;
  let listener: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    bus = new StorageEventBus();
    listener = vi.fn();
  });

  describe("queueEvent", () => {
    it("debe encolar el evento hasta el flush", () => {
      bus.onEvent(StorageEventType.ITEMS_DEPOSITED, listener);

      bus.queueEvent(StorageEventType.ITEMS_DEPOSITED, {
        itemId: "wood",
        amount: 3,
        target: "storage",
      });

      expect(bus.getQueueSize()).toBe(1);
      expect(listener).not.toHaveBeenCalled();

      bus.flushEvents();
      expect(listener).toHaveBeenCalledWith({ itemId: "wood", amount: 3, target: "storage" });
    });

    it("debe emitir inmediatamente si batching deshabilitado", () => {
      bus.setBatchingEnabled(false);
      bus.onEvent(StorageEventType.QUICK_STACK_COMPLETED, listener);

      bus.queueEvent(StorageEventType.QUICK_STACK_COMPLETED, { moved: 4, transfers: 1 });

      expect(listener).toHaveBeenCalledWith({ moved: 4, transfers: 1 });
      expect(bus.getQueueSize()).toBe(0);
    });
  });

  describe("flushEvents", () => {
    it("debe entregar los eventos en orden de llegada", () => {
      const order: string[] = [];
      bus.onEvent(StorageEventType.CRAFT_STATE_CHANGED, (payload) => order.push(payload.to));

      bus.queueEvent(StorageEventType.CRAFT_STATE_CHANGED, {
        correlationId: "craft-1",
        from: CraftRequestState.IDLE,
        to: CraftRequestState.CHECKING,
      });
      bus.queueEvent(StorageEventType.CRAFT_STATE_CHANGED, {
        correlationId: "craft-1",
        from: CraftRequestState.CHECKING,
        to: CraftRequestState.INFEASIBLE,
      });
      bus.flushEvents();

      expect(order).toEqual([CraftRequestState.CHECKING, CraftRequestState.INFEASIBLE]);
      expect(bus.getQueueSize()).toBe(0);
    });

    it("debe entregar en el mismo flush lo que emite un listener", () => {
      bus.onEvent(StorageEventType.CRAFT_FINISHED, listener);
      bus.onEvent(StorageEventType.CRAFT_STEP_COMPLETED, () => {
        bus.queueEvent(StorageEventType.CRAFT_FINISHED, {
          itemId: "torch",
          requested: 3,
          produced: 3,
          success: true,
        });
      });

      bus.queueEvent(StorageEventType.CRAFT_STEP_COMPLETED, {
        index: 0,
        itemId: "torch",
        produced: 3,
      });
      bus.flushEvents();

      expect(listener).toHaveBeenCalledTimes(1);
      expect(bus.getQueueSize()).toBe(0);
    });
  });

  it("onEvent debe devolver una función para desuscribirse", () => {
    const unsubscribe = bus.onEvent(StorageEventType.ITEMS_WITHDRAWN, listener);

    unsubscribe();
    bus.queueEvent(StorageEventType.ITEMS_WITHDRAWN, {
      itemId: "gel",
      amount: 1,
      target: "inventory",
    });
    bus.flushEvents();

    expect(listener).not.toHaveBeenCalled();
  });

  it("clearQueue debe descartar los eventos pendientes", () => {
    bus.onEvent(StorageEventType.ITEMS_WITHDRAWN, listener);
    bus.queueEvent(StorageEventType.ITEMS_WITHDRAWN, {
      itemId: "gel",
      amount: 1,
      target: "inventory",
    });

    bus.clearQueue();
    bus.flushEvents();

    expect(listener).not.toHaveBeenCalled();
  });
});
