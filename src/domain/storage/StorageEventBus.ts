import { EventEmitter } from "node:events";
import { injectable } from "inversify";
import { StorageEventType } from "@/shared/constants/StorageEventEnums";
import type { CraftRequestState } from "@/shared/constants/CraftingEnums";
import type { Position } from "@/shared/types/world";

export interface StorageEventPayloads {
  [StorageEventType.ITEMS_WITHDRAWN]: {
    itemId: string;
    amount: number;
    target: "storage" | "inventory";
  };
  [StorageEventType.ITEMS_DEPOSITED]: {
    itemId: string;
    amount: number;
    target: "storage" | "inventory";
  };
  [StorageEventType.QUICK_STACK_COMPLETED]: {
    moved: number;
    transfers: number;
  };
  [StorageEventType.MEMBERSHIP_OVERRIDDEN]: {
    positions: readonly Readonly<Position>[];
  };
  [StorageEventType.MEMBERSHIP_RESTORED]: {
    positions: readonly Readonly<Position>[] | null;
  };
  [StorageEventType.CRAFT_STATE_CHANGED]: {
    correlationId: string;
    from: CraftRequestState;
    to: CraftRequestState;
  };
  [StorageEventType.CRAFT_STEP_COMPLETED]: {
    index: number;
    itemId: string;
    produced: number;
  };
  [StorageEventType.CRAFT_FINISHED]: {
    itemId: string;
    requested: number;
    produced: number;
    success: boolean;
  };
}

/**
 * Session event bus. Events raised while the engine runs are queued and only
 * delivered when the host calls flushEvents() at the end of its frame.
 */
@injectable()
export class StorageEventBus extends EventEmitter {
  private eventQueue: Array<{ name: StorageEventType; payload: unknown }> = [];
  private batchingEnabled = true;

  constructor() {
    super();
    this.setMaxListeners(50);
  }

  public queueEvent<K extends StorageEventType>(
    name: K,
    payload: StorageEventPayloads[K],
  ): void {
    if (!this.batchingEnabled) {
      super.emit(name, payload);
      return;
    }
    this.eventQueue.push({ name, payload });
  }

  public onEvent<K extends StorageEventType>(
    name: K,
    listener: (payload: StorageEventPayloads[K]) => void,
  ): () => void {
    this.on(name, listener);
    return () => {
      this.off(name, listener);
    };
  }

  public flushEvents(): void {
    if (this.eventQueue.length === 0) return;

    const batch = this.eventQueue.splice(0);
    const wasBatchingEnabled = this.batchingEnabled;

    this.batchingEnabled = false;

    try {
      for (const event of batch) {
        super.emit(event.name, event.payload);
      }
    } finally {
      this.batchingEnabled = wasBatchingEnabled;
    }
  }

  public setBatchingEnabled(enabled: boolean): void {
    this.batchingEnabled = enabled;
    if (!enabled) {
      this.flushEvents();
    }
  }

  public clearQueue(): void {
    this.eventQueue = [];
  }

  public getQueueSize(): number {
    return this.eventQueue.length;
  }
}
