import { Request, Response } from "express";
import { CONFIG } from "../../config/config";
import type { IStorageProvider } from "../../domain/storage/IStorageProvider";
import type { StorageEventBus } from "../../domain/storage/StorageEventBus";
import type { StorageNetworkResolver } from "../../domain/storage/StorageNetworkResolver";
import { HttpStatusCode } from "../../shared/constants/HttpStatusCodes";
import { ResponseStatus } from "../../shared/constants/ResponseEnums";
import type { QuickStackTransfer } from "../../shared/types/storage";
import type { InventoryAccess } from "../../shared/types/world";
import { logger, LogCategory } from "../utils/logger";
import { errorMessage, readInteger, readPosition } from "./requestParsing";

function readFlag(body: unknown, key: string): boolean {
  return typeof body === "object" && body !== null && key in body
    ? Reflect.get(body, key) === true
    : false;
}

/**
 * Controller for the player's storage view and inventory transfers.
 * Events raised by a mutation are flushed before the response is sent.
 */
export class StorageController {
  constructor(
    private readonly provider: IStorageProvider,
    private readonly eventBus: StorageEventBus,
    private readonly resolver: StorageNetworkResolver,
    private readonly inventory: InventoryAccess,
  ) {}

  healthCheck(_req: Request, res: Response): void {
    try {
      res.json({
        status: ResponseStatus.OK,
        containers: this.provider.getRegisteredContainers().length,
      });
    } catch (error) {
      logger.error("Health check failed:", LogCategory.HTTP, errorMessage(error));
      res.status(HttpStatusCode.SERVICE_UNAVAILABLE).json({
        status: ResponseStatus.ERROR,
        message: "Storage unavailable",
      });
    }
  }

  getItems(req: Request, res: Response): void {
    try {
      const hasCenter = req.query.x !== undefined || req.query.y !== undefined;
      if (!hasCenter) {
        res.json({ items: this.provider.getAllItems() });
        return;
      }

      const center = readPosition(req.query);
      const range = readInteger(req.query.range);
      if (!center || range === undefined || range < 0) {
        res.status(HttpStatusCode.BAD_REQUEST).json({
          error: "Integer x, y and a non-negative range are required",
        });
        return;
      }

      res.json({ items: this.provider.getItemsInRange(center, range) });
    } catch (error) {
      logger.error("Error listing items:", LogCategory.HTTP, errorMessage(error));
      res.status(HttpStatusCode.INTERNAL_SERVER_ERROR).json({
        error: "Failed to list items",
      });
    }
  }

  getContainers(_req: Request, res: Response): void {
    try {
      res.json({ containers: this.provider.getRegisteredContainers() });
    } catch (error) {
      logger.error("Error listing containers:", LogCategory.HTTP, errorMessage(error));
      res.status(HttpStatusCode.INTERNAL_SERVER_ERROR).json({
        error: "Failed to list containers",
      });
    }
  }

  /**
   * Body `{ includeHotbar?, includeFavorited?, nearby? }`. With `nearby`, every
   * rooted network within `QUICK_STACK_RADIUS` of the player gets its own pass
   * over its units instead of the registered containers.
   */
  quickStack(req: Request, res: Response): void {
    try {
      const body: unknown = req.body ?? {};
      const includeHotbar = readFlag(body, "includeHotbar");
      const includeFavorited = readFlag(body, "includeFavorited");

      const transfers: QuickStackTransfer[] = [];
      if (!readFlag(body, "nearby")) {
        const moved = this.provider.quickStackInventory(includeHotbar, includeFavorited, transfers);
        this.eventBus.flushEvents();
        res.json({ moved, transfers });
        return;
      }

      const center = this.inventory.getPosition();
      const networks = this.resolver.findNearbyNetworks(center, CONFIG.QUICK_STACK_RADIUS);
      let moved = 0;
      for (const network of networks) {
        moved += this.provider.withTemporaryPositions(network.unitPositions, () =>
          this.provider.quickStackInventory(includeHotbar, includeFavorited, transfers),
        );
      }
      this.eventBus.flushEvents();

      if (moved > 0) {
        logger.info(
          `📦 [QUICK STACK] Deposited ${moved} item(s) into ${networks.length} nearby network(s)`,
          LogCategory.STORAGE,
        );
      }
      res.json({ moved, transfers, networks: networks.length });
    } catch (error) {
      logger.error("Error during quick stack:", LogCategory.HTTP, errorMessage(error));
      res.status(HttpStatusCode.INTERNAL_SERVER_ERROR).json({
        error: "Failed to quick stack",
      });
    }
  }

  depositSlot(req: Request, res: Response): void {
    try {
      const body: unknown = req.body;
      const slot =
        typeof body === "object" && body !== null && "slot" in body
          ? readInteger(body.slot)
          : undefined;
      if (slot === undefined || slot < 0) {
        res.status(HttpStatusCode.BAD_REQUEST).json({
          error: "A non-negative integer slot is required",
        });
        return;
      }
      const singleItemOnly = readFlag(body, "singleItemOnly");

      const moved = this.provider.depositFromInventorySlot(slot, singleItemOnly);
      this.eventBus.flushEvents();

      res.json({ moved });
    } catch (error) {
      logger.error("Error depositing slot:", LogCategory.HTTP, errorMessage(error));
      res.status(HttpStatusCode.INTERNAL_SERVER_ERROR).json({
        error: "Failed to deposit slot",
      });
    }
  }
}
