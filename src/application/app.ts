import express, {
  type Express,
  type Request,
  type Response,
  type NextFunction,
} from "express";
import cors from "cors";
import type { Container } from "inversify";
import { CONFIG } from "../config/config";
import { TYPES } from "../config/Types";
import type { CraftabilityChecker } from "../domain/crafting/CraftabilityChecker";
import type { CraftingService } from "../domain/crafting/CraftingService";
import type { IStorageProvider } from "../domain/storage/IStorageProvider";
import type { StorageEventBus } from "../domain/storage/StorageEventBus";
import type { StorageNetworkResolver } from "../domain/storage/StorageNetworkResolver";
import { CraftingController } from "../infrastructure/controllers/craftingController";
import { NetworkController } from "../infrastructure/controllers/networkController";
import { StorageController } from "../infrastructure/controllers/storageController";
import { logger, LogCategory } from "../infrastructure/utils/logger";
import { HttpStatusCode } from "../shared/constants/HttpStatusCodes";
import type { InventoryAccess } from "../shared/types/world";
import { createCraftingRoutes } from "./routes/craftingRoutes";
import { createNetworkRoutes } from "./routes/networkRoutes";
import { createStorageRoutes } from "./routes/storageRoutes";

/**
 * Express application over one session container.
 *
 * Routes:
 * - `/api/network` - Storage network resolution
 * - `/api/storage` - Item listing, quick stack and slot deposits
 * - `/api/craft` - Feasibility checks, crafting requests and recipe lists
 * - `/health` - Health check endpoint
 *
 * @module application
 */
export function createApp(container: Container): Express {
  const app = express();

  const eventBus = container.get<StorageEventBus>(TYPES.StorageEventBus);
  const provider = container.get<IStorageProvider>(TYPES.StorageProvider);

  const resolver = container.get<StorageNetworkResolver>(TYPES.StorageNetworkResolver);

  const networkController = new NetworkController(resolver);
  const storageController = new StorageController(
    provider,
    eventBus,
    resolver,
    container.get<InventoryAccess>(TYPES.InventoryAccess),
  );
  const craftingController = new CraftingController(
    container.get<CraftingService>(TYPES.CraftingService),
    container.get<CraftabilityChecker>(TYPES.CraftabilityChecker),
    provider,
    eventBus,
  );

  app.use(
    cors({
      origin: CONFIG.ALLOWED_ORIGINS,
      credentials: true,
    }),
  );

  app.use(express.json({ limit: "1mb" }));

  if (process.env.NODE_ENV !== "production") {
    app.use((req: Request, _res: Response, next: NextFunction) => {
      logger.debug(`${req.method} ${req.path}`, LogCategory.HTTP);
      next();
    });
  }

  app.use("/", createStorageRoutes(storageController));
  app.use("/", createNetworkRoutes(networkController));
  app.use("/", createCraftingRoutes(craftingController));

  app.use(
    (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
      if (err instanceof SyntaxError && "body" in err) {
        res.status(HttpStatusCode.BAD_REQUEST).json({ error: "Malformed JSON body" });
        return;
      }
      const errorMessage =
        process.env.NODE_ENV === "production"
          ? "Internal server error"
          : err.message;
      logger.error("Unhandled error:", LogCategory.HTTP, err.message);
      res
        .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
        .json({ error: errorMessage });
    },
  );

  app.use((_req: Request, res: Response): void => {
    res.status(HttpStatusCode.NOT_FOUND).json({ error: "Route not found" });
  });

  return app;
}
