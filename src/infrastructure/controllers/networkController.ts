import { Request, Response } from "express";
import { CONFIG } from "../../config/config";
import type { StorageNetworkResolver } from "../../domain/storage/StorageNetworkResolver";
import { HttpStatusCode } from "../../shared/constants/HttpStatusCodes";
import { logger, LogCategory } from "../utils/logger";
import {
  errorMessage,
  networkErrorStatus,
  readInteger,
  readPosition,
  serializeNetwork,
} from "./requestParsing";

/**
 * Controller for storage network queries.
 *
 * - POST /api/network/resolve `{ x, y }`
 * - GET /api/network/nearby `?x&y&radius`
 */
export class NetworkController {
  constructor(private readonly resolver: StorageNetworkResolver) {}

  resolve(req: Request, res: Response): void {
    try {
      const origin = readPosition(req.body);
      if (!origin) {
        res.status(HttpStatusCode.BAD_REQUEST).json({
          error: "Integer x and y are required",
        });
        return;
      }

      const resolution = this.resolver.tryResolveNetwork(origin);
      if (!resolution.success) {
        res.status(networkErrorStatus(resolution.error)).json({
          error: resolution.error,
          message: resolution.message,
          network: serializeNetwork(resolution.result),
        });
        return;
      }

      res.json({ network: serializeNetwork(resolution.result) });
    } catch (error) {
      logger.error("Error resolving network:", LogCategory.HTTP, errorMessage(error));
      res.status(HttpStatusCode.INTERNAL_SERVER_ERROR).json({
        error: "Failed to resolve network",
      });
    }
  }

  nearby(req: Request, res: Response): void {
    try {
      const center = readPosition(req.query);
      const radius = readInteger(req.query.radius ?? CONFIG.QUICK_STACK_RADIUS);
      if (!center || radius === undefined || radius < 0) {
        res.status(HttpStatusCode.BAD_REQUEST).json({
          error: "Integer x, y and a non-negative radius are required",
        });
        return;
      }

      const networks = this.resolver.findNearbyNetworks(center, radius);
      res.json({ networks: networks.map(serializeNetwork) });
    } catch (error) {
      logger.error("Error scanning networks:", LogCategory.HTTP, errorMessage(error));
      res.status(HttpStatusCode.INTERNAL_SERVER_ERROR).json({
        error: "Failed to scan networks",
      });
    }
  }
}
