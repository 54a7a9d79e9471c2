import { Router } from "express";
import type { NetworkController } from "../../infrastructure/controllers/networkController";

export function createNetworkRoutes(controller: NetworkController): Router {
  const router = Router();

  router.post("/api/network/resolve", (req, res) => controller.resolve(req, res));
  router.get("/api/network/nearby", (req, res) => controller.nearby(req, res));

  return router;
}
