import { Router } from "express";
import type { StorageController } from "../../infrastructure/controllers/storageController";

export function createStorageRoutes(controller: StorageController): Router {
  const router = Router();

  router.get("/health", (req, res) => controller.healthCheck(req, res));
  router.get("/api/storage/items", (req, res) => controller.getItems(req, res));
  router.get("/api/storage/containers", (req, res) => controller.getContainers(req, res));
  router.post("/api/storage/quick-stack", (req, res) => controller.quickStack(req, res));
  router.post("/api/storage/deposit-slot", (req, res) => controller.depositSlot(req, res));

  return router;
}
