import { Router } from "express";
import type { CraftingController } from "../../infrastructure/controllers/craftingController";

export function createCraftingRoutes(controller: CraftingController): Router {
  const router = Router();

  router.post("/api/craft/check", (req, res) => controller.check(req, res));
  router.post("/api/craft/execute", (req, res) => controller.execute(req, res));
  router.get("/api/craft/recipes", (req, res) => controller.listRecipes(req, res));

  return router;
}
