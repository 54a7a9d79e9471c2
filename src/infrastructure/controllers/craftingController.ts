import { Request, Response } from "express";
import type { CraftabilityChecker } from "../../domain/crafting/CraftabilityChecker";
import type { CraftingService } from "../../domain/crafting/CraftingService";
import type { IStorageProvider } from "../../domain/storage/IStorageProvider";
import type { StorageEventBus } from "../../domain/storage/StorageEventBus";
import { HttpStatusCode } from "../../shared/constants/HttpStatusCodes";
import type {
  CraftabilityResult,
  CraftExecutionResult,
  CraftPlan,
  RecipeCheck,
} from "../../shared/types/crafting";
import type { Position } from "../../shared/types/world";
import { logger, LogCategory } from "../utils/logger";
import {
  craftErrorStatus,
  errorMessage,
  readItemId,
  readPosition,
  readQuantity,
  serializeNetwork,
} from "./requestParsing";

const RECIPE_FILTERS = ["craftable", "partial"] as const;
type RecipeFilter = (typeof RECIPE_FILTERS)[number];

function isRecipeFilter(value: unknown): value is RecipeFilter {
  return RECIPE_FILTERS.some((filter) => filter === value);
}

interface CraftInput {
  itemId: string;
  quantity: number;
  origin?: Position;
}

/**
 * Reads `{ itemId, quantity?, origin? }`. A present but malformed origin is
 * an error, not a request without one.
 */
function readCraftInput(body: unknown): CraftInput | undefined {
  if (typeof body !== "object" || body === null) return undefined;
  const itemId = "itemId" in body ? readItemId(body.itemId) : undefined;
  const quantity = readQuantity("quantity" in body ? body.quantity : undefined);
  if (!itemId || quantity === undefined) return undefined;

  if (!("origin" in body) || body.origin === undefined || body.origin === null) {
    return { itemId, quantity };
  }
  const origin = readPosition(body.origin);
  return origin ? { itemId, quantity, origin } : undefined;
}

function serializeCheck(check: CraftabilityResult): Record<string, unknown> {
  return {
    feasible: check.feasible,
    itemId: check.itemId,
    quantity: check.quantity,
    error: check.error,
    message: check.message,
    shortages: check.shortages,
    missingStations: check.missingStations,
    missingConditions: check.missingConditions,
    rawMaterials: Object.fromEntries(check.rawMaterials),
    stepCount: check.stepCount,
    cyclePath: check.cyclePath,
  };
}

function serializePlan(plan: CraftPlan): Record<string, unknown> {
  return {
    itemId: plan.itemId,
    quantity: plan.quantity,
    rawMaterials: Object.fromEntries(plan.rawMaterials),
    steps: plan.steps.map((step) => ({
      index: step.index,
      recipeId: step.recipe.id,
      output: step.recipe.output.itemId,
      repeatCount: step.repeatCount,
      outputQuantity: step.outputQuantity,
      depth: step.depth,
      ingredientSources: step.ingredientSources,
    })),
  };
}

function serializeExecution(execution: CraftExecutionResult): Record<string, unknown> {
  return {
    ...execution,
    consumed: Object.fromEntries(execution.consumed),
    produced: Object.fromEntries(execution.produced),
  };
}

function serializeRecipeCheck(check: RecipeCheck): Record<string, unknown> {
  return {
    recipeId: check.recipe.id,
    output: check.recipe.output,
    status: check.status,
    maxCraftable: check.maxCraftable,
    missingMaterials: check.missingMaterials,
    missingStations: check.missingStations,
    missingConditions: check.missingConditions,
  };
}

/**
 * Controller for crafting checks and requests.
 *
 * - POST /api/craft/check
 * - POST /api/craft/execute
 * - GET /api/craft/recipes `?filter=craftable|partial`
 */
export class CraftingController {
  constructor(
    private readonly service: CraftingService,
    private readonly checker: CraftabilityChecker,
    private readonly provider: IStorageProvider,
    private readonly eventBus: StorageEventBus,
  ) {}

  check(req: Request, res: Response): void {
    try {
      const input = readCraftInput(req.body);
      if (!input) {
        res.status(HttpStatusCode.BAD_REQUEST).json({
          error: "itemId and a positive integer quantity are required",
        });
        return;
      }

      const outcome = this.service.check(input.itemId, input.quantity, input.origin);
      const status = outcome.feasible ? HttpStatusCode.OK : craftErrorStatus(outcome.error);
      res.status(status).json({
        feasible: outcome.feasible,
        error: outcome.error,
        message: outcome.message,
        network: outcome.network ? serializeNetwork(outcome.network) : undefined,
        check: outcome.check ? serializeCheck(outcome.check) : undefined,
      });
    } catch (error) {
      logger.error("Error checking craft:", LogCategory.HTTP, errorMessage(error));
      res.status(HttpStatusCode.INTERNAL_SERVER_ERROR).json({
        error: "Failed to check craft",
      });
    }
  }

  execute(req: Request, res: Response): void {
    try {
      const input = readCraftInput(req.body);
      if (!input) {
        res.status(HttpStatusCode.BAD_REQUEST).json({
          error: "itemId and a positive integer quantity are required",
        });
        return;
      }

      const outcome = this.service.request(input.itemId, input.quantity, input.origin);
      this.eventBus.flushEvents();

      res.status(craftErrorStatus(outcome.error)).json({
        correlationId: outcome.correlationId,
        state: outcome.state,
        transitions: outcome.transitions,
        error: outcome.error,
        network: outcome.network ? serializeNetwork(outcome.network) : undefined,
        check: outcome.check ? serializeCheck(outcome.check) : undefined,
        plan: outcome.plan ? serializePlan(outcome.plan) : undefined,
        execution: outcome.execution ? serializeExecution(outcome.execution) : undefined,
      });
    } catch (error) {
      logger.error("Error executing craft:", LogCategory.HTTP, errorMessage(error));
      res.status(HttpStatusCode.INTERNAL_SERVER_ERROR).json({
        error: "Failed to execute craft",
      });
    }
  }

  listRecipes(req: Request, res: Response): void {
    try {
      const filter = req.query.filter ?? "craftable";
      if (!isRecipeFilter(filter)) {
        res.status(HttpStatusCode.BAD_REQUEST).json({
          error: `filter must be one of ${RECIPE_FILTERS.join(", ")}`,
        });
        return;
      }

      const view = this.provider.getMaterialView();
      const checks =
        filter === "craftable"
          ? this.checker.getCraftableRecipes(view)
          : this.checker.getPartialRecipes(view);
      res.json({ filter, recipes: checks.map(serializeRecipeCheck) });
    } catch (error) {
      logger.error("Error listing recipes:", LogCategory.HTTP, errorMessage(error));
      res.status(HttpStatusCode.INTERNAL_SERVER_ERROR).json({
        error: "Failed to list recipes",
      });
    }
  }
}
