import { inject, injectable } from "inversify";
import { CONFIG } from "@/config/config";
import { TYPES } from "@/config/Types";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import {
  CraftErrorCode,
  CraftStatus,
  type EnvironmentCondition,
} from "@/shared/constants/CraftingEnums";
import type {
  CraftabilityResult,
  CraftStep,
  IngredientSource,
  MaterialShortage,
  Recipe,
  RecipeCheck,
  RecipeIngredient,
} from "@/shared/types/crafting";
import type { SessionSettings } from "@/shared/types/session";
import type { MaterialView } from "@/shared/types/storage";
import type { ItemCatalogAccess } from "@/shared/types/world";
import { resolveCraftDepth } from "../session/SessionSettings";
import { MaterialPool } from "./MaterialPool";
import { RecipeIndex } from "./RecipeIndex";
import { StationTracker, type CraftingEnvironment } from "./StationTracker";

interface Failure {
  error: CraftErrorCode;
  message: string;
  shortages: MaterialShortage[];
  missingStations: string[];
  missingConditions: EnvironmentCondition[];
  cyclePath?: string[];
}

interface PendingStep {
  recipe: Recipe;
  repeatCount: number;
  outputQuantity: number;
  depth: number;
  ingredientSources: IngredientSource[];
}

interface AnalysisContext {
  pool: MaterialPool;
  steps: PendingStep[];
  consumed: Map<string, number>;
  produced: Map<string, number>;
  expansions: number;
  exhausted: boolean;
  readonly environment: CraftingEnvironment;
  readonly maxDepth: number;
}

interface ContextSnapshot {
  pool: MaterialPool;
  stepCount: number;
  consumed: Map<string, number>;
  produced: Map<string, number>;
}

type SourceTally = Map<string, { fromStorage: number; fromInventory: number }>;

/**
 * Outcome of an analysis: the public result plus the steps, leaves first,
 * that make it true.
 */
export interface CraftAnalysis {
  readonly result: CraftabilityResult;
  readonly steps: readonly CraftStep[];
}

function addTo(map: Map<string, number>, itemId: string, amount: number): void {
  if (amount <= 0) return;
  map.set(itemId, (map.get(itemId) ?? 0) + amount);
}

function mergeCounts(view: MaterialView): Map<string, number> {
  const totals = new Map(view.storage);
  for (const [itemId, amount] of view.inventory) addTo(totals, itemId, amount);
  return totals;
}

/**
 * Pure feasibility analysis.
 *
 * The starting view is copied into a local pool that the recursion draws
 * from, so sibling branches compete for the same materials. For each
 * ingredient the pool is drawn first; any shortfall is produced by the
 * ingredient's recipes, tried in catalog order on a snapshot that is thrown
 * away when the alternative fails. The item path is carried down and an item
 * met twice on it ends that branch with CyclicRecipe. The requested item
 * itself is always crafted, never taken from stock.
 */
@injectable()
export class CraftabilityChecker {
  constructor(
    @inject(TYPES.RecipeIndex) private readonly index: RecipeIndex,
    @inject(TYPES.StationTracker) private readonly stations: StationTracker,
    @inject(TYPES.ItemCatalog) private readonly catalog: ItemCatalogAccess,
    @inject(TYPES.SessionSettings) private readonly settings: SessionSettings,
  ) {}

  public canCraft(itemId: string, quantity: number, view: MaterialView): CraftabilityResult {
    return this.analyze(itemId, quantity, view).result;
  }

  public analyze(itemId: string, quantity: number, view: MaterialView): CraftAnalysis {
    if (
      typeof itemId !== "string" ||
      itemId.length === 0 ||
      !Number.isInteger(quantity) ||
      quantity <= 0 ||
      quantity > CONFIG.MAX_CRAFT_QUANTITY
    ) {
      return this.reject(itemId, quantity, {
        error: CraftErrorCode.INVALID_REQUEST,
        message: `Quantity must be an integer between 1 and ${CONFIG.MAX_CRAFT_QUANTITY}`,
        shortages: [],
        missingStations: [],
        missingConditions: [],
      });
    }

    if (!this.index.hasRecipeFor(itemId)) {
      return this.reject(itemId, quantity, {
        error: CraftErrorCode.NO_RECIPE,
        message: `No recipe produces ${itemId}`,
        shortages: [],
        missingStations: [],
        missingConditions: [],
      });
    }

    const context: AnalysisContext = {
      pool: MaterialPool.fromView(view),
      steps: [],
      consumed: new Map(),
      produced: new Map(),
      expansions: 0,
      exhausted: false,
      environment: this.stations.snapshot(),
      maxDepth: resolveCraftDepth(this.settings),
    };

    const failure = this.produce(itemId, quantity, context, 0, []);
    if (failure) {
      logger.debug(
        `🧮 [CHECK] ${quantity}x ${itemId} not craftable: ${failure.error}`,
        LogCategory.CRAFTING,
        { message: failure.message },
      );
      return this.reject(itemId, quantity, failure);
    }

    const rawMaterials = new Map<string, number>();
    for (const [consumedId, amount] of context.consumed) {
      addTo(rawMaterials, consumedId, amount - (context.produced.get(consumedId) ?? 0));
    }

    const steps: CraftStep[] = context.steps.map((step, index) =>
      Object.freeze({
        index,
        recipe: step.recipe,
        repeatCount: step.repeatCount,
        outputQuantity: step.outputQuantity,
        depth: step.depth,
        ingredientSources: Object.freeze(step.ingredientSources.map((s) => Object.freeze(s))),
      }),
    );

    logger.debug(
      `🧮 [CHECK] ${quantity}x ${itemId} craftable in ${steps.length} step(s)`,
      LogCategory.CRAFTING,
    );

    return {
      result: Object.freeze({
        feasible: true,
        itemId,
        quantity,
        shortages: Object.freeze([]),
        missingStations: Object.freeze([]),
        missingConditions: Object.freeze([]),
        rawMaterials,
        stepCount: steps.length,
      }),
      steps: Object.freeze(steps),
    };
  }

  private reject(itemId: string, quantity: number, failure: Failure): CraftAnalysis {
    return {
      result: Object.freeze({
        feasible: false,
        itemId,
        quantity,
        error: failure.error,
        message: failure.message,
        shortages: Object.freeze(failure.shortages),
        missingStations: Object.freeze(failure.missingStations),
        missingConditions: Object.freeze(failure.missingConditions),
        rawMaterials: new Map<string, number>(),
        stepCount: 0,
        cyclePath: failure.cyclePath ? Object.freeze(failure.cyclePath) : undefined,
      }),
      steps: Object.freeze([]),
    };
  }

  private failure(error: CraftErrorCode, message: string): Failure {
    return { error, message, shortages: [], missingStations: [], missingConditions: [] };
  }

  private snapshotContext(context: AnalysisContext): ContextSnapshot {
    return {
      pool: context.pool.clone(),
      stepCount: context.steps.length,
      consumed: new Map(context.consumed),
      produced: new Map(context.produced),
    };
  }

  private restoreContext(context: AnalysisContext, snapshot: ContextSnapshot): void {
    context.pool = snapshot.pool;
    context.steps.length = snapshot.stepCount;
    context.consumed = snapshot.consumed;
    context.produced = snapshot.produced;
  }

  /**
   * Crafts `amount` of `itemId` into the pool using the first recipe that works.
   * Leaves the context untouched on failure.
   */
  private produce(
    itemId: string,
    amount: number,
    context: AnalysisContext,
    depth: number,
    path: readonly string[],
  ): Failure | null {
    if (path.includes(itemId)) {
      const cyclePath = [...path.slice(path.indexOf(itemId)), itemId];
      return {
        ...this.failure(
          CraftErrorCode.CYCLIC_RECIPE,
          `Recipe cycle: ${cyclePath.join(" -> ")}`,
        ),
        cyclePath,
      };
    }
    if (depth >= context.maxDepth) {
      return this.failure(
        CraftErrorCode.RECURSION_LIMIT,
        `Depth limit ${context.maxDepth} reached while expanding ${itemId}`,
      );
    }

    const recipes = this.index.getRecipesByOutput(itemId);
    let firstFailure: Failure | null = null;
    for (const recipe of recipes) {
      if (context.expansions >= CONFIG.MAX_CRAFT_EXPANSIONS) {
        context.exhausted = true;
        return this.failure(
          CraftErrorCode.RECURSION_LIMIT,
          `Expansion limit ${CONFIG.MAX_CRAFT_EXPANSIONS} reached while expanding ${itemId}`,
        );
      }
      context.expansions++;

      const snapshot = this.snapshotContext(context);
      const failure = this.applyRecipe(recipe, amount, context, depth, [...path, itemId]);
      if (!failure) return null;

      this.restoreContext(context, snapshot);
      if (context.exhausted) return failure;
      firstFailure ??= failure;
    }

    return firstFailure ?? this.failure(CraftErrorCode.NO_RECIPE, `No recipe produces ${itemId}`);
  }

  private applyRecipe(
    recipe: Recipe,
    amount: number,
    context: AnalysisContext,
    depth: number,
    path: readonly string[],
  ): Failure | null {
    const missingStations = recipe.stations.filter(
      (station) => !context.environment.stations.has(station),
    );
    const missingConditions = recipe.conditions.filter(
      (condition) => !context.environment.conditions.has(condition),
    );
    if (missingStations.length > 0 || missingConditions.length > 0) {
      return {
        error: CraftErrorCode.STATION_MISSING,
        message: `${recipe.output.itemId} needs ${[...missingStations, ...missingConditions].join(", ")}`,
        shortages: [],
        missingStations,
        missingConditions,
      };
    }

    const repeatCount = Math.ceil(amount / recipe.output.count);
    const tally: SourceTally = new Map();
    for (const ingredient of recipe.ingredients) {
      const failure = this.acquire(
        ingredient,
        ingredient.count * repeatCount,
        context,
        depth,
        path,
        tally,
      );
      if (failure) return failure;
    }

    const outputQuantity = recipe.output.count * repeatCount;
    context.pool.add(recipe.output.itemId, outputQuantity);
    addTo(context.produced, recipe.output.itemId, outputQuantity);
    context.steps.push({
      recipe,
      repeatCount,
      outputQuantity,
      depth,
      ingredientSources: [...tally].map(([itemId, split]) => ({ itemId, ...split })),
    });
    return null;
  }

  /**
   * Draws `needed` units of an ingredient from the pool, crafting the shortfall.
   */
  private acquire(
    ingredient: RecipeIngredient,
    needed: number,
    context: AnalysisContext,
    depth: number,
    path: readonly string[],
    tally: SourceTally,
  ): Failure | null {
    let remaining = needed;
    for (const itemId of ingredient.validItemIds) {
      if (remaining === 0) break;
      remaining -= this.draw(itemId, remaining, context, tally);
    }
    if (remaining === 0) return null;

    let firstFailure: Failure | null = null;
    for (const itemId of ingredient.validItemIds) {
      if (!this.index.hasRecipeFor(itemId)) continue;

      const failure = this.produce(itemId, remaining, context, depth + 1, path);
      if (!failure) {
        this.draw(itemId, remaining, context, tally);
        return null;
      }
      if (context.exhausted) return failure;
      firstFailure ??= failure;
    }
    if (firstFailure) return firstFailure;

    return {
      error: CraftErrorCode.INSUFFICIENT_MATERIALS,
      message: `Missing ${remaining}x ${ingredient.label}`,
      shortages: [
        {
          itemId: ingredient.key,
          required: needed,
          available: needed - remaining,
          missing: remaining,
        },
      ],
      missingStations: [],
      missingConditions: [],
    };
  }

  private draw(
    itemId: string,
    amount: number,
    context: AnalysisContext,
    tally: SourceTally,
  ): number {
    const taken = context.pool.takeUpTo(itemId, amount);
    const total = taken.fromStorage + taken.fromInventory;
    if (total === 0) return 0;

    const entry = tally.get(itemId);
    if (entry) {
      entry.fromStorage += taken.fromStorage;
      entry.fromInventory += taken.fromInventory;
    } else {
      tally.set(itemId, { fromStorage: taken.fromStorage, fromInventory: taken.fromInventory });
    }
    addTo(context.consumed, itemId, total);
    return total;
  }

  // --- single-level recipe queries ---------------------------------------

  public checkRecipe(recipe: Recipe, view: MaterialView): RecipeCheck {
    return this.evaluate(recipe, mergeCounts(view), this.stations.snapshot());
  }

  /**
   * Recipes craftable right now from direct materials, sorted by output name.
   */
  public getCraftableRecipes(view: MaterialView): RecipeCheck[] {
    const totals = mergeCounts(view);
    const environment = this.stations.snapshot();
    return this.index
      .getAllRecipes()
      .map((recipe) => this.evaluate(recipe, totals, environment))
      .filter((check) => check.status === CraftStatus.CRAFTABLE)
      .sort(
        (a, b) =>
          this.catalog
            .getName(a.recipe.output.itemId)
            .localeCompare(this.catalog.getName(b.recipe.output.itemId)) ||
          a.recipe.id - b.recipe.id,
      );
  }

  /**
   * Recipes with some but not all materials present, fewest missing first.
   */
  public getPartialRecipes(view: MaterialView): RecipeCheck[] {
    const totals = mergeCounts(view);
    const environment = this.stations.snapshot();
    return this.index
      .getAllRecipes()
      .map((recipe) => this.evaluate(recipe, totals, environment))
      .filter(
        (check) =>
          check.status === CraftStatus.MISSING_MATERIALS &&
          check.recipe.ingredients.some((ingredient) =>
            ingredient.validItemIds.some((itemId) => (totals.get(itemId) ?? 0) > 0),
          ),
      )
      .sort(
        (a, b) =>
          a.missingMaterials.length - b.missingMaterials.length ||
          a.recipe.id - b.recipe.id,
      );
  }

  private evaluate(
    recipe: Recipe,
    totals: ReadonlyMap<string, number>,
    environment: CraftingEnvironment,
  ): RecipeCheck {
    if (this.index.getRecipe(recipe.id) !== recipe) {
      return {
        recipe,
        status: CraftStatus.INVALID_RECIPE,
        maxCraftable: 0,
        missingMaterials: [],
        missingStations: [],
        missingConditions: [],
      };
    }

    const missingStations = this.stations.getMissingStations(recipe, environment);
    const missingConditions = this.stations.getMissingConditions(recipe, environment);
    const missingMaterials = this.index.getUnmetIngredients(recipe, totals, 1);

    let maxCraftable = Number.POSITIVE_INFINITY;
    for (const [key, perCraft] of this.index.getIngredientSummary(recipe)) {
      const ingredient = recipe.ingredients.find((i) => i.key === key);
      if (!ingredient) continue;
      const available = ingredient.validItemIds.reduce(
        (sum, itemId) => sum + (totals.get(itemId) ?? 0),
        0,
      );
      maxCraftable = Math.min(maxCraftable, Math.floor(available / perCraft));
    }
    if (!Number.isFinite(maxCraftable)) maxCraftable = 0;

    let status = CraftStatus.CRAFTABLE;
    if (missingStations.length > 0) status = CraftStatus.MISSING_STATION;
    else if (missingConditions.length > 0) status = CraftStatus.MISSING_ENVIRONMENT;
    else if (maxCraftable < 1) status = CraftStatus.MISSING_MATERIALS;

    return {
      recipe,
      status,
      maxCraftable,
      missingMaterials,
      missingStations,
      missingConditions,
    };
  }
}
