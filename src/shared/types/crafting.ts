import type {
  CraftErrorCode,
  CraftRequestState,
  CraftStatus,
  EnvironmentCondition,
} from "../constants/CraftingEnums";
import type { NetworkErrorCode } from "../constants/NetworkEnums";
import type { StorageNetworkResult } from "./storage";

export interface ItemAmount {
  itemId: string;
  count: number;
}

/**
 * Catalog feed rows, as supplied by the host once per session.
 */
export type RecipeIngredientDefinition =
  | { itemId: string; count: number }
  | { groupId: string; count: number };

export interface RecipeDefinition {
  output: ItemAmount;
  ingredients: RecipeIngredientDefinition[];
  stations?: string[];
  conditions?: EnvironmentCondition[];
}

/**
 * Ingredient alternatives: any listed item satisfies a group ingredient.
 */
export interface RecipeGroupDefinition {
  id: string;
  name: string;
  itemIds: string[];
}

export interface RecipeCatalog {
  recipes: RecipeDefinition[];
  groups?: RecipeGroupDefinition[];
}

export interface RecipeIngredient {
  /** itemId for plain ingredients, `group:<id>` for groups */
  readonly key: string;
  readonly label: string;
  readonly count: number;
  readonly validItemIds: readonly string[];
  readonly groupId?: string;
}

export interface Recipe {
  /** Position in the catalog feed */
  readonly id: number;
  readonly output: Readonly<ItemAmount>;
  readonly ingredients: readonly RecipeIngredient[];
  readonly stations: readonly string[];
  readonly conditions: readonly EnvironmentCondition[];
}

export interface UnmetIngredient {
  readonly key: string;
  readonly label: string;
  readonly required: number;
  readonly available: number;
}

export interface MaterialShortage {
  readonly itemId: string;
  readonly required: number;
  readonly available: number;
  readonly missing: number;
}

/**
 * Concrete items drawn for one step, split by origin.
 */
export interface IngredientSource {
  readonly itemId: string;
  readonly fromStorage: number;
  readonly fromInventory: number;
}

export interface CraftStep {
  readonly index: number;
  readonly recipe: Recipe;
  readonly repeatCount: number;
  readonly outputQuantity: number;
  /** 0 for the requested item, +1 per intermediate level */
  readonly depth: number;
  readonly ingredientSources: readonly IngredientSource[];
}

export interface CraftPlan {
  readonly itemId: string;
  readonly quantity: number;
  readonly steps: readonly CraftStep[];
  readonly rawMaterials: ReadonlyMap<string, number>;
}

export interface CraftabilityResult {
  readonly feasible: boolean;
  readonly itemId: string;
  readonly quantity: number;
  readonly error?: CraftErrorCode;
  readonly message?: string;
  readonly shortages: readonly MaterialShortage[];
  readonly missingStations: readonly string[];
  readonly missingConditions: readonly EnvironmentCondition[];
  /** Net draw on the starting materials */
  readonly rawMaterials: ReadonlyMap<string, number>;
  readonly stepCount: number;
  readonly cyclePath?: readonly string[];
}

export interface RecipeCheck {
  readonly recipe: Recipe;
  readonly status: CraftStatus;
  readonly maxCraftable: number;
  readonly missingMaterials: readonly UnmetIngredient[];
  readonly missingStations: readonly string[];
  readonly missingConditions: readonly EnvironmentCondition[];
}

export interface StepOutcome {
  readonly success: boolean;
  readonly error?: CraftErrorCode;
  readonly message?: string;
  readonly consumed: readonly IngredientSource[];
  readonly producedToStorage: number;
  readonly producedToInventory: number;
}

export interface FailedStepInfo {
  readonly index: number;
  readonly recipeId: number;
  readonly itemId: string;
  readonly cause: CraftErrorCode;
  readonly message?: string;
}

export interface CraftExecutionResult {
  readonly success: boolean;
  readonly state: CraftRequestState.COMPLETED | CraftRequestState.PARTIAL_CRAFT_FAILURE;
  readonly error?: CraftErrorCode;
  readonly itemId: string;
  readonly requestedQuantity: number;
  readonly producedQuantity: number;
  readonly completedSteps: number;
  readonly totalSteps: number;
  readonly failedStep?: FailedStepInfo;
  readonly consumed: ReadonlyMap<string, number>;
  readonly produced: ReadonlyMap<string, number>;
}

export interface CraftRequestOutcome {
  readonly correlationId: string;
  readonly state: CraftRequestState;
  readonly transitions: readonly CraftRequestState[];
  readonly error?: CraftErrorCode | NetworkErrorCode;
  readonly network?: StorageNetworkResult;
  readonly check?: CraftabilityResult;
  readonly plan?: CraftPlan;
  readonly execution?: CraftExecutionResult;
}

export interface CraftCheckOutcome {
  readonly feasible: boolean;
  readonly error?: CraftErrorCode | NetworkErrorCode;
  readonly message?: string;
  readonly network?: StorageNetworkResult;
  readonly check?: CraftabilityResult;
}
