import { inject, injectable } from "inversify";
import { TYPES } from "@/config/Types";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import type {
  Recipe,
  RecipeCatalog,
  RecipeDefinition,
  RecipeGroupDefinition,
  RecipeIngredient,
  UnmetIngredient,
} from "@/shared/types/crafting";

export const GROUP_KEY_PREFIX = "group:";

const EMPTY: readonly Recipe[] = Object.freeze([]);

function isPositiveInt(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Read-only index over the recipe catalog, built once per session.
 *
 * Every recipe for an output is kept in catalog order; which one is used is
 * decided by the checker.
 */
@injectable()
export class RecipeIndex {
  private readonly recipes: Recipe[] = [];
  private readonly byId = new Map<number, Recipe>();
  private readonly byOutput = new Map<string, Recipe[]>();
  private readonly byIngredient = new Map<string, Recipe[]>();
  private readonly byStation = new Map<string, Recipe[]>();
  private readonly summaries = new Map<number, ReadonlyMap<string, number>>();
  private readonly groups = new Map<string, RecipeGroupDefinition>();
  private rejected = 0;

  constructor(@inject(TYPES.RecipeCatalog) catalog: RecipeCatalog) {
    this.build(catalog);
  }

  private build(catalog: RecipeCatalog): void {
    const startedAt = Date.now();

    for (const group of catalog.groups ?? []) {
      const itemIds = [...new Set(group.itemIds.filter((id) => id.length > 0))];
      if (itemIds.length === 0) {
        logger.warn(`📜 [RECIPES] Group ${group.id} has no items`, LogCategory.RECIPES);
        continue;
      }
      this.groups.set(group.id, { id: group.id, name: group.name, itemIds });
    }

    catalog.recipes.forEach((definition, catalogIndex) => {
      const recipe = this.createRecipe(definition, catalogIndex);
      if (!recipe) {
        this.rejected++;
        return;
      }
      this.register(recipe);
    });

    logger.info(
      `📜 [RECIPES] Indexed ${this.recipes.length} recipe(s) for ${this.byOutput.size} item(s) in ${Date.now() - startedAt}ms`,
      LogCategory.RECIPES,
      { rejected: this.rejected, groups: this.groups.size },
    );
  }

  private createRecipe(definition: RecipeDefinition, id: number): Recipe | undefined {
    const { output } = definition;
    if (!output.itemId || !isPositiveInt(output.count)) {
      logger.warn(`📜 [RECIPES] Recipe #${id} has an invalid output`, LogCategory.RECIPES);
      return undefined;
    }

    const ingredients: RecipeIngredient[] = [];
    for (const ingredient of definition.ingredients) {
      if (!isPositiveInt(ingredient.count)) {
        logger.warn(
          `📜 [RECIPES] Recipe #${id} (${output.itemId}) has a non-positive ingredient count`,
          LogCategory.RECIPES,
        );
        return undefined;
      }

      if ("groupId" in ingredient) {
        const group = this.groups.get(ingredient.groupId);
        if (!group) {
          logger.warn(
            `📜 [RECIPES] Recipe #${id} (${output.itemId}) uses unknown group ${ingredient.groupId}`,
            LogCategory.RECIPES,
          );
          return undefined;
        }
        ingredients.push(
          Object.freeze({
            key: `${GROUP_KEY_PREFIX}${group.id}`,
            label: group.name,
            count: ingredient.count,
            validItemIds: Object.freeze([...group.itemIds]),
            groupId: group.id,
          }),
        );
      } else {
        ingredients.push(
          Object.freeze({
            key: ingredient.itemId,
            label: ingredient.itemId,
            count: ingredient.count,
            validItemIds: Object.freeze([ingredient.itemId]),
          }),
        );
      }
    }

    if (ingredients.length === 0) {
      logger.warn(`📜 [RECIPES] Recipe #${id} (${output.itemId}) has no ingredients`, LogCategory.RECIPES);
      return undefined;
    }

    return Object.freeze({
      id,
      output: Object.freeze({ itemId: output.itemId, count: output.count }),
      ingredients: Object.freeze(ingredients),
      stations: Object.freeze([...new Set(definition.stations ?? [])]),
      conditions: Object.freeze([...new Set(definition.conditions ?? [])]),
    });
  }

  private register(recipe: Recipe): void {
    this.recipes.push(recipe);
    this.byId.set(recipe.id, recipe);
    this.push(this.byOutput, recipe.output.itemId, recipe);

    const summary = new Map<string, number>();
    const ingredientItems = new Set<string>();
    for (const ingredient of recipe.ingredients) {
      summary.set(ingredient.key, (summary.get(ingredient.key) ?? 0) + ingredient.count);
      for (const itemId of ingredient.validItemIds) ingredientItems.add(itemId);
    }
    this.summaries.set(recipe.id, summary);
    for (const itemId of ingredientItems) this.push(this.byIngredient, itemId, recipe);
    for (const station of recipe.stations) this.push(this.byStation, station, recipe);
  }

  private push(map: Map<string, Recipe[]>, key: string, recipe: Recipe): void {
    const list = map.get(key);
    if (list) list.push(recipe);
    else map.set(key, [recipe]);
  }

  public getRecipesByOutput(itemId: string): readonly Recipe[] {
    return this.byOutput.get(itemId) ?? EMPTY;
  }

  public getRecipesUsingIngredient(itemId: string): readonly Recipe[] {
    return this.byIngredient.get(itemId) ?? EMPTY;
  }

  public getRecipesByStation(stationId: string): readonly Recipe[] {
    return this.byStation.get(stationId) ?? EMPTY;
  }

  public hasRecipeFor(itemId: string): boolean {
    return this.byOutput.has(itemId);
  }

  public getRecipe(id: number): Recipe | undefined {
    return this.byId.get(id);
  }

  public getAllRecipes(): readonly Recipe[] {
    return this.recipes;
  }

  public getGroup(groupId: string): RecipeGroupDefinition | undefined {
    return this.groups.get(groupId);
  }

  public getRejectedCount(): number {
    return this.rejected;
  }

  public getRecipeCount(): number {
    return this.recipes.length;
  }

  /**
   * Ingredient totals keyed by ingredient key (item id or `group:<id>`).
   */
  public getIngredientSummary(recipe: Recipe): ReadonlyMap<string, number> {
    return this.summaries.get(recipe.id) ?? new Map<string, number>();
  }

  /**
   * Ingredients not covered by `counts` for `times` crafts. Group
   * ingredients count every member item.
   */
  public getUnmetIngredients(
    recipe: Recipe,
    counts: ReadonlyMap<string, number>,
    times = 1,
  ): UnmetIngredient[] {
    const unmet: UnmetIngredient[] = [];
    for (const [key, perCraft] of this.getIngredientSummary(recipe)) {
      const ingredient = recipe.ingredients.find((i) => i.key === key);
      if (!ingredient) continue;
      const available = ingredient.validItemIds.reduce(
        (sum, itemId) => sum + (counts.get(itemId) ?? 0),
        0,
      );
      const required = perCraft * times;
      if (available < required) {
        unmet.push({ key, label: ingredient.label, required, available });
      }
    }
    return unmet;
  }
}
