import * as fs from "fs";
import * as path from "path";
import { CONFIG } from "@/config/config";
import { logger, LogCategory } from "@/infrastructure/utils/logger";
import { EnvironmentCondition } from "@/shared/constants/CraftingEnums";
import { NetworkNodeKind } from "@/shared/constants/NetworkEnums";
import type {
  RecipeCatalog,
  RecipeDefinition,
  RecipeGroupDefinition,
  RecipeIngredientDefinition,
} from "@/shared/types/crafting";
import type { SessionSettings } from "@/shared/types/session";
import type { Position } from "@/shared/types/world";
import { isPosition } from "@/shared/utils/PositionUtils";
import { isSpecialUnlock } from "../session/SessionSettings";
import type { ItemDefinition } from "./ItemCatalog";
import { SandboxWorld } from "./SandboxWorld";

/**
 * Loads the sandbox data files (items, recipe catalog, world layout).
 * Malformed files throw; malformed rows are skipped and logged.
 *
 * @module domain/world
 */

export interface LoadedWorld {
  world: SandboxWorld;
  settings: Partial<SessionSettings>;
  registered: Position[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isPositiveInt(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isEnvironmentCondition(value: unknown): value is EnvironmentCondition {
  return Object.values(EnvironmentCondition).some((c) => c === value);
}

function isNodeKind(value: unknown): value is NetworkNodeKind {
  return Object.values(NetworkNodeKind).some((k) => k === value);
}

function readJson(filePath: string): unknown {
  const content = fs.readFileSync(filePath, "utf-8");
  return JSON.parse(content);
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter(isNonEmptyString) : [];
}

export function parseItemDefinitions(raw: unknown): ItemDefinition[] {
  const rows = isRecord(raw) ? raw.items : raw;
  if (!Array.isArray(rows)) {
    throw new Error("Item file must be an array or { items: [] }");
  }

  const items: ItemDefinition[] = [];
  for (const row of rows) {
    if (!isRecord(row) || !isNonEmptyString(row.id)) {
      logger.warn("⚠️ [ITEMS] Skipping malformed item row", LogCategory.SESSION, row);
      continue;
    }
    items.push({
      id: row.id,
      name: isNonEmptyString(row.name) ? row.name : row.id,
      maxStack: isPositiveInt(row.maxStack) ? row.maxStack : CONFIG.DEFAULT_MAX_STACK,
    });
  }
  return items;
}

function parseIngredient(raw: unknown): RecipeIngredientDefinition | undefined {
  if (!isRecord(raw) || !isPositiveInt(raw.count)) return undefined;
  if (isNonEmptyString(raw.itemId)) return { itemId: raw.itemId, count: raw.count };
  if (isNonEmptyString(raw.groupId)) return { groupId: raw.groupId, count: raw.count };
  return undefined;
}

/**
 * Shape check only. Semantic validation happens when the RecipeIndex is built.
 */
export function parseRecipeCatalog(raw: unknown): RecipeCatalog {
  if (!isRecord(raw) || !Array.isArray(raw.recipes)) {
    throw new Error("Recipe file must be { recipes: [], groups?: [] }");
  }

  const recipes: RecipeDefinition[] = [];
  for (const row of raw.recipes) {
    const output = isRecord(row) ? row.output : undefined;
    if (
      !isRecord(row) ||
      !isRecord(output) ||
      !isNonEmptyString(output.itemId) ||
      typeof output.count !== "number" ||
      !Array.isArray(row.ingredients)
    ) {
      logger.warn("⚠️ [RECIPES] Skipping malformed recipe row", LogCategory.RECIPES, row);
      continue;
    }

    const ingredients = row.ingredients.map(parseIngredient);
    const valid = ingredients.filter(
      (i): i is RecipeIngredientDefinition => i !== undefined,
    );
    if (valid.length !== ingredients.length) {
      logger.warn(
        `⚠️ [RECIPES] Skipping recipe for ${output.itemId}: malformed ingredient`,
        LogCategory.RECIPES,
      );
      continue;
    }

    recipes.push({
      output: { itemId: output.itemId, count: output.count },
      ingredients: valid,
      stations: stringList(row.stations),
      conditions: Array.isArray(row.conditions)
        ? row.conditions.filter(isEnvironmentCondition)
        : [],
    });
  }

  const groups: RecipeGroupDefinition[] = [];
  if (Array.isArray(raw.groups)) {
    for (const row of raw.groups) {
      if (!isRecord(row) || !isNonEmptyString(row.id)) continue;
      groups.push({
        id: row.id,
        name: isNonEmptyString(row.name) ? row.name : row.id,
        itemIds: stringList(row.itemIds),
      });
    }
  }

  return { recipes, groups };
}

export function parseSandboxWorld(
  raw: unknown,
  items: readonly ItemDefinition[],
): LoadedWorld {
  if (!isRecord(raw)) throw new Error("World file must be an object");

  const player = isPosition(raw.player) ? raw.player : { x: 0, y: 0 };
  const world = new SandboxWorld(items, player);

  world.stations.setStations(stringList(raw.stations));
  world.stations.setConditions(
    Array.isArray(raw.conditions) ? raw.conditions.filter(isEnvironmentCondition) : [],
  );

  const nodes = Array.isArray(raw.nodes) ? raw.nodes : [];
  for (const node of nodes) {
    if (!isRecord(node) || !isNodeKind(node.kind) || !isPosition(node)) {
      logger.warn("⚠️ [WORLD] Skipping malformed node", LogCategory.SESSION, node);
      continue;
    }
    const width = isPositiveInt(node.width) ? node.width : 1;
    const height = isPositiveInt(node.height) ? node.height : 1;
    const placed =
      node.kind === NetworkNodeKind.UNIT
        ? world.placeUnit(node.x, node.y, {
            width,
            height,
            slots: isPositiveInt(node.slots) ? node.slots : undefined,
          }) !== undefined
        : world.tiles.place(node.kind, node.x, node.y, width, height);
    if (!placed) {
      logger.warn(
        `⚠️ [WORLD] Overlapping node at ${node.x},${node.y} ignored`,
        LogCategory.SESSION,
      );
    }
  }

  const containers = Array.isArray(raw.containers) ? raw.containers : [];
  for (const entry of containers) {
    if (!isRecord(entry) || !isPosition(entry) || !Array.isArray(entry.items)) continue;
    for (const stack of entry.items) {
      if (!isRecord(stack) || !isNonEmptyString(stack.itemId) || !isPositiveInt(stack.stack)) {
        continue;
      }
      world.stock({ x: entry.x, y: entry.y }, stack.itemId, stack.stack);
    }
  }

  const inventory = Array.isArray(raw.inventory) ? raw.inventory : [];
  for (const slot of inventory) {
    if (
      !isRecord(slot) ||
      typeof slot.slot !== "number" ||
      !isNonEmptyString(slot.itemId) ||
      !isPositiveInt(slot.stack)
    ) {
      continue;
    }
    world.inventory.setSlot(slot.slot, slot.itemId, slot.stack, {
      favorited: slot.favorited === true,
    });
  }

  const session = isRecord(raw.session) ? raw.session : {};
  const settings: Partial<SessionSettings> = {
    tier: typeof session.tier === "number" ? session.tier : 0,
    specialUnlocks: Array.isArray(session.specialUnlocks)
      ? session.specialUnlocks.filter(isSpecialUnlock)
      : [],
    rememberedStations: stringList(session.rememberedStations),
    stationMemoryEnabled: session.stationMemoryEnabled !== false,
  };

  const registered = Array.isArray(raw.registered)
    ? raw.registered.filter(isPosition).map((p) => ({ x: p.x, y: p.y }))
    : [];

  return { world, settings, registered };
}

export function loadItemDefinitions(
  filePath = path.join(CONFIG.DATA_DIR, "items.json"),
): ItemDefinition[] {
  return parseItemDefinitions(readJson(filePath));
}

export function loadRecipeCatalog(
  filePath = path.join(CONFIG.DATA_DIR, "recipes.json"),
): RecipeCatalog {
  return parseRecipeCatalog(readJson(filePath));
}

export function loadSandboxWorld(
  items: readonly ItemDefinition[],
  filePath = path.join(CONFIG.DATA_DIR, "sandbox-world.json"),
): LoadedWorld {
  const loaded = parseSandboxWorld(readJson(filePath), items);
  logger.info(
    `🌍 [WORLD] Loaded ${loaded.world.tiles.getTiles().length} network nodes from ${path.basename(filePath)}`,
    LogCategory.SESSION,
  );
  return loaded;
}
