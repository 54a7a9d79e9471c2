import path from "path";

/**
 * Application configuration loaded from environment variables.
 *
 * The server entry loads `.env` through dotenv before this module is read.
 *
 * @module config
 */

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

/**
 * @property PORT - HTTP port of the sandbox host (default: 8080)
 * @property MAX_NETWORK_NODES - Traversal bound of the network resolver
 * @property MAX_CRAFT_DEPTH - Hard cap on recipe recursion depth
 * @property MAX_CRAFT_EXPANSIONS - Hard cap on recipe expansions per analysis
 * @property MAX_CRAFT_QUANTITY - Largest quantity accepted per request
 * @property INVENTORY_SLOTS - Player inventory size
 * @property HOTBAR_SLOTS - Leading inventory slots skipped by quick stack
 * @property CONTAINER_SLOTS - Default size of a storage unit
 * @property QUICK_STACK_RADIUS - Tile radius scanned for nearby networks
 * @property DATA_DIR - Directory holding the item, recipe and world files
 */
export const CONFIG = {
  PORT: readInt("PORT", 8080),
  MAX_NETWORK_NODES: readInt("MAX_NETWORK_NODES", 4096),
  MAX_CRAFT_DEPTH: readInt("MAX_CRAFT_DEPTH", 10),
  MAX_CRAFT_EXPANSIONS: readInt("MAX_CRAFT_EXPANSIONS", 5000),
  MAX_CRAFT_QUANTITY: readInt("MAX_CRAFT_QUANTITY", 9999),
  INVENTORY_SLOTS: readInt("INVENTORY_SLOTS", 50),
  HOTBAR_SLOTS: readInt("HOTBAR_SLOTS", 10),
  CONTAINER_SLOTS: readInt("CONTAINER_SLOTS", 40),
  DEFAULT_MAX_STACK: readInt("DEFAULT_MAX_STACK", 9999),
  QUICK_STACK_RADIUS: readInt("QUICK_STACK_RADIUS", 20),
  DATA_DIR: process.env.DATA_DIR
    ? path.resolve(process.env.DATA_DIR)
    : path.join(process.cwd(), "data"),
  ALLOWED_ORIGINS: process.env.ALLOWED_ORIGINS?.split(",") ?? "*",
} as const;
