import "dotenv/config";
import "reflect-metadata";
import type { Server } from "http";
import { CONFIG } from "../config/config";
import { createSandboxContainer } from "../config/container";
import { createSessionSettings } from "../domain/session/SessionSettings";
import {
  loadItemDefinitions,
  loadRecipeCatalog,
  loadSandboxWorld,
} from "../domain/world/WorldLoader";
import { logger, LogCategory } from "../infrastructure/utils/logger";
import { createApp } from "./app";

/**
 * Sandbox server entry point.
 *
 * Loads the item, recipe and world files from `DATA_DIR`, builds one session
 * container over the sandbox world and serves it over HTTP.
 *
 * @module application
 */

logger.info("🚀 Backend: Loading sandbox session...", LogCategory.SESSION);

let server: Server | undefined;

try {
  const items = loadItemDefinitions();
  const catalog = loadRecipeCatalog();
  const { world, settings, registered } = loadSandboxWorld(items);

  const container = createSandboxContainer(
    world,
    catalog,
    createSessionSettings(settings),
    registered,
  );
  const app = createApp(container);

  server = app.listen(CONFIG.PORT, () => {
    logger.info(`Sandbox server running on http://localhost:${CONFIG.PORT}`, LogCategory.HTTP);
    logger.info(`Using data directory: ${CONFIG.DATA_DIR}`, LogCategory.SESSION);
  });
} catch (err) {
  logger.error(
    "❌ Backend: Failed to load sandbox session:",
    LogCategory.SESSION,
    err instanceof Error ? err.message : String(err),
  );
  void logger.flush().finally(() => process.exit(1));
}

function shutdown(signal: string): void {
  logger.info(`🛑 Received ${signal}, shutting down`, LogCategory.SESSION);
  if (!server) process.exit(0);
  server.close(() => {
    void logger.flush().finally(() => process.exit(0));
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
