/**
 * Log level enumerations for the storage engine.
 *
 * @module shared/constants/LogEnums
 */

/**
 * Enumeration of log levels.
 */
export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

/**
 * Enumeration of log categories for identifying which subsystem generated the log.
 */
export enum LogCategory {
  /** Network tile traversal and resolution */
  NETWORK = "network",
  /** Container reads, withdrawals and deposits */
  STORAGE = "storage",
  /** Feasibility analysis, planning and execution */
  CRAFTING = "crafting",
  /** Recipe catalog indexing */
  RECIPES = "recipes",
  /** Station and environment availability */
  STATIONS = "stations",
  /** Session lifecycle and world loading */
  SESSION = "session",
  /** HTTP host */
  HTTP = "http",
  /** General/uncategorized logs */
  GENERAL = "general",
}
