/* eslint-disable no-console */
import * as fs from "fs";
import * as path from "path";
import { RandomUtils } from "@/shared/utils/RandomUtils";

/**
 * Logging utility for the engine and its HTTP host.
 *
 * Features:
 * - Console output with colored levels, filtered by LOG_LEVEL
 * - Memory buffer queryable by level, category and correlation id
 * - JSON Lines evacuation to LOG_DIR (only when LOG_DIR is set)
 * - Correlation IDs for tracking one crafting request end to end
 * - Aggregated metrics per category/level
 * - Throttling to prevent log spam from per-frame queries
 */

import { LogLevel, LogCategory } from "../../shared/constants/LogEnums";

export interface LogEntry {
  id: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  timestamp: string;
  timestampMs: number;
  /** Links the entries of one request */
  correlationId?: string;
  data?: unknown;
}

interface LogMetrics {
  byLevel: Record<LogLevel, number>;
  byCategory: Record<LogCategory, number>;
  startTime: number;
  endTime: number;
  totalCount: number;
}

export interface LogFilter {
  levels?: LogLevel[];
  categories?: LogCategory[];
  correlationId?: string;
  startTime?: number;
  endTime?: number;
  /** Case-insensitive text search in message */
  messageContains?: string;
  limit?: number;
}

/** `silent` disables console output; entries are still buffered. */
export type ConsoleLevel = LogLevel | "silent";

interface LoggerConfig {
  maxMemoryLogs: number;
  evacuationThreshold: number;
  logDir?: string;
  throttleWindowMs: number;
  maxThrottleCount: number;
  consoleLevel: ConsoleLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

function isLogCategory(value: unknown): value is LogCategory {
  return Object.values(LogCategory).some((category) => category === value);
}

export function parseConsoleLevel(value: string | undefined): ConsoleLevel {
  if (value === "silent") return "silent";
  const match = Object.values(LogLevel).find((level) => level === value);
  return match ?? LogLevel.INFO;
}

const DEFAULT_CONFIG: LoggerConfig = {
  maxMemoryLogs: 5000,
  evacuationThreshold: Number(process.env.LOG_EVACUATION_THRESHOLD ?? 4000),
  logDir: process.env.LOG_DIR ? path.resolve(process.env.LOG_DIR) : undefined,
  throttleWindowMs: Number(process.env.LOG_THROTTLE_WINDOW_MS ?? 5000),
  maxThrottleCount: Number(process.env.LOG_MAX_THROTTLE_COUNT ?? 3),
  consoleLevel: parseConsoleLevel(process.env.LOG_LEVEL),
};

function generateLogId(): string {
  return `${Date.now()}-${RandomUtils.float().toString(36).substring(2, 9)}`;
}

function getDateString(): string {
  return new Date().toISOString().split("T")[0];
}

/**
 * Logger with memory buffering and optional file evacuation.
 */
export class Logger {
  private config: LoggerConfig;
  private memoryBuffer: LogEntry[] = [];
  private throttleMap = new Map<string, { count: number; lastTime: number }>();
  private lastThrottlePrune = Date.now();
  private isEvacuating = false;
  private evacuationPromise: Promise<void> = Promise.resolve();
  private metrics: LogMetrics;
  private activeCorrelationId?: string;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.metrics = this.initMetrics();
  }

  private initMetrics(): LogMetrics {
    return {
      byLevel: {
        [LogLevel.DEBUG]: 0,
        [LogLevel.INFO]: 0,
        [LogLevel.WARN]: 0,
        [LogLevel.ERROR]: 0,
      },
      byCategory: {
        [LogCategory.NETWORK]: 0,
        [LogCategory.STORAGE]: 0,
        [LogCategory.CRAFTING]: 0,
        [LogCategory.RECIPES]: 0,
        [LogCategory.STATIONS]: 0,
        [LogCategory.SESSION]: 0,
        [LogCategory.HTTP]: 0,
        [LogCategory.GENERAL]: 0,
      },
      startTime: Date.now(),
      endTime: Date.now(),
      totalCount: 0,
    };
  }

  private getLogFilePath(logDir: string): string {
    return path.join(logDir, `logs-${getDateString()}.jsonl`);
  }

  private formatConsoleMessage(
    level: LogLevel,
    category: LogCategory,
    message: string,
  ): string {
    const timestamp = new Date().toISOString();
    const levelColors: Record<LogLevel, string> = {
      [LogLevel.DEBUG]: "\x1b[36m",
      [LogLevel.INFO]: "\x1b[32m",
      [LogLevel.WARN]: "\x1b[33m",
      [LogLevel.ERROR]: "\x1b[31m",
    };
    const reset = "\x1b[0m";
    return `${levelColors[level]}[${timestamp}] [${level.toUpperCase()}] [${category}]${reset} ${message}`;
  }

  private shouldThrottle(message: string): boolean {
    const now = Date.now();
    this.pruneThrottleMap(now);
    const key = message.substring(0, 100);
    const entry = this.throttleMap.get(key);

    if (!entry) {
      this.throttleMap.set(key, { count: 1, lastTime: now });
      return false;
    }

    if (now - entry.lastTime > this.config.throttleWindowMs) {
      entry.count = 1;
      entry.lastTime = now;
      return false;
    }

    entry.count++;
    return entry.count > this.config.maxThrottleCount;
  }

  /**
   * Drops keys idle for two windows, at most once per window.
   */
  private pruneThrottleMap(now: number): void {
    if (now - this.lastThrottlePrune < this.config.throttleWindowMs) return;
    this.lastThrottlePrune = now;
    for (const [key, entry] of this.throttleMap) {
      if (now - entry.lastTime > this.config.throttleWindowMs * 2) {
        this.throttleMap.delete(key);
      }
    }
  }

  private shouldPrint(level: LogLevel): boolean {
    const threshold = this.config.consoleLevel;
    if (threshold === "silent") return false;
    return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
  }

  private addToMemory(entry: LogEntry): void {
    this.memoryBuffer.push(entry);
    this.metrics.byLevel[entry.level]++;
    this.metrics.byCategory[entry.category]++;
    this.metrics.endTime = entry.timestampMs;
    this.metrics.totalCount++;

    if (this.memoryBuffer.length >= this.config.evacuationThreshold) {
      if (this.config.logDir) {
        this.evacuationPromise = this.evacuationPromise.then(() =>
          this.doEvacuate(),
        );
      } else if (this.memoryBuffer.length > this.config.maxMemoryLogs) {
        this.memoryBuffer.splice(
          0,
          this.memoryBuffer.length - this.config.maxMemoryLogs,
        );
      }
    }
  }

  private async doEvacuate(): Promise<void> {
    const logDir = this.config.logDir;
    if (!logDir || this.isEvacuating || this.memoryBuffer.length === 0) return;

    this.isEvacuating = true;
    const logsToWrite = [...this.memoryBuffer];
    this.memoryBuffer = [];
    const logFilePath = this.getLogFilePath(logDir);

    try {
      await fs.promises.mkdir(logDir, { recursive: true });
      const lines = logsToWrite.map((log) => JSON.stringify(log)).join("\n");
      await fs.promises.appendFile(logFilePath, lines + "\n", "utf-8");
    } catch (error) {
      this.memoryBuffer = [...logsToWrite, ...this.memoryBuffer].slice(
        -this.config.maxMemoryLogs,
      );
      console.error("Failed to evacuate logs:", {
        error: error instanceof Error ? error.message : String(error),
        bufferSize: logsToWrite.length,
        filePath: logFilePath,
      });
    } finally {
      this.isEvacuating = false;
    }
  }

  /**
   * Changes the console threshold at runtime.
   */
  setConsoleLevel(level: ConsoleLevel): void {
    this.config.consoleLevel = level;
  }

  /**
   * Start a correlation context for related logs.
   * @returns The correlation ID attached to every entry until endCorrelation
   */
  startCorrelation(prefix?: string): string {
    this.activeCorrelationId = `${prefix || "corr"}-${generateLogId()}`;
    return this.activeCorrelationId;
  }

  endCorrelation(): void {
    this.activeCorrelationId = undefined;
  }

  getCorrelationId(): string | undefined {
    return this.activeCorrelationId;
  }

  /**
   * Log with explicit category and options.
   */
  log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    options?: { correlationId?: string; data?: unknown },
  ): void {
    if (level !== LogLevel.ERROR && this.shouldThrottle(message)) return;

    const now = Date.now();
    const entry: LogEntry = {
      id: generateLogId(),
      level,
      category,
      message,
      timestamp: new Date(now).toISOString(),
      timestampMs: now,
      correlationId: options?.correlationId || this.activeCorrelationId,
      data: options?.data,
    };
    this.addToMemory(entry);

    if (!this.shouldPrint(level)) return;

    const consoleMsg = this.formatConsoleMessage(level, category, message);
    switch (level) {
      case LogLevel.DEBUG:
        console.log(consoleMsg, options?.data ?? "");
        break;
      case LogLevel.INFO:
        console.info(consoleMsg, options?.data ?? "");
        break;
      case LogLevel.WARN:
        console.warn(consoleMsg, options?.data ?? "");
        break;
      case LogLevel.ERROR:
        console.error(consoleMsg, options?.data ?? "");
        break;
    }
  }

  private route(
    level: LogLevel,
    message: string,
    categoryOrData?: unknown,
    data?: unknown,
  ): void {
    if (isLogCategory(categoryOrData)) {
      this.log(level, categoryOrData, message, { data });
      return;
    }
    this.log(level, LogCategory.GENERAL, message, { data: categoryOrData });
  }

  debug(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.route(LogLevel.DEBUG, message, categoryOrData, data);
  }

  info(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.route(LogLevel.INFO, message, categoryOrData, data);
  }

  warn(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.route(LogLevel.WARN, message, categoryOrData, data);
  }

  error(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.route(LogLevel.ERROR, message, categoryOrData, data);
  }

  getThrottledKeyCount(): number {
    return this.throttleMap.size;
  }

  getMetrics(): LogMetrics {
    return {
      ...this.metrics,
      byLevel: { ...this.metrics.byLevel },
      byCategory: { ...this.metrics.byCategory },
    };
  }

  resetMetrics(): void {
    this.metrics = this.initMetrics();
  }

  /**
   * Query logs from memory buffer with filters.
   */
  queryLogs(filter: LogFilter = {}): LogEntry[] {
    const { levels, categories, correlationId, startTime, endTime } = filter;
    let results = [...this.memoryBuffer];

    if (levels?.length) {
      results = results.filter((e) => levels.includes(e.level));
    }
    if (categories?.length) {
      results = results.filter((e) => categories.includes(e.category));
    }
    if (correlationId) {
      results = results.filter((e) => e.correlationId === correlationId);
    }
    if (startTime !== undefined) {
      results = results.filter((e) => e.timestampMs >= startTime);
    }
    if (endTime !== undefined) {
      results = results.filter((e) => e.timestampMs <= endTime);
    }
    if (filter.messageContains) {
      const search = filter.messageContains.toLowerCase();
      results = results.filter((e) => e.message.toLowerCase().includes(search));
    }
    if (filter.limit) {
      results = results.slice(-filter.limit);
    }

    return results;
  }

  /**
   * Writes buffered entries to LOG_DIR. No-op without a log directory.
   */
  async flush(): Promise<void> {
    await this.evacuationPromise;
    await this.doEvacuate();
  }

  getBufferSize(): number {
    return this.memoryBuffer.length;
  }

  getRecentLogs(count: number = 100): LogEntry[] {
    return this.memoryBuffer.slice(-count);
  }

  clear(): void {
    this.memoryBuffer = [];
    this.throttleMap.clear();
    this.activeCorrelationId = undefined;
  }
}

export const logger = new Logger();

export { LogLevel, LogCategory } from "../../shared/constants/LogEnums";
