import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  Logger,
  LogCategory,
  LogLevel,
  parseConsoleLevel,
} from "../../src/infrastructure/utils/logger";

describe("Logger", () => {
  let log: Logger;

  beforeEach(() => {
    log = new Logger({ consoleLevel: "silent", logDir: undefined });
  });

  it("debe aceptar categoría o datos como segundo argumento", () => {
    log.info("con categoría", LogCategory.CRAFTING, { step: 1 });
    log.info("sin categoría", { step: 2 });

    const [first, second] = log.getRecentLogs(2);
    expect(first.category).toBe(LogCategory.CRAFTING);
    expect(first.data).toEqual({ step: 1 });
    expect(second.category).toBe(LogCategory.GENERAL);
    expect(second.data).toEqual({ step: 2 });
  });

  it("debe adjuntar el id de correlación activo", () => {
    const id = log.startCorrelation("craft");
    log.info("dentro", LogCategory.CRAFTING);
    log.endCorrelation();
    log.info("fuera", LogCategory.CRAFTING);

    expect(id.startsWith("craft-")).toBe(true);
    expect(log.queryLogs({ correlationId: id }).map((e) => e.message)).toEqual(["dentro"]);
  });

  it("debe limitar mensajes repetidos salvo los errores", () => {
    for (let i = 0; i < 5; i++) log.debug("consulta repetida", LogCategory.STORAGE);
    for (let i = 0; i < 5; i++) log.error("fallo repetido", LogCategory.STORAGE);

    expect(log.queryLogs({ levels: [LogLevel.DEBUG] })).toHaveLength(3);
    expect(log.queryLogs({ levels: [LogLevel.ERROR] })).toHaveLength(5);
  });

  it("debe olvidar las claves de throttling inactivas", () => {
    vi.useFakeTimers();
    try {
      vi.setSystemTime(10_000);
      log = new Logger({ consoleLevel: "silent", logDir: undefined, throttleWindowMs: 1000 });
      log.debug("primero", LogCategory.STORAGE);
      log.debug("segundo", LogCategory.STORAGE);
      expect(log.getThrottledKeyCount()).toBe(2);

      vi.setSystemTime(12_500);
      log.debug("tercero", LogCategory.STORAGE);

      expect(log.getThrottledKeyCount()).toBe(1);
    } finally {
      vi.useRealTimers();
    }
  });

  it("debe filtrar por categoría y texto", () => {
    log.info("Network resolved", LogCategory.NETWORK);
    log.info("Recipe indexed", LogCategory.RECIPES);

    expect(log.queryLogs({ categories: [LogCategory.RECIPES] })).toHaveLength(1);
    expect(log.queryLogs({ messageContains: "network" })[0].category).toBe(LogCategory.NETWORK);
  });

  it("debe recortar el buffer sin directorio de logs", () => {
    log = new Logger({
      consoleLevel: "silent",
      logDir: undefined,
      evacuationThreshold: 3,
      maxMemoryLogs: 2,
    });

    log.info("uno");
    log.info("dos");
    log.info("tres");

    expect(log.getBufferSize()).toBe(2);
    expect(log.getRecentLogs().map((e) => e.message)).toEqual(["dos", "tres"]);
    expect(log.getMetrics().totalCount).toBe(3);
  });

  describe("flush", () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "vaultlink-logs-"));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("debe escribir el buffer como JSON Lines", async () => {
      log = new Logger({ consoleLevel: "silent", logDir: dir });
      log.info("primero", LogCategory.SESSION);
      log.warn("segundo", LogCategory.SESSION);

      await log.flush();

      const [file] = fs.readdirSync(dir);
      const lines = fs.readFileSync(path.join(dir, file), "utf-8").trim().split("\n");
      expect(lines.map((line) => JSON.parse(line).message)).toEqual(["primero", "segundo"]);
      expect(log.getBufferSize()).toBe(0);
    });

    it("no debe hacer nada sin directorio", async () => {
      log.info("queda en memoria");

      await log.flush();

      expect(log.getBufferSize()).toBe(1);
    });
  });

  it("parseConsoleLevel debe caer en info ante valores desconocidos", () => {
    expect(parseConsoleLevel("warn")).toBe(LogLevel.WARN);
    expect(parseConsoleLevel("silent")).toBe("silent");
    expect(parseConsoleLevel("loud")).toBe(LogLevel.INFO);
    expect(parseConsoleLevel(undefined)).toBe(LogLevel.INFO);
  });
});
