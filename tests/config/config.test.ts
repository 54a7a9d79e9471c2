import path from "path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

const KEYS = ["PORT", "MAX_CRAFT_DEPTH", "MAX_NETWORK_NODES", "ALLOWED_ORIGINS", "DATA_DIR"];

async function loadConfig() {
  vi.resetModules();
  const { CONFIG } = await import("../../src/config/config");
  return CONFIG;
}

describe("Config", () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  it("debe tener valores por defecto", async () => {
    const config = await loadConfig();

    expect(config.PORT).toBe(8080);
    expect(config.MAX_NETWORK_NODES).toBe(4096);
    expect(config.MAX_CRAFT_DEPTH).toBe(10);
    expect(config.ALLOWED_ORIGINS).toBe("*");
    expect(config.DATA_DIR).toBe(path.join(process.cwd(), "data"));
  });

  it("debe usar valores de entorno cuando están disponibles", async () => {
    process.env.PORT = "3000";
    process.env.MAX_NETWORK_NODES = "64";
    process.env.ALLOWED_ORIGINS = "http://a.test,http://b.test";
    process.env.DATA_DIR = "fixtures";

    const config = await loadConfig();

    expect(config.PORT).toBe(3000);
    expect(config.MAX_NETWORK_NODES).toBe(64);
    expect(config.ALLOWED_ORIGINS).toEqual(["http://a.test", "http://b.test"]);
    expect(config.DATA_DIR).toBe(path.resolve("fixtures"));
  });

  it("debe ignorar enteros inválidos", async () => {
    process.env.MAX_CRAFT_DEPTH = "abc";
    process.env.PORT = "-1";

    const config = await loadConfig();

    expect(config.MAX_CRAFT_DEPTH).toBe(10);
    expect(config.PORT).toBe(8080);
  });
});
