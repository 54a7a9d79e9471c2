import { describe, it, expect } from "vitest";
import { createApp } from "../src/application/app";
import { createTestSession } from "./setup";

describe("App", () => {
  it("debe crear la aplicación Express sobre el contenedor de la sesión", () => {
    const app = createApp(createTestSession().container);

    expect(app).toBeDefined();
    expect(typeof app).toBe("function");
    expect(typeof app.listen).toBe("function");
  });

  it("debe crear aplicaciones independientes por contenedor", () => {
    const first = createApp(createTestSession().container);
    const second = createApp(createTestSession().container);

    expect(first).not.toBe(second);
  });
});
