import { describe, it, expect } from "vitest";
import { createLogger, silentLogger } from "@/lib/logger";

describe("createLogger", () => {
  it("uses the requested level", () => {
    expect(createLogger({ service: "kpi-test", level: "warn" }).level).toBe("warn");
  });

  it("defaults to info in production and debug elsewhere", () => {
    expect(createLogger({ service: "kpi-test", environment: "production" }).level).toBe("info");
    expect(createLogger({ service: "kpi-test", environment: "test" }).level).toBe("debug");
  });

  it("creates a silent logger", () => {
    expect(silentLogger().level).toBe("silent");
  });
});
