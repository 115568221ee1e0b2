import { describe, it, expect } from "vitest";
import { createLogger, resolveLogger, silentLogger } from "./logger";
import type { EngineLogger } from "./logger";

describe("logger", () => {
  it("falls back to the silent logger", () => {
    expect(resolveLogger()).toBe(silentLogger);
    expect(resolveLogger({})).toBe(silentLogger);
  });

  it("prefers an injected logger", () => {
    const injected: EngineLogger = createLogger({ appName: "savings-test", logLevel: "silent" });
    expect(resolveLogger({ logger: injected })).toBe(injected);
  });

  it("builds a pino logger at the configured level", () => {
    const logger = createLogger({ appName: "savings-test", logLevel: "debug" });
    expect(logger.level).toBe("debug");
    expect(logger.isLevelEnabled("debug")).toBe(true);
    expect(logger.isLevelEnabled("trace")).toBe(false);
  });
});
