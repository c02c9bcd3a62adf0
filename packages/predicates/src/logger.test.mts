import { describe, expect, it, vi } from "vitest";

import { createLogger, isLoggerLevel, LOGGER_LEVELS } from "./logger.mjs";

describe("createLogger", () => {
  it("should have all logger methods defined", () => {
    const logger = createLogger();
    for (const level of LOGGER_LEVELS) {
      expect(typeof logger[level]).toBe("function");
    }
  });

  it("should hand messages to axe at the same level", () => {
    const logger = createLogger({ silent: true });
    const spy = vi.spyOn(logger.axe, "warn");

    logger.warn("test message", { key: "value" });

    expect(spy).toHaveBeenCalledWith("test message", { key: "value" });
  });

  it("should pass non-cloneable meta through untouched", () => {
    const logger = createLogger({ silent: true });
    const spy = vi.spyOn(logger.axe, "debug");
    const callback = () => true;

    logger.debug("checked", { args: [callback] });

    expect(spy).toHaveBeenCalledWith("checked", { args: [callback] });
  });
});

describe("isLoggerLevel", () => {
  it("should accept the six levels only", () => {
    expect(isLoggerLevel("trace")).toBe(true);
    expect(isLoggerLevel("fatal")).toBe(true);
    expect(isLoggerLevel("verbose")).toBe(false);
    expect(isLoggerLevel(undefined)).toBe(false);
    expect(isLoggerLevel(3)).toBe(false);
  });
});
