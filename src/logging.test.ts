import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createLogger, parseLogLevel } from "./logging.js";

describe("createLogger", () => {
  const originalLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "debug").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalLevel === undefined) delete process.env.LOG_LEVEL;
    else process.env.LOG_LEVEL = originalLevel;
  });

  it("prefixes lines with the namespace", () => {
    createLogger("dispatcher", "info").info("hello", { value: 1 });
    expect(console.log).toHaveBeenCalledWith("[forecast-bot] [dispatcher]", "hello", { value: 1 });
  });

  it("drops messages below the level", () => {
    const logger = createLogger("test", "warn");
    logger.info("skipped");
    logger.debug("skipped");
    logger.warn("kept");
    expect(console.log).not.toHaveBeenCalled();
    expect(console.debug).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("reads LOG_LEVEL when no level is given", () => {
    process.env.LOG_LEVEL = "debug";
    createLogger("test").debug("shown");
    expect(console.debug).toHaveBeenCalledWith("[forecast-bot] [test]", "shown");
  });

  it("extends the namespace and keeps the level in children", () => {
    const child = createLogger("main", "error").child("bot");
    child.warn("hidden");
    child.error("shown");
    expect(console.warn).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith("[forecast-bot] [main:bot]", "shown");
  });
});

describe("parseLogLevel", () => {
  it("accepts known levels in any case", () => {
    expect(parseLogLevel(" Warn ")).toBe("warn");
    expect(parseLogLevel("verbose")).toBeNull();
    expect(parseLogLevel(undefined)).toBeNull();
  });
});
