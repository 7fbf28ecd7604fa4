import { afterEach, describe, expect, it, vi } from "vitest";
import { createSubsystemLogger, getLogLevel, parseLogLevel, setLogLevel } from "./subsystem.js";

describe("parseLogLevel", () => {
  it("accepts known levels in any case", () => {
    expect(parseLogLevel(" DEBUG ")).toBe("debug");
    expect(parseLogLevel("warn")).toBe("warn");
    expect(parseLogLevel("verbose")).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});

describe("createSubsystemLogger", () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
  });

  it("prefixes lines and routes warnings and errors to stderr", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    setLogLevel("info");
    const logger = createSubsystemLogger("catalog");

    logger.info("GET /scan/");
    logger.warn("slow", 1200);
    logger.error("failed");

    expect(log).toHaveBeenCalledWith("[catalog] GET /scan/");
    expect(warn).toHaveBeenCalledWith("[catalog] slow", 1200);
    expect(error).toHaveBeenCalledWith("[catalog] failed");
  });

  it("drops messages below the threshold", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const logger = createSubsystemLogger("exif");

    setLogLevel("info");
    logger.debug("hidden");
    setLogLevel("debug");
    logger.debug("shown");

    expect(log.mock.calls).toEqual([["[exif] shown"]]);
  });
});
