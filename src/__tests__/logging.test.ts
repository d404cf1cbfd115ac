import { describe, expect, it, vi } from "vitest";
import { createLogger, resolveLogLevel } from "../logging.js";

describe("resolveLogLevel", () => {
  it("accepts the known levels in any case", () => {
    expect(resolveLogLevel("WARN")).toBe("warn");
    expect(resolveLogLevel("debug")).toBe("debug");
  });

  it("falls back to info for unknown or inherited names", () => {
    expect(resolveLogLevel(undefined)).toBe("info");
    expect(resolveLogLevel("verbose")).toBe("info");
    expect(resolveLogLevel("toString")).toBe("info");
    expect(resolveLogLevel("constructor")).toBe("info");
  });
});

describe("createLogger", () => {
  it("prefixes lines with the subsystem and drops those below its level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = createLogger("scheduler", resolveLogLevel("toString"));

    logger.debug("hidden");
    logger.info("Started");
    logger.warn("Slow run", { job: "a" });

    expect(log.mock.calls).toEqual([["[scheduler] Started"]]);
    expect(warn.mock.calls).toEqual([["[scheduler] Slow run", { job: "a" }]]);
  });
});
