import { describe, expect, it } from "vitest";
import { createLoggerWithDestination, logger, resolveLogLevel } from "../src/logger";

describe("logger", () => {
  it("reads the level from LOG_LEVEL", () => {
    expect(resolveLogLevel("debug")).toBe("debug");
    expect(resolveLogLevel("warn")).toBe("warn");
  });

  it("stays silent without a valid level", () => {
    expect(resolveLogLevel(undefined)).toBe("silent");
    expect(resolveLogLevel("verbose")).toBe("silent");
  });

  it("exposes a module logger", () => {
    expect(typeof logger.debug).toBe("function");
    expect(typeof logger.child).toBe("function");
  });

  it("writes JSON with a message key and a string level", () => {
    const lines: string[] = [];
    const log = createLoggerWithDestination({ write: (line: string) => lines.push(line) }, "info");
    log.debug("hidden");
    log.info({ action: "level_check" }, "visible");

    expect(lines).toHaveLength(1);
    const record: unknown = JSON.parse(lines[0]);
    expect(record).toMatchObject({ level: "info", name: "band-cloud", action: "level_check", message: "visible" });
  });
});
