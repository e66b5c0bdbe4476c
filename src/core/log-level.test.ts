import { describe, expect, it } from "vitest";
import { LEVEL_NAME_LIST, LEVEL_NAMES, LogLevel, parseLevel } from "./log-level.js";

describe("LogLevel", () => {
  it("orders levels from debug to fault", () => {
    expect(LogLevel.DEBUG).toBeLessThan(LogLevel.INFO);
    expect(LogLevel.INFO).toBeLessThan(LogLevel.DEFAULT);
    expect(LogLevel.DEFAULT).toBeLessThan(LogLevel.WARNING);
    expect(LogLevel.WARNING).toBeLessThan(LogLevel.ERROR);
    expect(LogLevel.ERROR).toBeLessThan(LogLevel.FAULT);
  });

  it("names every level", () => {
    expect(LEVEL_NAMES[LogLevel.DEFAULT]).toBe("default");
    expect(LEVEL_NAMES[LogLevel.FAULT]).toBe("fault");
  });

  it("parseLevel inverts LEVEL_NAMES", () => {
    for (const name of LEVEL_NAME_LIST) {
      expect(LEVEL_NAMES[parseLevel(name)]).toBe(name);
    }
    expect(parseLevel("warning")).toBe(LogLevel.WARNING);
  });
});
