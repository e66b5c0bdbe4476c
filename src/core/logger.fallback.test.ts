import { describe, expect, it, vi } from "vitest";
import { MemorySink } from "../adapters/memory-sink.js";
import { FALLBACK_SUBSYSTEM, Logger } from "./logger.js";

// No host identifier available: neither npm nor a package.json names the app.
vi.mock("../utils/resolve-app-identifier.js", () => ({
  hostAppIdentifier: () => undefined,
}));

describe("Logger without a host identifier", () => {
  it("falls back to the fixed subsystem", () => {
    const logger = new Logger({ sink: new MemorySink() });
    expect(logger.subsystem).toBe(FALLBACK_SUBSYSTEM);
    expect(logger.subsystem).toBe("com.subsystem-log.default");
  });

  it("falls back identically on every construction", () => {
    const subsystems = [1, 2, 3].map(() => new Logger({ sink: new MemorySink() }).subsystem);
    expect(new Set(subsystems)).toEqual(new Set([FALLBACK_SUBSYSTEM]));
  });
});
