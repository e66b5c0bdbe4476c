import { describe, expect, it } from "vitest";
import { Logger } from "../core/logger.js";
import { NoopSink, noopSink } from "./noop-sink.js";

describe("NoopSink", () => {
  it("accepts entries and writes nothing", () => {
    const logger = new Logger({ subsystem: "com.test.app", sink: noopSink });
    expect(() => logger.logCritical("ignored")).not.toThrow();
  });

  it("shared instance is a NoopSink", () => {
    expect(noopSink).toBeInstanceOf(NoopSink);
  });
});
