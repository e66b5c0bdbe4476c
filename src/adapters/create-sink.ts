import { parseLevel } from "../core/log-level.js";
import type { LogSink } from "../interfaces/log-sink.js";
import { resolveSinkConfig, type SinkConfig } from "../types/config.js";
import { ConsoleSink } from "./console-sink.js";
import { StructuredSink } from "./structured-sink.js";

/** Build a sink from validated configuration. Throws ConfigError on invalid input. */
export function createSink(config: SinkConfig = {}): LogSink {
  const resolved = resolveSinkConfig(config);
  const level = parseLevel(resolved.level);

  switch (resolved.format) {
    case "json":
      return new StructuredSink({ level, revealPrivate: resolved.revealPrivate });
    case "console":
      return new ConsoleSink({ level, revealPrivate: resolved.revealPrivate });
  }
}
