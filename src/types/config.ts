import { sinkConfigSchema } from "../config/config-schema.js";
import type { LevelName } from "../core/log-level.js";
import { ConfigError } from "../errors.js";

export type SinkFormat = "json" | "console";

/** Sink configuration with sensible defaults */
export interface SinkConfig {
  format?: SinkFormat; // default: "json"
  level?: LevelName; // default: "debug"
  revealPrivate?: boolean; // default: false
}

/** Fully resolved configuration with defaults applied. */
export type ResolvedSinkConfig = Required<SinkConfig>;

export const DEFAULT_SINK_CONFIG: ResolvedSinkConfig = {
  format: "json",
  level: "debug",
  revealPrivate: false,
};

export function resolveSinkConfig(config: SinkConfig = {}): ResolvedSinkConfig {
  const validation = sinkConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`);
  }

  const { format, level, revealPrivate } = validation.data;
  return {
    format: format ?? DEFAULT_SINK_CONFIG.format,
    level: level ?? DEFAULT_SINK_CONFIG.level,
    revealPrivate: revealPrivate ?? DEFAULT_SINK_CONFIG.revealPrivate,
  };
}
