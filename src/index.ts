/**
 * subsystem-log public API barrel.
 *
 * Re-exports the facade, the sink contract, the sink adapters, configuration
 * and error types that make up the public surface of the package.
 * @module
 */

// Adapters
export { CompositeSink } from "./adapters/composite-sink.js";
export type { ConsoleSinkOptions } from "./adapters/console-sink.js";
export { ConsoleSink } from "./adapters/console-sink.js";
export { createSink } from "./adapters/create-sink.js";
export type { StructuredSinkOptions } from "./adapters/structured-sink.js";
export { StructuredSink } from "./adapters/structured-sink.js";
// Core
export { getDefaultLogger } from "./core/default-logger.js";
export type { LevelName } from "./core/log-level.js";
export { LEVEL_NAMES, LogLevel, parseLevel } from "./core/log-level.js";
export type { LoggerOptions } from "./core/logger.js";
export { DEFAULT_CATEGORY, FALLBACK_SUBSYSTEM, Logger, reportSinkError } from "./core/logger.js";
export { PRIVATE_PLACEHOLDER, renderMessage } from "./core/render.js";
// Errors
export {
  ConfigError,
  errorMessage,
  SinkError,
  SubsystemLogError,
  toSinkError,
} from "./errors.js";
// Interfaces
export type { LogEntry, LogSink } from "./interfaces/log-sink.js";
// Config
export type { ResolvedSinkConfig, SinkConfig, SinkFormat } from "./types/config.js";
export { DEFAULT_SINK_CONFIG, resolveSinkConfig } from "./types/config.js";
// Utilities
export { NoopSink, noopSink } from "./utils/noop-sink.js";
export { hostAppIdentifier, resolveAppIdentifier } from "./utils/resolve-app-identifier.js";
