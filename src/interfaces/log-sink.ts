/**
 * The logging facility a Logger writes to.
 * Adapters (StructuredSink, ConsoleSink, MemorySink) implement this; the facade programs to it.
 * @module
 */

import type { LogLevel } from "../core/log-level.js";

/** One event handed to a sink. `redacted` asks viewers to hide `message` by default. */
export interface LogEntry {
  readonly level: LogLevel;
  readonly subsystem: string;
  readonly category: string;
  readonly message: string;
  readonly redacted: boolean;
}

export interface LogSink {
  emit(entry: LogEntry): void;
}
