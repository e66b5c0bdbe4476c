/**
 * Console-based sink.
 * Prefixes all output with `[subsystem:category]`.
 */

import { LogLevel } from "../core/log-level.js";
import { renderMessage } from "../core/render.js";
import type { LogEntry, LogSink } from "../interfaces/log-sink.js";

type ConsoleMethod = "debug" | "log" | "warn" | "error";

const CONSOLE_METHODS: Record<LogLevel, ConsoleMethod> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "log",
  [LogLevel.DEFAULT]: "log",
  [LogLevel.WARNING]: "warn",
  [LogLevel.ERROR]: "error",
  [LogLevel.FAULT]: "error",
};

export interface ConsoleSinkOptions {
  level?: LogLevel;
  revealPrivate?: boolean;
}

export class ConsoleSink implements LogSink {
  private level: LogLevel;
  private revealPrivate: boolean;

  constructor(options: ConsoleSinkOptions = {}) {
    this.level = options.level ?? LogLevel.DEBUG;
    this.revealPrivate = options.revealPrivate ?? false;
  }

  emit(entry: LogEntry): void {
    if (entry.level < this.level) return;
    const method = CONSOLE_METHODS[entry.level];
    console[method](
      `[${entry.subsystem}:${entry.category}] ${renderMessage(entry, this.revealPrivate)}`,
    );
  }
}
