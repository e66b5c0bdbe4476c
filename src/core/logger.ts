import { type SinkError, toSinkError } from "../errors.js";
import type { LogEntry, LogSink } from "../interfaces/log-sink.js";
import { hostAppIdentifier } from "../utils/resolve-app-identifier.js";
import { defaultSink } from "./default-sink.js";
import { LogLevel } from "./log-level.js";

export const DEFAULT_CATEGORY = "default";

/** Subsystem used when the host application identifier cannot be resolved. */
export const FALLBACK_SUBSYSTEM = "com.subsystem-log.default";

export interface LoggerOptions {
  /** Owner of the log stream. Defaults to the host package name, then FALLBACK_SUBSYSTEM. */
  subsystem?: string;
  /** Subdivision within the subsystem. Empty or omitted means "default". */
  category?: string;
  sink?: LogSink;
  /** Receives sink failures. Anything it throws is dropped. */
  onSinkError?: (error: SinkError) => void;
}

/** Default sink failure handler: one line on stderr. */
export function reportSinkError(error: SinkError): void {
  process.stderr.write(`[subsystem-log] ${error.message}\n`);
}

/**
 * Leveled, privacy-aware logger tagged with a subsystem and category.
 *
 * Construction never throws and every emit operation returns once the sink
 * call returns; a failing sink is reported through `onSinkError` and never
 * surfaces to the caller.
 *
 * Instances are frozen in the constructor, so the class is not meant to be
 * subclassed; wrap a Logger instead of extending it.
 *
 * ```ts
 * const net = new Logger({ subsystem: "com.example.app", category: "Networking" });
 * net.logInfo("request started");
 * net.logPrivate(`user email: ${email}`);
 * ```
 */
export class Logger {
  readonly subsystem: string;
  readonly category: string;
  private readonly sink: LogSink;
  private readonly onSinkError: (error: SinkError) => void;

  constructor(options: LoggerOptions = {}) {
    this.subsystem = options.subsystem ?? hostAppIdentifier() ?? FALLBACK_SUBSYSTEM;
    this.category = options.category || DEFAULT_CATEGORY;
    this.sink = options.sink ?? defaultSink();
    this.onSinkError = options.onSinkError ?? reportSinkError;
    Object.freeze(this);
  }

  /** A logger for another category of the same subsystem, writing to the same sink. */
  withCategory(category: string): Logger {
    return new Logger({
      subsystem: this.subsystem,
      category,
      sink: this.sink,
      onSinkError: this.onSinkError,
    });
  }

  logInfo(message: string): void {
    this.emit(LogLevel.INFO, message, false);
  }

  logDebug(message: string): void {
    this.emit(LogLevel.DEBUG, message, false);
  }

  logWarning(message: string): void {
    this.emit(LogLevel.WARNING, message, false);
  }

  logError(message: string): void {
    this.emit(LogLevel.ERROR, message, false);
  }

  /** Unrecoverable conditions; the fault level. */
  logCritical(message: string): void {
    this.emit(LogLevel.FAULT, message, false);
  }

  /** Logs at the default level with the whole message marked for redaction. */
  logPrivate(message: string): void {
    this.emit(LogLevel.DEFAULT, message, true);
  }

  private emit(level: LogLevel, message: string, redacted: boolean): void {
    const entry: LogEntry = {
      level,
      subsystem: this.subsystem,
      category: this.category,
      message,
      redacted,
    };

    try {
      this.sink.emit(entry);
    } catch (err) {
      this.report(toSinkError(err));
    }
  }

  private report(error: SinkError): void {
    try {
      this.onSinkError(error);
    } catch {
      // A failing hook has nowhere left to report to; the caller must not see it
    }
  }
}
