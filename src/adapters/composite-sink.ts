import { toSinkError } from "../errors.js";
import type { LogEntry, LogSink } from "../interfaces/log-sink.js";

/**
 * Fans out emit() to N sinks.
 * Every sink sees the entry even when an earlier one throws; the first failure
 * is re-thrown afterwards as a SinkError.
 */
export class CompositeSink implements LogSink {
  constructor(private readonly sinks: LogSink[]) {}

  emit(entry: LogEntry): void {
    const failures: unknown[] = [];
    for (const sink of this.sinks) {
      try {
        sink.emit(entry);
      } catch (err) {
        failures.push(err);
      }
    }
    if (failures.length > 0) throw toSinkError(failures[0]);
  }
}
