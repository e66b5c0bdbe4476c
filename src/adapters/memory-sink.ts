import type { LogEntry, LogSink } from "../interfaces/log-sink.js";

/**
 * In-memory sink for testing.
 * Records every entry in arrival order; nothing is rendered or filtered.
 */
export class MemorySink implements LogSink {
  private recorded: LogEntry[] = [];

  emit(entry: LogEntry): void {
    // Copy so a caller holding the entry cannot alter what was recorded
    this.recorded.push(Object.freeze({ ...entry }));
  }

  get entries(): readonly LogEntry[] {
    return [...this.recorded];
  }

  clear(): void {
    this.recorded = [];
  }
}
