import { LEVEL_NAMES, LogLevel } from "../core/log-level.js";
import { renderMessage } from "../core/render.js";
import type { LogEntry, LogSink } from "../interfaces/log-sink.js";

export interface StructuredSinkOptions {
  writer?: (line: string) => void;
  level?: LogLevel;
  /** Write redacted payloads in clear text. Meant for an authorized viewer only. */
  revealPrivate?: boolean;
}

/** Writes each entry as one JSON line, to stderr unless a writer is given. */
export class StructuredSink implements LogSink {
  private writer: (line: string) => void;
  private level: LogLevel;
  private revealPrivate: boolean;

  constructor(options: StructuredSinkOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? LogLevel.DEBUG;
    this.revealPrivate = options.revealPrivate ?? false;
  }

  emit(entry: LogEntry): void {
    if (entry.level < this.level) return;

    this.writer(
      JSON.stringify({
        time: new Date().toISOString(),
        level: LEVEL_NAMES[entry.level],
        subsystem: entry.subsystem,
        category: entry.category,
        msg: renderMessage(entry, this.revealPrivate),
        redacted: entry.redacted,
      }),
    );
  }
}
