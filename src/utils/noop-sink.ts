import type { LogSink } from "../interfaces/log-sink.js";

export class NoopSink implements LogSink {
  emit(): void {}
}

/** Shared singleton — use where entries should go nowhere. */
export const noopSink: LogSink = new NoopSink();
