import type { LogEntry } from "../interfaces/log-sink.js";

/** What a viewer sees in place of a redacted payload. */
export const PRIVATE_PLACEHOLDER = "<private>";

export function renderMessage(entry: LogEntry, revealPrivate: boolean): string {
  return entry.redacted && !revealPrivate ? PRIVATE_PLACEHOLDER : entry.message;
}
