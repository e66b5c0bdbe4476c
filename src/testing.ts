/**
 * Public test utilities — exported from the `"subsystem-log/testing"` entry point.
 * Consumers can record what their code logs instead of writing to stderr.
 */
export { MemorySink } from "./adapters/memory-sink.js";
export { NoopSink, noopSink } from "./utils/noop-sink.js";
