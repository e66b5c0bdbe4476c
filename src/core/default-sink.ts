import { createSink } from "../adapters/create-sink.js";
import { lazy } from "../utils/lazy.js";

/** The sink a Logger writes to when none is injected: JSON lines on stderr. */
export const defaultSink = lazy(() => createSink());
