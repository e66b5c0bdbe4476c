import { lazy } from "../utils/lazy.js";
import { Logger } from "./logger.js";

/**
 * The process-wide logger, equivalent to `new Logger()`.
 * Built on first access and shared for the life of the process. Prefer passing
 * it to the code that logs over reaching for it from deep inside a module.
 */
export const getDefaultLogger: () => Logger = lazy(() => new Logger());
