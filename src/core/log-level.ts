/**
 * Severity levels, ordered so that a numeric comparison filters by threshold.
 * `DEFAULT` sits between info and warning, matching the OS log taxonomy where
 * "default" is the level a plain `log()` call writes at.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  DEFAULT = 2,
  WARNING = 3,
  ERROR = 4,
  FAULT = 5,
}

export const LEVEL_NAME_LIST = ["debug", "info", "default", "warning", "error", "fault"] as const;

export type LevelName = (typeof LEVEL_NAME_LIST)[number];

export const LEVEL_NAMES: Record<LogLevel, LevelName> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.DEFAULT]: "default",
  [LogLevel.WARNING]: "warning",
  [LogLevel.ERROR]: "error",
  [LogLevel.FAULT]: "fault",
};

const LEVELS_BY_NAME: Record<LevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  default: LogLevel.DEFAULT,
  warning: LogLevel.WARNING,
  error: LogLevel.ERROR,
  fault: LogLevel.FAULT,
};

export function parseLevel(name: LevelName): LogLevel {
  return LEVELS_BY_NAME[name];
}
