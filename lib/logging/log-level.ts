export enum LogLevel {
  TRACE = "TRACE",
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
  WORKFLOW = "WORKFLOW",
  AI_USAGE = "AI_USAGE",
  STATE_TRANSITION = "STATE_TRANSITION",
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.TRACE]: 0,
  [LogLevel.DEBUG]: 1,
  [LogLevel.STATE_TRANSITION]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.WORKFLOW]: 2,
  [LogLevel.AI_USAGE]: 2,
  [LogLevel.WARN]: 3,
  [LogLevel.ERROR]: 4,
};

export function meetsThreshold(level: LogLevel, threshold: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[threshold];
}
