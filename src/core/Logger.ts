/** Log levels, higher number = more verbose */
export const LogLevel = {
  OFF: 0,
  ERROR: 1,
  WARN: 2,
  INFO: 3,
  DEBUG: 4,
} as const;
export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export type LogLevelName = keyof typeof LogLevel;

export const LOG_LEVEL_NAMES: Record<LogLevel, LogLevelName> = {
  [LogLevel.OFF]: "OFF",
  [LogLevel.ERROR]: "ERROR",
  [LogLevel.WARN]: "WARN",
  [LogLevel.INFO]: "INFO",
  [LogLevel.DEBUG]: "DEBUG",
};

export type LogCategory = "ECS" | "NAV" | "MOVE" | "PATROL" | "LEVEL" | "SERVER";

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (!value) return fallback;
  const upper = value.trim().toUpperCase();
  for (const level of Object.values(LogLevel)) {
    if (LOG_LEVEL_NAMES[level] === upper) return level;
  }
  return fallback;
}

class LoggerImpl {
  private _level: LogLevel = LogLevel.WARN;

  get level(): LogLevel {
    return this._level;
  }

  set level(l: LogLevel) {
    this._level = l;
  }

  error(category: LogCategory, message: string, ...args: unknown[]): void {
    if (this._level < LogLevel.ERROR) return;
    console.error(`[${category}] ${message}`, ...args);
  }

  warn(category: LogCategory, message: string, ...args: unknown[]): void {
    if (this._level < LogLevel.WARN) return;
    console.warn(`[${category}] ${message}`, ...args);
  }

  info(category: LogCategory, message: string, ...args: unknown[]): void {
    if (this._level < LogLevel.INFO) return;
    console.log(`[${category}] ${message}`, ...args);
  }

  debug(category: LogCategory, message: string, ...args: unknown[]): void {
    if (this._level < LogLevel.DEBUG) return;
    console.debug(`[${category}] ${message}`, ...args);
  }
}

/** Singleton logger instance, import and use directly */
export const logger = new LoggerImpl();
