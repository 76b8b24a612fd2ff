// ============================================
// Structured Logger
// ============================================

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
};

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  ERROR: LogLevel.ERROR,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVEL_MAP[value?.toUpperCase() ?? ""] ?? LogLevel.INFO;
}

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

/** Override the threshold picked up from LOG_LEVEL (tests, CLI flags). */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export type LogMeta = Record<string, unknown>;

export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level >= LogLevel.ERROR) {
    console.error(line);
  } else if (level >= LogLevel.WARN) {
    console.warn(line);
  } else {
    console.log(line);
  }
};

// Fixed-point amounts are bigints; JSON.stringify throws on them.
function replacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

export function formatEntry(
  level: LogLevel,
  service: string,
  message: string,
  meta?: LogMeta,
  now: Date = new Date()
): string {
  return JSON.stringify(
    {
      timestamp: now.toISOString(),
      level: LOG_LEVEL_NAMES[level],
      service,
      message,
      ...meta,
    },
    replacer
  );
}

export function createLogger(service: string, sink: LogSink = consoleSink) {
  function log(level: LogLevel, message: string, meta?: LogMeta) {
    if (level < currentLevel) return;
    sink(level, formatEntry(level, service, message, meta));
  }

  return {
    debug: (msg: string, meta?: LogMeta) => log(LogLevel.DEBUG, msg, meta),
    info: (msg: string, meta?: LogMeta) => log(LogLevel.INFO, msg, meta),
    warn: (msg: string, meta?: LogMeta) => log(LogLevel.WARN, msg, meta),
    error: (msg: string, meta?: LogMeta) => log(LogLevel.ERROR, msg, meta),
  };
}

export type Logger = ReturnType<typeof createLogger>;
