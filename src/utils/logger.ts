export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function formatMsg(level: LogLevel, scope: string | undefined, msg: string, data?: Record<string, unknown>): string {
  const ts = new Date().toISOString();
  const tag = scope ? ` [${scope}]` : "";
  const base = `${ts} [${level.toUpperCase()}]${tag} ${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

export type Logger = {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  /** A logger whose lines carry a `[scope]` tag. */
  child(scope: string): Logger;
};

function createLogger(scope?: string): Logger {
  return {
    debug(msg, data) {
      if (shouldLog("debug")) console.debug(formatMsg("debug", scope, msg, data));
    },
    info(msg, data) {
      if (shouldLog("info")) console.info(formatMsg("info", scope, msg, data));
    },
    warn(msg, data) {
      if (shouldLog("warn")) console.warn(formatMsg("warn", scope, msg, data));
    },
    error(msg, data) {
      if (shouldLog("error")) console.error(formatMsg("error", scope, msg, data));
    },
    child(childScope) {
      return createLogger(scope ? `${scope}:${childScope}` : childScope);
    },
  };
}

export const log: Logger = createLogger();
