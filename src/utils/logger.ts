export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export type Logger = {
  debug(msg: string, data?: LogFields): void;
  info(msg: string, data?: LogFields): void;
  warn(msg: string, data?: LogFields): void;
  error(msg: string, data?: LogFields): void;
};

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

export function formatMsg(level: LogLevel, msg: string, data?: LogFields, scope?: string): string {
  const ts = new Date().toISOString();
  const prefix = scope ? `[${scope}] ` : "";
  const base = `${ts} [${level.toUpperCase()}] ${prefix}${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

// Everything goes to stderr so stdout stays clean for command output.
function write(level: LogLevel, msg: string, data?: LogFields, scope?: string): void {
  if (shouldLog(level)) console.error(formatMsg(level, msg, data, scope));
}

/** Create a logger whose lines carry `[scope]` after the level. */
export function createLogger(scope?: string): Logger {
  return {
    debug: (msg, data) => write("debug", msg, data, scope),
    info: (msg, data) => write("info", msg, data, scope),
    warn: (msg, data) => write("warn", msg, data, scope),
    error: (msg, data) => write("error", msg, data, scope),
  };
}

export const log: Logger = createLogger();
