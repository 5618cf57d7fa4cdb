export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const DEBUG_TRAFFIC = process.env.TRAFFIC_DEBUG === "1";

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

function resolveThreshold(): number {
  const raw = process.env.TRAFFIC_LOG_LEVEL?.trim().toLowerCase();
  if (isLogLevel(raw)) {
    return LEVEL_ORDER[raw];
  }
  return DEBUG_TRAFFIC ? LEVEL_ORDER.debug : LEVEL_ORDER.info;
}

export function createLogger(scope: string, threshold = resolveThreshold()): Logger {
  const tag = `[${scope}]`;
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= threshold;
  return {
    debug: (...args) => {
      if (enabled("debug")) {
        console.debug(tag, ...args);
      }
    },
    info: (...args) => {
      if (enabled("info")) {
        console.info(tag, ...args);
      }
    },
    warn: (...args) => {
      if (enabled("warn")) {
        console.warn(tag, ...args);
      }
    },
    error: (...args) => {
      if (enabled("error")) {
        console.error(tag, ...args);
      }
    },
    child: (child) => createLogger(`${scope}:${child}`, threshold)
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger
};
