/**
 * Scoped console logger.
 *
 * Output looks like `[ConnectionManager] 🔌 Connected to Kitchen`. The level
 * comes from LOG_LEVEL (debug | info | warn | error | silent) unless a level
 * is passed explicitly; tests pass "silent".
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(scope: string): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function levelFromEnv(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return raw && isLogLevel(raw) ? raw : "info";
}

export function createLogger(scope: string, level: LogLevel = levelFromEnv()): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = `[${scope}]`;

  const enabled = (messageLevel: LogLevel) => LEVEL_ORDER[messageLevel] >= threshold;

  return {
    debug(message, ...details) {
      if (enabled("debug")) console.debug(prefix, message, ...details);
    },
    info(message, ...details) {
      if (enabled("info")) console.log(prefix, message, ...details);
    },
    warn(message, ...details) {
      if (enabled("warn")) console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      if (enabled("error")) console.error(prefix, message, ...details);
    },
    child(childScope) {
      return createLogger(`${scope}:${childScope}`, level);
    },
  };
}

/** Logger that drops everything */
export const silentLogger: Logger = createLogger("silent", "silent");
