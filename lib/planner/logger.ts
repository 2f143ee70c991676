/**
 * Console-backed logger with a level threshold and a "[scope]" prefix.
 *
 * Loggers are values: the request context carries one, and components
 * derive scoped children from it instead of reaching for a global.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  readonly level: LogLevel;
  readonly scope: string;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

function levelWeight(level: LogLevel): number {
  switch (level) {
    case "debug":
      return 10;
    case "info":
      return 20;
    case "warn":
      return 30;
    case "error":
      return 40;
  }
}

export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const threshold = levelWeight(level);

  const write = (lvl: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (levelWeight(lvl) < threshold) return;
    const line = `[${scope}] ${message}`;
    const args: unknown[] = meta ? [line, meta] : [line];
    switch (lvl) {
      case "debug":
        console.debug(...args);
        break;
      case "info":
        console.info(...args);
        break;
      case "warn":
        console.warn(...args);
        break;
      case "error":
        console.error(...args);
        break;
    }
  };

  return {
    level,
    scope,
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta),
    child: (childScope) => createLogger(`${scope}:${childScope}`, level),
  };
}
