/**
 * Leveled console logger. Every component takes one of these instead of
 * calling console directly, so tests can pass a silent one.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug: (msg: string, ...details: unknown[]) => void;
  info: (msg: string, ...details: unknown[]) => void;
  warn: (msg: string, ...details: unknown[]) => void;
  error: (msg: string, ...details: unknown[]) => void;
}

const PREFIX = "🦆";

export function createLogger(level: LogLevel = "info"): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (l: LogLevel) => LOG_LEVELS.indexOf(l) >= threshold;

  return {
    debug: (msg, ...details) => {
      if (enabled("debug")) console.log(`${PREFIX} [debug] ${msg}`, ...details);
    },
    info: (msg, ...details) => {
      if (enabled("info")) console.log(`${PREFIX} ${msg}`, ...details);
    },
    warn: (msg, ...details) => {
      if (enabled("warn")) console.warn(`${PREFIX} ${msg}`, ...details);
    },
    error: (msg, ...details) => {
      if (enabled("error")) console.error(`${PREFIX} ${msg}`, ...details);
    },
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger("silent");
