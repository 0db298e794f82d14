/**
 * Leveled logger gated by LOG_LEVEL. Every line goes to stderr so stdout
 * carries nothing but the rendered answer.
 */

const LOG_LEVELS = {
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  SILENT: 5,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const name = (value ?? "").trim().toUpperCase();
  return isLogLevel(name) ? name : "INFO";
}

let threshold: number = LOG_LEVELS[parseLogLevel(process.env.LOG_LEVEL)];

export function setLogLevel(level: LogLevel): void {
  threshold = LOG_LEVELS[level];
}

export const logger = {
  debug: (...args: unknown[]): void => {
    if (threshold <= LOG_LEVELS.DEBUG) console.error("[DEBUG]", ...args);
  },
  info: (...args: unknown[]): void => {
    if (threshold <= LOG_LEVELS.INFO) console.error("[INFO]", ...args);
  },
  warn: (...args: unknown[]): void => {
    if (threshold <= LOG_LEVELS.WARN) console.warn("[WARN]", ...args);
  },
  error: (...args: unknown[]): void => {
    if (threshold <= LOG_LEVELS.ERROR) console.error("[ERROR]", ...args);
  },
};
