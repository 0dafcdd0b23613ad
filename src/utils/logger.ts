export const LOG_LEVELS = ["DEBUG", "INFO", "WARNING", "ERROR"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const RANK: Record<LogLevel, number> = { DEBUG: 10, INFO: 20, WARNING: 30, ERROR: 40 };

let threshold: LogLevel = "INFO";

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function isLevelEnabled(level: LogLevel) {
  return RANK[level] >= RANK[threshold];
}

export type Logger = {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
};

/**
 * Console logger scoped by a `[tag]`, filtered by the process-wide LOG_LEVEL.
 * Errors passed as details are printed with their stack by console itself.
 */
export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  const line = (level: LogLevel) => `${new Date().toISOString()} ${level.padEnd(7)} ${tag}`;

  return {
    debug: (message, ...details) => {
      if (isLevelEnabled("DEBUG")) console.debug(line("DEBUG"), message, ...details);
    },
    info: (message, ...details) => {
      if (isLevelEnabled("INFO")) console.info(line("INFO"), message, ...details);
    },
    warn: (message, ...details) => {
      if (isLevelEnabled("WARNING")) console.warn(line("WARNING"), message, ...details);
    },
    error: (message, ...details) => {
      if (isLevelEnabled("ERROR")) console.error(line("ERROR"), message, ...details);
    },
  };
}
