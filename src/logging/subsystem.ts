export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  const value = raw?.trim().toLowerCase();
  return value === "debug" || value === "info" || value === "warn" || value === "error"
    ? value
    : undefined;
}

let threshold: LogLevel = parseLogLevel(process.env.SCAN_TAGGER_LOG_LEVEL) ?? "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export type SubsystemLogger = {
  readonly subsystem: string;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
};

/**
 * Console logger that prefixes every line with `[subsystem]`.
 * Warnings and errors go to stderr.
 */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const emit = (level: LogLevel, message: string, details: unknown[]) => {
    if (LOG_LEVEL_VALUES[level] < LOG_LEVEL_VALUES[threshold]) {
      return;
    }
    const line = `[${subsystem}] ${message}`;
    if (level === "error") {
      console.error(line, ...details);
    } else if (level === "warn") {
      console.warn(line, ...details);
    } else {
      console.log(line, ...details);
    }
  };
  return {
    subsystem,
    debug: (message, ...details) => emit("debug", message, details),
    info: (message, ...details) => emit("info", message, details),
    warn: (message, ...details) => emit("warn", message, details),
    error: (message, ...details) => emit("error", message, details),
  };
}
