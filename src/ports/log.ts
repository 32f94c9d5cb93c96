export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Log port interface.
 * All diagnostics raised while expanding go through here.
 */
export interface LogPort {
  log(level: LogLevel, message: string, fields?: Record<string, unknown>): void;
}

export type LogRecord = {
  level: LogLevel;
  message: string;
  fields?: Record<string, unknown>;
};

const PREFIX = "[specmacro]";

export function consoleLogPort(minLevel: LogLevel = "info"): LogPort {
  const rank: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };
  return {
    log(level, message, fields) {
      if (rank[level] < rank[minLevel]) return;
      const args: unknown[] = fields ? [PREFIX, message, fields] : [PREFIX, message];
      switch (level) {
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
    },
  };
}

/**
 * Collects records in memory. Used by tests and embedders that render
 * diagnostics themselves.
 */
export function memoryLogPort(): LogPort & { records: LogRecord[] } {
  const records: LogRecord[] = [];
  return {
    records,
    log(level, message, fields) {
      records.push(fields ? { level, message, fields } : { level, message });
    },
  };
}
