/**
 * Logging for the snapshot engine.
 *
 * Sessions take `logger?: boolean | SnapshotLogger`; nothing is printed
 * unless a caller opts in.
 */

export type SnapshotLogLevel = "debug" | "info" | "warn" | "error";

export interface SnapshotLogger {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
}

function writeConsole(level: SnapshotLogLevel, message: string, data?: Record<string, unknown>): void {
  const line = `[snapkeep:${level}] ${message}`;
  const detail = data ?? "";
  switch (level) {
    case "debug":
      console.debug(line, detail);
      return;
    case "info":
      console.info(line, detail);
      return;
    case "warn":
      console.warn(line, detail);
      return;
    case "error":
      console.error(line, detail);
      return;
  }
}

export const consoleLogger: SnapshotLogger = {
  debug: (message, data) => writeConsole("debug", message, data),
  info: (message, data) => writeConsole("info", message, data),
  warn: (message, data) => writeConsole("warn", message, data),
  error: (message, data) => writeConsole("error", message, data)
};

export const silentLogger: SnapshotLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

export function createLogger(logger: boolean | SnapshotLogger | undefined): SnapshotLogger {
  if (!logger) return silentLogger;
  if (logger === true) return consoleLogger;
  return logger;
}
