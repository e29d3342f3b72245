// Scoped stderr logger for coordinator diagnostics
// stdout stays free for reports and the MCP stdio protocol

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let defaultLevel: LogLevel = 'info';

/** Set the threshold used by loggers created without an explicit level. */
export function setLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

export function createLogger(scope: string, level?: LogLevel): Logger {
  const write = (msgLevel: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>): void => {
    const threshold = level ?? defaultLevel;
    if (LEVEL_RANK[msgLevel] < LEVEL_RANK[threshold]) return;

    const prefix = `[${scope}:${msgLevel.toUpperCase()}]`;
    if (data) {
      console.error(`${prefix} ${message}`, JSON.stringify(data));
    } else {
      console.error(`${prefix} ${message}`);
    }
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
}

/** Logger that discards everything; handy for embedding and tests. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
