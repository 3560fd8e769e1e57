/**
 * Logger - sink for warnings and violation messages
 *
 * The engine never writes to the process streams itself. Callers pass a
 * Logger; the CLI supplies a console logger, tests use the memory logger.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Logger interface
 */
export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

/**
 * A message recorded by the memory logger
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
}

/**
 * Logger that keeps every message in order
 */
export interface MemoryLogger extends Logger {
  readonly entries: readonly LogEntry[];
  /** Messages at one level, in order */
  messages(level: LogLevel): string[];
  clear(): void;
}

export function createMemoryLogger(): MemoryLogger {
  const entries: LogEntry[] = [];
  const record = (level: LogLevel) => (message: string): void => {
    entries.push({ level, message });
  };

  return {
    entries,
    error: record('error'),
    warn: record('warn'),
    info: record('info'),
    debug: record('debug'),
    messages(level: LogLevel): string[] {
      return entries.filter((entry) => entry.level === level).map((entry) => entry.message);
    },
    clear(): void {
      entries.length = 0;
    },
  };
}

/** Logger that discards everything */
export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
};
