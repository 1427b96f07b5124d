/**
 * Logger interface for dependency inversion
 * Allows easy mocking in tests and switching implementations
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ILogger {
  log(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Whether a message at `level` passes a logger configured with `threshold`
 */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return SEVERITY[level] >= SEVERITY[threshold];
}
