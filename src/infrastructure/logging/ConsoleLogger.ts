/**
 * Console logger implementation
 * Messages below the configured level are dropped
 */

import { ILogger, LogLevel, isLevelEnabled } from '../../domain/interfaces';

export class ConsoleLogger implements ILogger {
  constructor(private readonly level: LogLevel = 'debug') { }

  log(message: string, ...args: unknown[]): void {
    console.log(message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (isLevelEnabled('error', this.level)) {
      console.error(message, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (isLevelEnabled('warn', this.level)) {
      console.warn(message, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (isLevelEnabled('info', this.level)) {
      console.info(message, ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (isLevelEnabled('debug', this.level)) {
      console.debug(message, ...args);
    }
  }
}
