/**
 * File logger implementation
 * Writes logs to dated files in the runtime directory; errors also go to a separate error log
 */

import fs from 'fs';
import path from 'path';
import { ILogger, LogLevel, isLevelEnabled } from '../../domain/interfaces';

export class FileLogger implements ILogger {
  readonly logFile: string;
  readonly errorFile: string;
  private writeStream: fs.WriteStream | null = null;
  private errorStream: fs.WriteStream | null = null;

  constructor(logDir: string, private readonly level: LogLevel = 'debug') {
    fs.mkdirSync(logDir, { recursive: true });

    const day = new Date().toISOString().split('T')[0];
    this.logFile = path.join(logDir, `app-${day}.log`);
    this.errorFile = path.join(logDir, `error-${day}.log`);

    this.writeStream = fs.createWriteStream(this.logFile, { flags: 'a' });
    this.errorStream = fs.createWriteStream(this.errorFile, { flags: 'a' });

    // Stream failures must not take the client down with them
    this.writeStream.on('error', (err) => {
      console.error('Error writing to log file:', err);
    });
    this.errorStream.on('error', (err) => {
      console.error('Error writing to error file:', err);
    });
  }

  static formatMessage(level: string, message: string, args: unknown[], now: Date = new Date()): string {
    const argsStr = args.length > 0 ? ' ' + args.map((arg) => {
      if (arg instanceof Error) {
        return `${arg.name}: ${arg.message}`;
      }
      return typeof arg === 'object' ? JSON.stringify(arg) : String(arg);
    }).join(' ') : '';
    return `[${now.toISOString()}] [${level}] ${message}${argsStr}\n`;
  }

  private write(stream: fs.WriteStream | null, level: string, message: string, args: unknown[]): void {
    if (!stream || stream.destroyed || !stream.writable) {
      return;
    }
    stream.write(FileLogger.formatMessage(level, message, args));
  }

  log(message: string, ...args: unknown[]): void {
    this.write(this.writeStream, 'LOG', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    if (isLevelEnabled('error', this.level)) {
      this.write(this.errorStream, 'ERROR', message, args);
      this.write(this.writeStream, 'ERROR', message, args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (isLevelEnabled('warn', this.level)) {
      this.write(this.writeStream, 'WARN', message, args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (isLevelEnabled('info', this.level)) {
      this.write(this.writeStream, 'INFO', message, args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (isLevelEnabled('debug', this.level)) {
      this.write(this.writeStream, 'DEBUG', message, args);
    }
  }

  /**
   * Close file streams (call on application shutdown)
   */
  close(): void {
    this.writeStream?.end();
    this.writeStream = null;
    this.errorStream?.end();
    this.errorStream = null;
  }
}
