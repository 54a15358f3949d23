// logger.ts - Centralized logging utility for the diagnostic engine
import * as fs from 'fs';
import * as path from 'path';
import { redact, redactText } from './redact';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  CRITICAL = 4
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  console?: boolean;
  maxFileSize?: number;
  maxFiles?: number;
  /** Defaults to `<component>.log` */
  fileName?: string;
}

export class Logger {
  private logDir: string;
  private logFile: string;
  private component: string;
  private minLevel: LogLevel;
  private writeConsole: boolean;
  private maxFileSize: number;
  private maxFiles: number;

  constructor(component: string, logDir: string, options: LoggerOptions = {}) {
    this.component = component;
    this.logDir = logDir;
    this.minLevel = options.minLevel ?? LogLevel.INFO;
    this.writeConsole = options.console ?? true;
    this.maxFileSize = options.maxFileSize ?? 10 * 1024 * 1024; // 10MB
    this.maxFiles = options.maxFiles ?? 5;

    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }

    this.logFile = path.join(logDir, options.fileName ?? `${component}.log`);
    this.rotateLogsIfNeeded();
  }

  /** Child logger writing to this logger's file, tagged with a sub-component. */
  child(subComponent: string): Logger {
    return new Logger(`${this.component}:${subComponent}`, this.logDir, {
      minLevel: this.minLevel,
      console: this.writeConsole,
      maxFileSize: this.maxFileSize,
      maxFiles: this.maxFiles,
      fileName: path.basename(this.logFile),
    });
  }

  getLogFile(): string {
    return this.logFile;
  }

  private rotateLogsIfNeeded(): void {
    try {
      if (!fs.existsSync(this.logFile)) {
        return;
      }

      const stats = fs.statSync(this.logFile);
      if (stats.size < this.maxFileSize) {
        return;
      }

      for (let i = this.maxFiles - 1; i > 0; i--) {
        const oldFile = `${this.logFile}.${i}`;
        if (!fs.existsSync(oldFile)) continue;

        if (i === this.maxFiles - 1) {
          fs.unlinkSync(oldFile); // Delete oldest
        } else {
          fs.renameSync(oldFile, `${this.logFile}.${i + 1}`);
        }
      }

      fs.renameSync(this.logFile, `${this.logFile}.1`);
    } catch (error) {
      console.error('Error rotating logs:', error);
    }
  }

  private formatMessage(level: LogLevel, message: string, data?: unknown, error?: unknown): string {
    const timestamp = new Date().toISOString();
    let logLine = `[${timestamp}] [${LogLevel[level]}] [${this.component}] ${redactText(message)}`;

    if (data !== undefined) {
      logLine += `\n  Data: ${JSON.stringify(redact(data), null, 2)}`;
    }

    if (error !== undefined) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logLine += `\n  Error: ${redactText(errorMessage)}`;
      // Stack traces only for ERROR and above
      if (error instanceof Error && error.stack && level >= LogLevel.ERROR) {
        logLine += `\n  Stack: ${redactText(error.stack)}`;
      }
    }

    return logLine + '\n';
  }

  private writeLog(level: LogLevel, message: string, data?: unknown, error?: unknown): void {
    if (level < this.minLevel) {
      return;
    }

    const logMessage = this.formatMessage(level, message, data, error);

    if (this.writeConsole) {
      if (level >= LogLevel.WARN) {
        console.error(logMessage.trim());
      } else {
        console.log(logMessage.trim());
      }
    }

    try {
      fs.appendFileSync(this.logFile, logMessage);
      this.rotateLogsIfNeeded();
    } catch (err) {
      console.error('Failed to write log:', err);
    }
  }

  public debug(message: string, data?: unknown): void {
    this.writeLog(LogLevel.DEBUG, message, data);
  }

  public info(message: string, data?: unknown): void {
    this.writeLog(LogLevel.INFO, message, data);
  }

  public warn(message: string, data?: unknown, error?: unknown): void {
    this.writeLog(LogLevel.WARN, message, data, error);
  }

  public error(message: string, error?: unknown, data?: unknown): void {
    this.writeLog(LogLevel.ERROR, message, data, error);
  }

  public critical(message: string, error?: unknown, data?: unknown): void {
    this.writeLog(LogLevel.CRITICAL, message, data, error);
  }

  public startOperation(operation: string, context?: unknown): void {
    this.info(`Starting: ${operation}`, context);
  }

  public endOperation(operation: string, success: boolean, result?: unknown): void {
    if (success) {
      this.info(`Completed: ${operation}`, result);
    } else {
      this.warn(`Failed: ${operation}`, result);
    }
  }
}

export function parseLogLevel(value: string): LogLevel | undefined {
  const key = value.toUpperCase();
  switch (key) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'INFO': return LogLevel.INFO;
    case 'WARN': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    case 'CRITICAL': return LogLevel.CRITICAL;
    default: return undefined;
  }
}

export default Logger;
