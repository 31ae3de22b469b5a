/**
 * Logging utility using winston
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import fs from 'fs';
import path from 'path';
import { LogLevelSchema } from '@procward/core';
import type { ILogger, LogLevel } from '@procward/core';

export interface LoggerOptions {
  level?: LogLevel;

  /**
   * Directory for rotated log files. Console-only when omitted.
   */
  logDir?: string;
}

export class Logger implements ILogger {
  private logger: winston.Logger;
  private fileLoggingEnabled = false;
  private consoleTransport: winston.transport;

  constructor(options: LoggerOptions = {}) {
    if (options.logDir) {
      const absoluteLogDir = path.resolve(process.cwd(), options.logDir);

      // Degrade to console-only logging if the directory can't be created
      try {
        if (!fs.existsSync(absoluteLogDir)) {
          fs.mkdirSync(absoluteLogDir, { recursive: true });
        }
        this.fileLoggingEnabled = true;
      } catch (error) {
        console.warn(
          `[Logger] Warning: Failed to create log directory at ${absoluteLogDir}. File logging disabled. Error: ${error}`
        );
      }
    }

    // Child output owns stdout, so every level goes to stderr
    this.consoleTransport = new winston.transports.Console({
      stderrLevels: [...LogLevelSchema.options],
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    });

    const transports: winston.transport[] = [this.consoleTransport];

    if (this.fileLoggingEnabled && options.logDir) {
      const dirname = path.resolve(process.cwd(), options.logDir);
      transports.push(
        new DailyRotateFile({
          dirname,
          filename: '%DATE%-error.log',
          datePattern: 'YYYYMMDD',
          level: 'error',
          maxSize: '10m',
          maxFiles: '30d',
          zippedArchive: true,
        }),
        new DailyRotateFile({
          dirname,
          filename: '%DATE%.log',
          datePattern: 'YYYYMMDD',
          maxSize: '10m',
          maxFiles: '30d',
          zippedArchive: true,
        })
      );
    }

    const envLevel = LogLevelSchema.safeParse(process.env.PROCWARD_LOG_LEVEL);

    this.logger = winston.createLogger({
      level: options.level ?? (envLevel.success ? envLevel.data : 'info'),
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports,
    });
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  getLevel(): string {
    return this.logger.level;
  }

  isFileLoggingEnabled(): boolean {
    return this.fileLoggingEnabled;
  }

  /**
   * Disable console logging
   */
  disableConsole(): void {
    this.logger.remove(this.consoleTransport);
  }

  /**
   * Enable console logging
   */
  enableConsole(): void {
    if (!this.logger.transports.includes(this.consoleTransport)) {
      this.logger.add(this.consoleTransport);
    }
  }
}

// Singleton instance (console only)
export const logger = new Logger();
