import winston from 'winston';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import type { Config } from '../config/schema.js';
import { DocMirrorError } from '../errors/index.js';

/**
 * Logger module using Winston
 * Provides structured logging with different formats and transports.
 * Console output goes to stderr: stdout carries the MCP stdio protocol.
 */

const ALL_LEVELS = ['error', 'warn', 'info', 'debug'];

export class Logger {
  private logger: winston.Logger;
  private config: Config['logging'];

  constructor(config: Config['logging'], logger?: winston.Logger) {
    this.config = config;
    if (logger) {
      this.logger = logger;
    } else {
      this.ensureLogDirectory();
      this.logger = this.createLogger();
    }
  }

  /**
   * Ensure log directory exists
   */
  private ensureLogDirectory(): void {
    if (this.config.toFile && !this.config.silent && !existsSync(this.config.dir)) {
      mkdirSync(this.config.dir, { recursive: true });
    }
  }

  /**
   * Create Winston logger instance
   */
  private createLogger(): winston.Logger {
    return winston.createLogger({
      level: this.config.level,
      format: this.getFormats(),
      transports: this.getTransports(),
      silent: this.config.silent,
      exitOnError: false,
    });
  }

  /**
   * Get log formats based on configuration
   */
  private getFormats(): winston.Logform.Format {
    const timestamp = winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss.SSS',
    });

    const errors = winston.format.errors({ stack: true });

    switch (this.config.format) {
      case 'json':
        return winston.format.combine(timestamp, errors, winston.format.json());

      case 'pretty':
        return winston.format.combine(
          timestamp,
          errors,
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, ...metadata }) => {
            let msg = `${String(timestamp)} [${level}]: ${String(message)}`;
            if (Object.keys(metadata).length > 0) {
              msg += ` ${JSON.stringify(metadata, null, 2)}`;
            }
            return msg;
          })
        );

      case 'simple':
      default:
        return winston.format.combine(
          timestamp,
          errors,
          winston.format.printf(({ timestamp, level, message }) => {
            return `${String(timestamp)} [${level}]: ${String(message)}`;
          })
        );
    }
  }

  /**
   * Get transports based on configuration
   */
  private getTransports(): winston.transport[] {
    const transports: winston.transport[] = [
      new winston.transports.Console({ stderrLevels: ALL_LEVELS }),
    ];

    if (!this.config.toFile) {
      return transports;
    }

    // File transport for all logs
    transports.push(
      new winston.transports.File({
        filename: join(this.config.dir, 'docmirror-combined.log'),
        maxsize: parseSize(this.config.maxSize),
        maxFiles: this.config.maxFiles,
      })
    );

    // File transport for errors only
    transports.push(
      new winston.transports.File({
        filename: join(this.config.dir, 'docmirror-error.log'),
        level: 'error',
        maxsize: parseSize(this.config.maxSize),
        maxFiles: this.config.maxFiles,
      })
    );

    return transports;
  }

  /**
   * Log debug message
   */
  debug(message: string, metadata?: object): void {
    this.logger.debug(message, metadata);
  }

  /**
   * Log info message
   */
  info(message: string, metadata?: object): void {
    this.logger.info(message, metadata);
  }

  /**
   * Log warning message
   */
  warn(message: string, metadata?: object): void {
    this.logger.warn(message, metadata);
  }

  /**
   * Log error message
   */
  error(message: string, error?: Error, metadata?: object): void {
    const errorMetadata = error
      ? {
          error: {
            message: error.message,
            stack: error.stack,
            ...(error instanceof DocMirrorError ? { code: error.code, severity: error.severity } : {}),
          },
          ...metadata,
        }
      : metadata;

    this.logger.error(message, errorMetadata);
  }

  /**
   * Create child logger with additional metadata
   */
  child(metadata: object): Logger {
    return new Logger(this.config, this.logger.child(metadata));
  }
}

/**
 * Parse size string ("10m", "512k") to bytes
 */
export function parseSize(size: string): number {
  const units: Record<string, number> = {
    b: 1,
    k: 1024,
    m: 1024 * 1024,
    g: 1024 * 1024 * 1024,
  };

  const match = size.toLowerCase().match(/^(\d+)([bkmg])$/);
  const num = match?.[1];
  const unit = match?.[2];
  if (!num || !unit) {
    return 10 * 1024 * 1024; // Default 10MB
  }

  return parseInt(num, 10) * (units[unit] ?? 1);
}

// Singleton instance
let loggerInstance: Logger | null = null;

/**
 * Get logger singleton
 */
export function getLogger(config?: Config['logging']): Logger {
  if (!loggerInstance && config) {
    loggerInstance = new Logger(config);
  } else if (!loggerInstance) {
    throw new Error('Logger not initialized. Call getLogger with config first.');
  }
  return loggerInstance;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}
