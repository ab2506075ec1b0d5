// src/infrastructure/logging/logger.ts
import fs from 'fs-extra';
import path from 'path';
import { createLogger, format, transports, Logger as WinstonLogger } from 'winston';
import { serializeError } from '../../utils/error';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export type LogContext = Record<string, unknown>;

export interface LoggerOptions {
  logDir: string;
  consoleOutput?: boolean;
  fileOutput?: boolean;
  level?: LogLevel;
  applicationName?: string;
}

type LoggerTransport = transports.ConsoleTransportInstance | transports.FileTransportInstance;

export class Logger {
  private readonly logger: WinstonLogger;
  private readonly options: Required<LoggerOptions>;
  private readonly runId: string;

  constructor(options: LoggerOptions) {
    this.options = {
      consoleOutput: true,
      fileOutput: true,
      level: LogLevel.INFO,
      applicationName: 'caddis-price-sync',
      ...options
    };

    this.runId = this.generateRunId();

    if (this.options.fileOutput) {
      fs.ensureDirSync(this.options.logDir);
    }

    this.logger = this.createWinstonLogger();
  }

  private generateRunId(): string {
    return `${this.options.applicationName}-${new Date().toISOString().replace(/[:.]/g, '-')}-${Math.random().toString(36).substring(2, 8)}`;
  }

  private createWinstonLogger(): WinstonLogger {
    const logFormat = format.combine(
      format.timestamp(),
      format.errors({ stack: true }),
      format.json()
    );

    const loggerTransports: LoggerTransport[] = [];

    if (this.options.consoleOutput) {
      loggerTransports.push(
        new transports.Console({
          format: format.combine(
            format.colorize(),
            format.printf(({ timestamp, level, message, ...meta }) => {
              // one line per entry
              const context = meta.context ? ` ${JSON.stringify(meta.context)}` : '';
              return `[${timestamp}] ${level}: ${message}${context}`;
            })
          )
        })
      );
    }

    if (this.options.fileOutput) {
      loggerTransports.push(
        new transports.File({
          filename: path.join(this.options.logDir, 'application.log'),
          maxsize: 5242880, // 5MB
          maxFiles: 5,
        }),
        new transports.File({
          filename: path.join(this.options.logDir, 'error.log'),
          level: 'error'
        })
      );
    }

    // Winston warns when it has no transport at all
    if (loggerTransports.length === 0) {
      loggerTransports.push(
        new transports.Console({
          silent: true
        })
      );
    }

    return createLogger({
      level: this.options.level,
      format: logFormat,
      defaultMeta: {
        runId: this.runId,
        applicationName: this.options.applicationName
      },
      transports: loggerTransports
    });
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(message, { context });
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(message, { context });
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(message, { context });
  }

  error(message: string, context?: LogContext): void {
    this.logger.error(message, { context });
  }

  /**
   * Log a fatal error with its serialized stack
   */
  critical(message: string, error: unknown, context?: LogContext): void {
    this.logger.error(message, {
      error: serializeError(error),
      context,
      isCritical: true
    });
  }

  /**
   * Log one pagination step of an extractor
   */
  logPageFetched(source: string, page: number, details: LogContext): void {
    this.debug(`${source} page ${page} fetched`, { source, page, ...details });
  }

  /**
   * Write a JSON report next to the log files.
   * Returns null when file output is disabled.
   */
  async writeReport(reportName: string, data: unknown): Promise<string | null> {
    if (!this.options.fileOutput) {
      return null;
    }

    const reportFile = path.join(this.options.logDir, `${reportName}-${this.runId}.json`);

    try {
      await fs.writeJson(reportFile, data, { spaces: 2 });
      this.info(`Report generated: ${reportName}`, { reportFile });
      return reportFile;
    } catch (error) {
      this.error(`Failed to write report: ${reportName}`, {
        reportFile,
        error: serializeError(error)
      });
      throw error;
    }
  }

  close(): void {
    this.logger.close();
  }
}

let loggerInstance: Logger | null = null;

/**
 * Initialize the process-wide logger used by the CLI and the global error handlers
 */
export function initializeLogger(options: LoggerOptions): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(options);
  }
  return loggerInstance;
}

/**
 * Get the logger instance
 */
export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger({
      logDir: 'logs',
      level: LogLevel.INFO,
      consoleOutput: true,
      fileOutput: false,
    });
  }
  return loggerInstance;
}

/**
 * Clean up the logger instance
 */
export function cleanupLogger(): void {
  if (loggerInstance) {
    loggerInstance.close();
    loggerInstance = null;
  }
}
