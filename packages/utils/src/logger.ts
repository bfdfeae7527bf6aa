/**
 * Structured Logging System
 * =========================
 * Centralized logging using Winston with structured output, optional log rotation,
 * and context propagation. Loggers are namespaced per package.
 */

import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

export interface LogContext {
  uri?: string;
  host?: string;
  method?: string;
  status?: number;
  username?: string;
  [key: string]: unknown;
}

interface LoggerConfig {
  level: string;
  enableConsole: boolean;
  enableFile: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
}

// File output is opt-in: this is a library and must not write next to the caller's cwd unasked
const defaultConfig: LoggerConfig = {
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
  enableConsole: process.env.LOG_CONSOLE !== 'false',
  enableFile: process.env.LOG_FILE === 'true' && process.env.NODE_ENV !== 'test',
  logDir: process.env.LOG_DIR || path.join(process.cwd(), 'logs'),
  maxFiles: process.env.LOG_MAX_FILES || '14d',
  maxSize: process.env.LOG_MAX_SIZE || '20m',
};

const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr ? '\n' + metaStr : ''}`;
  })
);

const transports: winston.transport[] = [];

if (defaultConfig.enableConsole) {
  transports.push(
    new winston.transports.Console({
      format: process.env.NODE_ENV === 'production' ? structuredFormat : consoleFormat,
      level: defaultConfig.level,
    })
  );
}

if (defaultConfig.enableFile) {
  if (!fs.existsSync(defaultConfig.logDir)) {
    fs.mkdirSync(defaultConfig.logDir, { recursive: true });
  }

  transports.push(
    new DailyRotateFile({
      filename: path.join(defaultConfig.logDir, 'error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      format: structuredFormat,
      maxSize: defaultConfig.maxSize,
      maxFiles: defaultConfig.maxFiles,
      zippedArchive: true,
    })
  );

  transports.push(
    new DailyRotateFile({
      filename: path.join(defaultConfig.logDir, 'combined-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      format: structuredFormat,
      maxSize: defaultConfig.maxSize,
      maxFiles: defaultConfig.maxFiles,
      zippedArchive: true,
    })
  );
}

const winstonLogger = winston.createLogger({
  level: defaultConfig.level,
  format: structuredFormat,
  defaultMeta: { service: 'predictkit' },
  transports,
  // winston warns when a logger has no transports at all
  silent: transports.length === 0,
  exitOnError: false,
});

/**
 * Namespaced view of the shared winston logger. Every message carries the
 * namespace plus the context the logger was created with.
 */
export class Logger {
  readonly namespace: string;
  private readonly context: LogContext;

  constructor(namespace: string, context: LogContext = {}) {
    this.namespace = namespace;
    this.context = context;
  }

  private meta(context?: LogContext): LogContext {
    return { namespace: this.namespace, ...this.context, ...context };
  }

  /**
   * An Error is flattened to name, message and stack; anything else is logged as given.
   */
  error(message: string, error?: unknown, context?: LogContext): void {
    const meta = this.meta(context);
    if (error instanceof Error) {
      winstonLogger.error(message, {
        ...meta,
        error: { message: error.message, stack: error.stack, name: error.name },
      });
    } else if (error !== undefined) {
      winstonLogger.error(message, { ...meta, error });
    } else {
      winstonLogger.error(message, meta);
    }
  }

  warn(message: string, context?: LogContext): void {
    winstonLogger.warn(message, this.meta(context));
  }

  info(message: string, context?: LogContext): void {
    winstonLogger.info(message, this.meta(context));
  }

  debug(message: string, context?: LogContext): void {
    winstonLogger.debug(message, this.meta(context));
  }

  // winston has no trace level: sent at debug, flagged
  trace(message: string, context?: LogContext): void {
    winstonLogger.debug(message, { ...this.meta(context), trace: true });
  }

  /** Same namespace, with `context` added to every message */
  child(context: LogContext): Logger {
    return new Logger(this.namespace, { ...this.context, ...context });
  }
}

export function createLogger(namespace: string): Logger {
  return new Logger(namespace);
}

export { winstonLogger };
