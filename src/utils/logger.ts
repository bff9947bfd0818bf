import winston from 'winston';
import path from 'path';

/**
 * Logger Configuration
 *
 * Structured logging for the judgment pipeline. Every component gets its own
 * logger so entries can be filtered by `component` in logs/combined.log.
 */

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, component, ...metadata }) => {
    let msg = `${timestamp} [${level}] ${component ? `${component}: ` : ''}${message}`;
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
  })
);

function logDirectory(): string {
  return process.env.LOG_DIR || path.join(process.cwd(), 'logs');
}

/**
 * Create a logger instance
 * @param component Component name (e.g., 'StageRunner', 'VoyageEmbeddingClient')
 */
export function createLogger(component: string): winston.Logger {
  const silent = process.env.LOG_SILENT === 'true';

  // No file handles at all in silent mode (test runs)
  const fileTransports = silent
    ? []
    : [
        new winston.transports.File({
          filename: path.join(logDirectory(), 'combined.log'),
          maxsize: 5242880, // 5MB
          maxFiles: 5,
        }),
        new winston.transports.File({
          filename: path.join(logDirectory(), 'error.log'),
          level: 'error',
          maxsize: 5242880, // 5MB
          maxFiles: 5,
        }),
      ];

  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: logFormat,
    defaultMeta: { component },
    silent,
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
      }),
      ...fileTransports,
    ],
  });
}

/**
 * Default logger instance
 */
export const logger = createLogger('App');

/**
 * Logger bound to one pipeline stage.
 *
 * Adds the stage id (and the item id where there is one) to every entry.
 */
export class StageLogger {
  private logger: winston.Logger;
  private stageId: string;

  constructor(stageId: string) {
    this.stageId = stageId;
    this.logger = createLogger(`Stage:${stageId}`);
  }

  info(message: string, metadata?: object) {
    this.logger.info(message, { stage: this.stageId, ...metadata });
  }

  error(message: string, error?: unknown, metadata?: object) {
    this.logger.error(message, {
      stage: this.stageId,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      ...metadata,
    });
  }

  warn(message: string, metadata?: object) {
    this.logger.warn(message, { stage: this.stageId, ...metadata });
  }

  debug(message: string, metadata?: object) {
    this.logger.debug(message, { stage: this.stageId, ...metadata });
  }

  started(metadata?: object) {
    this.info('Stage started', metadata);
  }

  itemSucceeded(itemId: string, metadata?: object) {
    this.info('Item completed', { itemId, ...metadata });
  }

  itemSkipped(itemId: string, reason: string) {
    this.warn('Item skipped', { itemId, reason });
  }

  itemFailed(itemId: string, error: unknown, attempts: number) {
    this.error('Item failed', error, { itemId, attempts });
  }

  completed(metadata?: object) {
    this.info('Stage completed', metadata);
  }

  aborted(error: unknown) {
    this.error('Stage aborted', error);
  }
}
