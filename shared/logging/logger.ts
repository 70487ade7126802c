import winston from 'winston';

const LOG_LEVELS = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 4,
} as const;

const LOG_COLORS = {
  error: 'red',
  warn: 'yellow',
  info: 'cyan',
  debug: 'white',
};

winston.addColors(LOG_COLORS);

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(({ timestamp, level, message, service, taskName, taskId }) => {
    const task = taskName ? ` <${taskName}${taskId ? `#${taskId}` : ''}>` : '';
    return `${timestamp} [${service || 'SYS'}]${task} ${level}: ${message}`;
  })
);

const createWinstonLogger = (serviceName: string): winston.Logger => {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: process.env.NODE_ENV === 'production' ? logFormat : consoleFormat,
      silent: process.env.NODE_ENV === 'test'
    })
  ];

  if (process.env.NODE_ENV === 'production') {
    transports.push(
      new winston.transports.File({
        filename: 'logs/error.log',
        level: 'error',
        format: logFormat,
        maxsize: 5242880,
        maxFiles: 3,
      }),
      new winston.transports.File({
        filename: 'logs/combined.log',
        format: logFormat,
        maxsize: 5242880,
        maxFiles: 3,
      })
    );
  }

  return winston.createLogger({
    level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'development' ? 'debug' : 'info'),
    levels: LOG_LEVELS,
    defaultMeta: { service: serviceName },
    transports,
    exitOnError: false,
  });
};

export type AttemptOutcomeLabel = 'success' | 'retry' | 'fatal' | 'unresolved' | 'abandoned';

/**
 * One record per delivery attempt. This is the shape external log and metrics
 * collectors key on, so field names are part of the contract.
 */
export interface TaskAttemptRecord {
  taskId: string;
  taskName: string;
  queue: string;
  attempt: number;
  outcome: AttemptOutcomeLabel;
  reason?: string;
  durationMs: number;
  timestampEnd: string;
}

export interface LogContext {
  taskId?: string;
  taskName?: string;
  transactionRef?: string;
  error?: string;
  [key: string]: unknown;
}

export class Logger {
  private logger: winston.Logger;

  constructor(serviceName: string, parent?: winston.Logger, meta?: LogContext) {
    this.logger = parent && meta ? parent.child(meta) : createWinstonLogger(serviceName);
  }

  /**
   * Logger carrying extra metadata on every line, sharing the parent's transports.
   */
  child(meta: LogContext): Logger {
    return new Logger('', this.logger, meta);
  }

  error(message: string, context?: LogContext): void {
    this.logger.error(message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(message, context);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(message, context);
  }

  logError(message: string, error: unknown, context?: LogContext): void {
    const err = error instanceof Error ? error : new Error(String(error));
    this.error(message, {
      ...context,
      error: err.message,
      stack: err.stack
    });
  }

  logTaskAttempt(record: TaskAttemptRecord): void {
    const message = `Task ${record.taskName} attempt ${record.attempt}: ${record.outcome}`;
    const context: LogContext = { ...record, event: 'task-attempt' };

    if (record.outcome === 'success') {
      this.info(message, context);
    } else if (record.outcome === 'retry') {
      this.warn(message, context);
    } else {
      this.error(message, context);
    }
  }
}
