import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

const isTest = process.env.NODE_ENV === 'test';
const logDir = process.env.LOG_DIR || 'logs';

function createTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    }),
  ];

  if (!isTest) {
    transports.push(
      new winston.transports.File({ filename: `${logDir}/error.log`, level: 'error' }),
      new DailyRotateFile({
        filename: `${logDir}/combined-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        maxSize: '10m',
        maxFiles: '14d',
        zippedArchive: false,
      }),
    );
  }

  return transports;
}

const rootLogger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: isTest,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  transports: createTransports(),
});

export class Logger {
  private logger: winston.Logger;

  constructor(private context: string) {
    this.logger = rootLogger.child({ context });
  }

  info(message: string, meta?: unknown): void {
    this.logger.info(message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.logger.error(message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.logger.warn(message, meta);
  }

  debug(message: string, meta?: unknown): void {
    this.logger.debug(message, meta);
  }
}
