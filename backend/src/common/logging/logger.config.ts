import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { join } from 'path';

// Custom format for console output
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, context, ...meta }) => {
    const contextStr = context ? `[${String(context)}]` : '';
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
    return `${String(timestamp)} ${level} ${contextStr} ${String(message)} ${metaStr}`;
  }),
);

// Custom format for file output (JSON)
const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

const logLevel = process.env.LOG_LEVEL || 'debug';

// Console transport
const consoleTransport = new winston.transports.Console({
  format: consoleFormat,
  level: logLevel,
});

// Daily rotating files; LOG_TO_FILE=false keeps tests and one-off scripts off the disk
const fileTransports =
  process.env.LOG_TO_FILE === 'false'
    ? []
    : [
        new DailyRotateFile({
          dirname: join(process.cwd(), 'logs'),
          filename: 'lotto-%DATE%.log',
          datePattern: 'YYYY-MM-DD',
          zippedArchive: true,
          maxSize: '20m',
          maxFiles: '14d', // Keep logs for 14 days
          format: fileFormat,
          level: 'debug',
        }),
        new DailyRotateFile({
          dirname: join(process.cwd(), 'logs'),
          filename: 'lotto-error-%DATE%.log',
          datePattern: 'YYYY-MM-DD',
          zippedArchive: true,
          maxSize: '20m',
          maxFiles: '30d', // Keep error logs for 30 days
          format: fileFormat,
          level: 'error',
        }),
      ];

// Create winston logger
export const winstonLogger = winston.createLogger({
  level: logLevel,
  transports: [consoleTransport, ...fileTransports],
  exitOnError: false,
});
