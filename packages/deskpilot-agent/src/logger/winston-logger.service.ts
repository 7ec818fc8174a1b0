import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';
import * as os from 'os';

export interface WinstonLoggerOptions {
  logDir: string;
  level: string;
}

/**
 * Resolves the directory log files go to. Falls back to the OS temp
 * directory when the configured one cannot be created.
 */
export function resolveLogDir(logDir: string): string {
  const absolute = path.resolve(logDir);
  if (fs.existsSync(absolute)) {
    return absolute;
  }
  try {
    fs.mkdirSync(absolute, { recursive: true });
    return absolute;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`Failed to create log directory ${absolute}: ${reason}`);
    return os.tmpdir();
  }
}

/**
 * Create Winston logger configuration
 */
export function createWinstonLogger(options: WinstonLoggerOptions) {
  const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, context, stack }) => {
      const contextStr = context ? `[${String(context)}] ` : '';
      const stackStr = stack ? `\n${String(stack)}` : '';
      return `[${String(timestamp)}] [${level.toUpperCase()}] ${contextStr}${String(message)}${stackStr}`;
    }),
  );

  const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, context }) => {
      const contextStr = context ? `[${String(context)}] ` : '';
      return `[${String(timestamp)}] ${level} ${contextStr}${String(message)}`;
    }),
  );

  const consoleTransport = new winston.transports.Console({
    format: consoleFormat,
    level: options.level,
  });

  const logDir = resolveLogDir(options.logDir);

  const fileRotateTransport = new DailyRotateFile({
    filename: path.join(logDir, 'deskpilot-%DATE%.log'),
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '10m',
    maxFiles: '14d',
    format: logFormat,
    level: 'debug',
  });

  const errorRotateTransport = new DailyRotateFile({
    filename: path.join(logDir, 'deskpilot-error-%DATE%.log'),
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '10m',
    maxFiles: '14d',
    format: logFormat,
    level: 'error',
  });

  return winston.createLogger({
    level: options.level,
    transports: [consoleTransport, fileRotateTransport, errorRotateTransport],
    exceptionHandlers: [
      new winston.transports.File({
        filename: path.join(logDir, 'deskpilot-exceptions.log'),
        format: logFormat,
      }),
    ],
    rejectionHandlers: [
      new winston.transports.File({
        filename: path.join(logDir, 'deskpilot-rejections.log'),
        format: logFormat,
      }),
    ],
  });
}
