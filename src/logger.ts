/**
 * Logger utility
 *
 * Everything goes to stderr: stdout belongs to the stdio transport.
 */

import winston from 'winston';

const { combine, timestamp, printf, colorize, errors } = winston.format;

const ALL_LEVELS = Object.keys(winston.config.npm.levels);

const logFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
  let log = `${timestamp} [${level}]: ${message}`;
  if (Object.keys(meta).length > 0) {
    log += ` ${JSON.stringify(meta)}`;
  }
  if (stack) {
    log += `\n${stack}`;
  }
  return log;
});

export function createLogger(level: string = 'info'): winston.Logger {
  return winston.createLogger({
    level,
    format: combine(
      errors({ stack: true }),
      timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      colorize(),
      logFormat
    ),
    transports: [
      new winston.transports.Console({ stderrLevels: ALL_LEVELS }),
    ],
    exceptionHandlers: [
      new winston.transports.Console({ stderrLevels: ALL_LEVELS }),
    ],
    rejectionHandlers: [
      new winston.transports.Console({ stderrLevels: ALL_LEVELS }),
    ],
  });
}

// Default logger instance
export const logger = createLogger(process.env.LOG_LEVEL ?? 'info');
