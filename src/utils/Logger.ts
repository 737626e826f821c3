import winston from 'winston';
import type { Reporter } from '../core/types.js';

/**
 * Process logger for the CLI. Everything goes to stderr so stdout stays free;
 * file logging is opt-in via TABTOKEN_LOG_ENABLE.
 */
export function createLogger(env: NodeJS.ProcessEnv = process.env): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    }),
  ];

  const isFileLogEnabled = env.TABTOKEN_LOG_ENABLE === 'true' || env.TABTOKEN_LOG_ENABLE === '1';
  if (isFileLogEnabled) {
    transports.push(
      new winston.transports.File({
        filename: env.TABTOKEN_LOG_FILE || 'tabtoken.log',
        format: winston.format.json(),
      }),
    );
  }

  return winston.createLogger({
    level: env.TABTOKEN_LOG_LEVEL || 'info',
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    transports,
  });
}

export function createLoggerReporter(logger: winston.Logger): Reporter {
  return {
    debug: (message, meta) => {
      logger.debug(message, meta);
    },
    info: (message, meta) => {
      logger.info(message, meta);
    },
    warn: (message, meta) => {
      logger.warn(message, meta);
    },
  };
}
