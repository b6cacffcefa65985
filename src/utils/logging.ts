import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { ConfigManager } from '../config/ConfigManager.js';
import type { LoggingConfig } from '../config/types.js';

// Default logger until initializeLogger() applies the configured transports
export const logger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize({ all: true }),
        winston.format.simple()
      ),
    }),
  ],
});

let isInitialized = false;

/**
 * Initialize logger with the given logging settings, or those of ConfigManager.
 * Only the first call takes effect.
 */
export function initializeLogger(
  logging: LoggingConfig = ConfigManager.getInstance().getConfig().logging
): void {
  if (isInitialized) {
    return;
  }

  const config = { logging };

  logger.level = config.logging.level;
  logger.clear();

  if (config.logging.file.enabled) {
    logger.add(
      new DailyRotateFile({
        filename: `${config.logging.file.path}/error-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        level: 'error',
        maxSize: config.logging.file.maxSize,
        maxFiles: `${config.logging.file.maxFiles}d`,
        zippedArchive: true,
        auditFile: `${config.logging.file.path}/.audit-error.json`,
      })
    );

    logger.add(
      new DailyRotateFile({
        filename: `${config.logging.file.path}/app-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        maxSize: config.logging.file.maxSize,
        maxFiles: `${config.logging.file.maxFiles}d`,
        zippedArchive: true,
        auditFile: `${config.logging.file.path}/.audit-app.json`,
      })
    );
  }

  if (config.logging.console.enabled) {
    logger.add(
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize({ all: config.logging.console.colorize }),
          winston.format.simple()
        ),
      })
    );
  }

  // winston complains about writes with no transport
  if (logger.transports.length === 0) {
    logger.add(new winston.transports.Console({ silent: true }));
  }

  isInitialized = true;
  logger.debug('Logger initialized with configuration');
}
