import winston from 'winston';
import { config } from '../config/env';

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = 'floe-rules';
  }

  // Handle Error objects specially
  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }

  return info;
});

/**
 * Format for structured JSON logging (used for file transports and when
 * LOG_FORMAT=json).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output.
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
  })
);

const logger = winston.createLogger({
  level: config.logging.level,
  silent: config.logging.silent,
  defaultMeta: {
    service: 'floe-rules',
    environment: config.nodeEnv,
  },
  transports: [
    new winston.transports.Console({
      format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
    }),
  ],
});

if (config.logging.file) {
  logger.add(
    new winston.transports.File({
      filename: config.logging.file,
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

export { logger };
