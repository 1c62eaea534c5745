import winston from 'winston';
import path from 'path';

import { config, type AppConfig } from '../config';

export type LogMeta = Record<string, unknown>;

const SERVICE_NAME = 'quorum-engine';

// ============================================================================
// Formats
// ============================================================================

/**
 * Keep standard fields present and flatten Error objects so they survive
 * JSON serialisation.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = SERVICE_NAME;
  }

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
 * Format for structured JSON logging (file transport, and console when
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
  winston.format.printf(
    ({ timestamp, level, message, service: _service, environment: _env, ...meta }) => {
      const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${timestamp} ${level}: ${message}${metaStr}`;
    }
  )
);

// ============================================================================
// Logger factory
// ============================================================================

/**
 * Create a Winston logger for the given settings. The console transport is
 * silenced under test; a JSON file transport is added when a log file is
 * configured.
 */
export function createLogger(
  settings: Pick<AppConfig, 'logging' | 'nodeEnv' | 'isTest'>
): winston.Logger {
  const instance = winston.createLogger({
    level: settings.logging.level,
    defaultMeta: {
      service: SERVICE_NAME,
      environment: settings.nodeEnv,
    },
    transports: [
      new winston.transports.Console({
        format: settings.logging.format === 'json' ? jsonFormat : consoleFormat,
        silent: settings.isTest,
      }),
    ],
  });

  if (settings.logging.file) {
    instance.add(
      new winston.transports.File({
        filename: path.resolve(settings.logging.file),
        format: jsonFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    );
  }

  return instance;
}

const logger = createLogger(config);

export { logger };
