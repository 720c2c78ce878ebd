import winston from 'winston';
import path from 'path';
import { config, AppConfig } from '../config';

export type LogMeta = Record<string, unknown>;

const SERVICE_NAME = 'first-to-five';

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
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
 * Format for structured JSON logging (used for LOG_FORMAT=json and the
 * file transport).
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
  structuredFormat(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service: _service, environment: _env, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
  })
);

/**
 * Build a logger for the given logging config. The console transport sends
 * every level to stderr: stdout belongs to the rendered board.
 */
export function createLogger(logging: AppConfig['logging'], nodeEnv: AppConfig['nodeEnv']): winston.Logger {
  const instance = winston.createLogger({
    level: logging.level,
    silent: logging.silent,
    defaultMeta: {
      service: SERVICE_NAME,
      environment: nodeEnv,
    },
    transports: [
      new winston.transports.Console({
        format: logging.format === 'json' ? jsonFormat : consoleFormat,
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      }),
    ],
  });

  if (logging.file) {
    instance.add(
      new winston.transports.File({
        filename: path.resolve(logging.file),
        format: jsonFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    );
  }

  return instance;
}

const logger = createLogger(config.logging, config.nodeEnv);

export { logger };
