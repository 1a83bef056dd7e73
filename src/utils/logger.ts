import winston from 'winston';
import {
  isSensitiveKey,
  maskSensitiveData,
  maskValue,
  redactConnectionString,
} from './sanitizer.js';

export type Logger = winston.Logger;

export type LogFormat = 'json' | 'pretty';

export interface LoggerOptions {
  level?: string;
  format?: LogFormat;
}

const RESERVED_FIELDS = new Set(['level', 'message', 'timestamp', 'stack']);

// Credentials passed as log metadata never reach a transport in clear text
const redactSecrets = winston.format((info) => {
  if (typeof info.message === 'string') {
    info.message = redactConnectionString(info.message);
  }
  for (const key of Object.keys(info)) {
    if (RESERVED_FIELDS.has(key)) continue;
    info[key] = isSensitiveKey(key)
      ? maskValue(info[key])
      : maskSensitiveData(info[key]);
  }
  return info;
});

const prettyFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf((info) => {
    const { level, message, timestamp, service: _service, stack, ...meta } =
      info;
    const details = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    const trace = typeof stack === 'string' ? `\n${stack}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${details}${trace}`;
  })
);

export function createLogger(options: LoggerOptions = {}): Logger {
  const format = options.format ?? 'json';

  return winston.createLogger({
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    format: winston.format.combine(
      winston.format.errors({ stack: true }),
      redactSecrets(),
      winston.format.timestamp(),
      format === 'pretty' ? prettyFormat : winston.format.json()
    ),
    defaultMeta: { service: 'tenant-orchestrator' },
    transports: [new winston.transports.Console()],
  });
}

const logger = createLogger({
  format: process.env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json',
});

/**
 * Apply runtime configuration to the shared logger.
 */
export function configureLogger(options: LoggerOptions): void {
  if (options.level) {
    logger.level = options.level;
  }
  if (options.format === 'pretty') {
    logger.format = winston.format.combine(
      winston.format.errors({ stack: true }),
      redactSecrets(),
      winston.format.timestamp(),
      prettyFormat
    );
  }
}

export default logger;
