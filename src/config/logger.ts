import winston from 'winston';

const { combine, timestamp, printf, colorize, errors, json } = winston.format;

const isProduction = process.env['NODE_ENV'] === 'production';

// Single line: time, level, message, then metadata and stack
const lineFormat = printf(({ level, message, timestamp, stack, ...metadata }) => {
  const meta = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
  return `${timestamp} [${level}]: ${message}${meta}${stack ? `\n${stack}` : ''}`;
});

/**
 * Application logger. Human-readable and colorized in development,
 * one JSON object per line on stdout in production. Silent under test.
 */
export const logger = winston.createLogger({
  level: process.env['LOG_LEVEL'] ?? 'info',
  defaultMeta: { service: 'restaurant-order-service' },
  silent: process.env['NODE_ENV'] === 'test',
  format: isProduction
    ? combine(errors({ stack: true }), timestamp(), json())
    : combine(colorize({ all: true }), errors({ stack: true }), timestamp({ format: 'HH:mm:ss' }), lineFormat),
  transports: [new winston.transports.Console()],
});
