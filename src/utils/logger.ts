import winston from 'winston';
import config from '../config/index.js';

const lineFormat = winston.format.printf(({ timestamp, level, message, stack }) => {
  const line = `${timestamp} [${level}] ${message}`;
  return typeof stack === 'string' ? `${line}\n${stack}` : line;
});

/**
 * Shared logger. `logger.error('Something failed:', error)` appends the
 * error's message to the line and prints its stack below it.
 */
export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === 'test',
  format: winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.timestamp(),
    lineFormat
  ),
  transports: [new winston.transports.Console()],
});

export default logger;
