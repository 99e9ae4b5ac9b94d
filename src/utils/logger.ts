import winston from 'winston';

const lineFormat = winston.format.printf((info) => {
  const { timestamp, level, message, ...meta } = info;
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} [${level.toUpperCase()}] ${String(message)}${extra}`;
});

/**
 * Application logger. Writes to stderr so stdout stays free for the run summary.
 * Starts at "info"; the CLI applies the validated LOG_LEVEL through setLogLevel.
 */
export const logger = winston.createLogger({
  level: 'info',
  silent: process.env['NODE_ENV'] === 'test',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    lineFormat
  ),
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly']
    })
  ]
});

/**
 * Change the active log level (e.g. "debug" for --verbose)
 */
export function setLogLevel(level: string): void {
  logger.level = level;
}
