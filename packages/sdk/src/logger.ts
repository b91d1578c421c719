import winston, { format } from 'winston';

const { combine, timestamp, printf, colorize } = format;

export const logger = winston.createLogger({
  level: 'info', // Default level
  format: combine(
    colorize(),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    printf(info => `${info.timestamp} ${info.level}: ${info.message}`)
  ),
  transports: [
    new winston.transports.Console(), // Default transport
  ],
});

/**
 * The subset of the winston logger the API clients and managers rely on.
 */
export interface Logger {
  debug(message: string): unknown;
  info(message: string): unknown;
  warn(message: string): unknown;
  error(message: string): unknown;
}

// No-op logger for when logging is disabled
export const noOpLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Sets the transports for the global logger.
 * This will remove all existing transports and add the new ones.
 * @param transports Array of Winston transports.
 */
export function setLoggerTransports(transports: winston.transport[]): void {
  logger.clear();
  transports.forEach(transport => {
    logger.add(transport);
  });
}

/**
 * Sets the level for the global logger.
 * @param level The logging level (e.g., 'info', 'debug', 'warn', 'error').
 */
export function setLoggerLevel(level: string): void {
  logger.level = level;
}
