import winston from 'winston';

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, stack }) => {
    if (stack) {
      return `${timestamp} [${level.toUpperCase()}]: ${message}\n${stack}`;
    }
    return `${timestamp} [${level.toUpperCase()}]: ${message}`;
  })
);

export type Logger = winston.Logger;

export const logger: Logger = winston.createLogger({
  level: process.env.VODCAT_LOG_LEVEL ?? (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
  format: logFormat,
  silent: process.env.NODE_ENV === 'test',
  transports: [
    new winston.transports.Console({
      // Keep stdout free for CLI output
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    }),
  ],
});

export function setLogLevel(level: string): void {
  logger.level = level;
}
