import winston from 'winston';

/**
 * Winston logger configuration for structured logging
 * Proxy credentials are stripped before anything reaches a transport
 */
const redactProxyCredentials = winston.format((info) => {
  for (const [key, value] of Object.entries(info)) {
    if (typeof value === 'string' && /^socks[45]h?a?:\/\/[^/]*@/i.test(value)) {
      info[key] = value.replace(/\/\/[^@/]*@/, '//***@');
    }
  }
  return info;
});

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        let msg = `${timestamp} [${level}]: ${message}`;
        if (Object.keys(meta).length > 0) {
          msg += ` ${JSON.stringify(meta)}`;
        }
        return msg;
      }),
    ),
  }),
];

// File transport is opt-in and never used under test
if (process.env.NODE_ENV !== 'test' && process.env.BROWSER_FETCHER_LOG_FILE) {
  transports.push(
    new winston.transports.File({ filename: process.env.BROWSER_FETCHER_LOG_FILE }),
  );
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  // Quiet under test unless a level is asked for
  silent: process.env.NODE_ENV === 'test' && !process.env.LOG_LEVEL,
  format: winston.format.combine(
    redactProxyCredentials(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: 'browser-fetcher' },
  transports,
});

/**
 * Log a completed operation with its details
 */
export function logOperation(
  operation: string,
  details?: Record<string, unknown>,
): void {
  logger.info(operation, details);
}

/**
 * Log an error with stack trace
 */
export function logError(
  error: Error,
  context?: Record<string, unknown>,
): void {
  logger.error({
    message: error.message,
    stack: error.stack,
    ...context,
  });
}
