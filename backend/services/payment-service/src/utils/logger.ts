import pino, { Logger } from 'pino';

const pinoLogger: Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: process.env.NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true
    }
  } : undefined,
  base: {
    service: process.env.SERVICE_NAME || 'payment-service',
    environment: process.env.NODE_ENV || 'development'
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => {
      return { level: label };
    }
  }
});

/**
 * Child logger carrying the given context on every entry.
 * Useful for background work such as compensations.
 */
export function createContextLogger(context: Record<string, unknown>): Logger {
  return pinoLogger.child(context);
}

export type { Logger };

export const logger = pinoLogger;
