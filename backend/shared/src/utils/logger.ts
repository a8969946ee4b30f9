import pino from 'pino';

export type Logger = pino.Logger;

/**
 * Root logger for one service. Pretty output in development, JSON elsewhere.
 */
export function createServiceLogger(service: string): Logger {
  return pino({
    level: process.env.LOG_LEVEL || 'info',
    transport: process.env.NODE_ENV === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true
      }
    } : undefined,
    base: {
      service,
      environment: process.env.NODE_ENV || 'development'
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => {
        return { level: label };
      }
    }
  });
}

/**
 * Child logger for one accepted connection
 */
export function createConnectionLogger(
  logger: Logger,
  context: { connectionId: string; remoteAddress?: string; remotePort?: number }
): Logger {
  return logger.child(context);
}
