import pino from 'pino';

/**
 * Environment-based log level
 */
const getLogLevel = (): pino.Level => {
  const level = process.env['LOG_LEVEL']?.toLowerCase();
  const validLevels: pino.Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

  const match = validLevels.find((valid) => valid === level);
  if (match) {
    return match;
  }

  return process.env['NODE_ENV'] === 'production' ? 'info' : 'debug';
};

/**
 * Pino logger configuration
 */
const loggerConfig: pino.LoggerOptions = {
  level: getLogLevel(),
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(process.env['NODE_ENV'] !== 'production' && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
};

/**
 * Main application logger
 */
export const logger = pino(loggerConfig);

/**
 * Create child logger with additional context
 */
export const createChildLogger = (context: Record<string, unknown>) => {
  return logger.child(context);
};

/**
 * Registry logger
 */
export const registryLogger = createChildLogger({ service: 'registry' });

/**
 * Snapshot loader logger
 */
export const snapshotLogger = createChildLogger({ service: 'snapshot' });

/**
 * Event reconciler logger
 */
export const reconcilerLogger = createChildLogger({ service: 'reconciler' });

/**
 * Debounce notifier logger
 */
export const notifierLogger = createChildLogger({ service: 'notifier' });

/**
 * Attach/detach coordinator logger
 */
export const coordinatorLogger = createChildLogger({ service: 'coordinator' });

/**
 * Admin API logger
 */
export const adminLogger = createChildLogger({ service: 'admin' });

/**
 * Events dispatcher logger
 */
export const dispatcherLogger = createChildLogger({ service: 'dispatcher' });
