import pino from 'pino';
import type { Logger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * AsyncLocalStorage for request context (request ID, session ID)
 */
export const requestContext = new AsyncLocalStorage<Record<string, unknown>>();

export function getRequestContext(): Record<string, unknown> {
  return requestContext.getStore() || {};
}

/**
 * Create logger instance based on environment.
 * Pretty printing runs in a worker thread, so it is only enabled for local development.
 */
function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isDevelopment = nodeEnv === 'development';
  const isTest = nodeEnv === 'test';
  const logLevel = process.env.LOG_LEVEL || (isTest ? 'silent' : isDevelopment ? 'debug' : 'info');

  return pino({
    level: logLevel,
    base: {
      env: nodeEnv,
      service: 'statute-rag-api',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    // Every line logged while handling a request carries its id
    mixin: () => getRequestContext(),
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  return logger.child(additionalContext);
}
