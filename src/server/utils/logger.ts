// src/server/utils/logger.ts
import pino from 'pino';
import type { Logger } from 'pino';

// Determine environment
const isDevelopment = process.env.NODE_ENV !== 'production';
const LOG_LEVEL = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

/** Shape of the request objects pino-http hands to the `req` serializer. */
interface LoggedRequest {
  id?: unknown;
  method?: string;
  url?: string;
  remoteAddress?: string;
  remotePort?: number;
}

interface LoggedResponse {
  statusCode?: number;
}

// Base logger configuration
const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,

  ...(isDevelopment ? {} : {
    timestamp: pino.stdTimeFunctions.isoTime,
  }),

  // Base context that will be included in all logs
  base: {
    pid: process.pid,
    hostname: process.env.HOSTNAME || 'localhost',
    service: 'quick-paste',
  },

  // Paste bodies never reach the logs; auth headers neither.
  redact: {
    paths: ['req.headers.authorization', 'req.headers.cookie', '*.content'],
    remove: true,
  },

  serializers: {
    req: (req: LoggedRequest) => ({
      id: req.id,
      method: req.method,
      url: req.url,
      remoteAddress: req.remoteAddress,
      remotePort: req.remotePort,
    }),
    res: (res: LoggedResponse) => ({
      statusCode: res.statusCode,
    }),
    err: pino.stdSerializers.err,
  },
};

// Create the base logger
export const logger = pino(baseConfig);

// Create child loggers for different components
export const createLogger = (component: string, context?: Record<string, unknown>): Logger => {
  return logger.child({ component, ...context });
};

export const httpLogger = createLogger('http');
export const storeLogger = createLogger('store');
export const serviceLogger = createLogger('paste-service');
export const startupLogger = createLogger('startup');

// Helper to log performance metrics
export const logPerformance = (
  logger: Logger,
  operation: string,
  startTime: number,
  metadata?: Record<string, unknown>
) => {
  const duration = Date.now() - startTime;
  logger.info({
    operation,
    duration,
    ...metadata,
  }, `${operation} completed in ${duration}ms`);
};

// Helper for structured error logging
export const logError = (
  logger: Logger,
  error: Error | unknown,
  context?: Record<string, unknown>
) => {
  if (error instanceof Error) {
    logger.error({
      err: error,
      ...context,
    }, error.message);
  } else {
    logger.error({
      error: String(error),
      ...context,
    }, 'Unknown error occurred');
  }
};

// Export types
export type { Logger };
