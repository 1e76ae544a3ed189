/**
 * Structured Logging Module
 *
 * JSON logs with:
 * - Configurable log levels (debug, info, warn, error)
 * - Module tagging
 * - Request correlation IDs propagated through async call chains
 *
 * Usage:
 *   import { logger, createLogger } from './logging';
 *   logger.info('Server started', { port: 8420 });
 *   const layoutLogger = createLogger('layout');
 *   layoutLogger.debug('Layout computed', { nodes: 12, durationMs: '0.41' });
 */

import { AsyncLocalStorage } from 'node:async_hooks';

// ==================== Configuration ====================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

const envLevel = process.env.LOG_LEVEL;

export const LOG_CONFIG: {
  level: LogLevel;
  pretty: boolean;
  includeStack: boolean;
  service: string;
} = {
  /** Minimum log level to output */
  level: isLogLevel(envLevel) ? envLevel : 'info',

  /** Whether to pretty-print JSON (dev mode) */
  pretty: process.env.LOG_PRETTY === 'true',

  /** Include stack traces for errors */
  includeStack: process.env.LOG_INCLUDE_STACK !== 'false',

  /** Service name for log identification */
  service: process.env.LOG_SERVICE || 'figureforge',
};

/**
 * Change the minimum level at runtime
 */
export function setLogLevel(level: LogLevel): void {
  LOG_CONFIG.level = level;
}

// ==================== Types ====================

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  module?: string;
  correlationId?: string;
  [key: string]: unknown;
}

export interface LogMetadata {
  [key: string]: unknown;
}

export interface LoggerContext {
  module?: string;
  correlationId?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, meta?: LogMetadata): void;
  info(message: string, meta?: LogMetadata): void;
  warn(message: string, meta?: LogMetadata): void;
  error(message: string, meta?: LogMetadata | Error): void;
  child(context: LoggerContext): Logger;
}

// ==================== Correlation IDs ====================

const correlationStorage = new AsyncLocalStorage<string>();

/**
 * Run a function with a correlation ID bound to the context
 */
export function withCorrelationId<T>(id: string, fn: () => T): T {
  return correlationStorage.run(id, fn);
}

/**
 * Get the current correlation ID
 */
export function getCorrelationId(): string | undefined {
  return correlationStorage.getStore();
}

// ==================== Logger Implementation ====================

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[LOG_CONFIG.level];
}

function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      ...(LOG_CONFIG.includeStack && error.stack ? { stack: error.stack } : {}),
    };
  }
  return { errorValue: String(error) };
}

function writeLog(entry: LogEntry): void {
  const output = LOG_CONFIG.pretty
    ? JSON.stringify(entry, null, 2)
    : JSON.stringify(entry);

  if (entry.level === 'error') {
    console.error(output);
  } else if (entry.level === 'warn') {
    console.warn(output);
  } else {
    console.log(output);
  }
}

function createLoggerImpl(baseContext: LoggerContext = {}): Logger {
  const log = (level: LogLevel, message: string, meta?: LogMetadata | Error): void => {
    if (!shouldLog(level)) return;

    let metadata: LogMetadata = {};
    if (meta instanceof Error) {
      metadata = formatError(meta);
    } else if (meta) {
      const { error, ...rest } = meta;
      metadata = error === undefined ? rest : { ...rest, ...formatError(error) };
    }

    const { module, correlationId: boundId, ...extra } = baseContext;
    const correlationId = boundId ?? getCorrelationId();

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: LOG_CONFIG.service,
      ...(module ? { module } : {}),
      ...(correlationId ? { correlationId } : {}),
      ...extra,
      ...metadata,
    };

    writeLog(entry);
  };

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (context) => createLoggerImpl({ ...baseContext, ...context }),
  };
}

// ==================== Exports ====================

/**
 * Root logger instance
 */
export const logger = createLoggerImpl();

/**
 * Create a module-scoped logger
 * @param module - Module name (e.g., 'layout', 'parser', 'web')
 */
export function createLogger(module: string): Logger {
  return logger.child({ module });
}
