// src/utils/logger.ts
import pino from 'pino';

// Detect environment
const isDevelopment = process.env.NODE_ENV === 'development';
const isTest = process.env.NODE_ENV === 'test' ||
               process.env.JEST_WORKER_ID !== undefined;

export type LoggerLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const LOG_LEVELS: readonly LoggerLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export const isLoggerLevel = (value: string): value is LoggerLevel =>
  LOG_LEVELS.some(level => level === value);

// Default log levels per environment
const getDefaultLogLevel = (): LoggerLevel => {
  const fromEnv = process.env.LOG_LEVEL;
  if (fromEnv && isLoggerLevel(fromEnv)) return fromEnv;
  if (isTest) return 'warn'; // Default to warn in tests
  return 'info';
};

// Configure transport based on environment
const transportConfig = isDevelopment ? pino.transport({
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname,service,component',
    messageFormat: '{msg}',
    errorLikeObjectKeys: ['err', 'error'],
  }
}) : undefined;

/** Shape the `uow` serializer reads; Batch and Transaction both satisfy it. */
export interface SerializableUnitOfWork {
  readonly kind: string;
  readonly id?: string | null;
  readonly status: string;
  readonly mutations: readonly unknown[];
}

const serializers = {
  uow: (uow: SerializableUnitOfWork | undefined) => {
    if (!uow) return uow;
    return {
      kind: uow.kind,
      id: uow.id ?? null,
      status: uow.status,
      mutationCount: uow.mutations.length
    };
  },
  err: pino.stdSerializers.err,
  error: pino.stdSerializers.err,
};

const loggerOptions: pino.LoggerOptions = {
  level: getDefaultLogLevel(),
  base: {
    pid: process.pid,
    service: 'datastore-uow',
    environment: process.env.NODE_ENV || 'development'
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers,
  formatters: {
    level: (label) => ({ level: label.toUpperCase() })
  }
};

const baseLogger = transportConfig
  ? pino(loggerOptions, transportConfig)
  : pino(loggerOptions);

// Child loggers for different components
export const logger = baseLogger.child({ component: 'app' });
export const clientLogger = baseLogger.child({ component: 'client' });
export const batchLogger = baseLogger.child({ component: 'batch' });
export const transactionLogger = baseLogger.child({ component: 'transaction' });
export const operationLogger = baseLogger.child({ component: 'operation' });

export const createTransactionLogger = (transactionId: string): pino.Logger => {
  return transactionLogger.child({ transactionId });
};

export const createContextLogger = (context: Record<string, unknown>): pino.Logger => {
  return baseLogger.child(context);
};

// Children created before a level change keep their old level, so the
// component loggers are updated along with the base.
const componentLoggers = [logger, clientLogger, batchLogger, transactionLogger, operationLogger];

export const setLogLevel = (level: LoggerLevel): void => {
  baseLogger.level = level;
  for (const child of componentLoggers) {
    child.level = level;
  }
};

export const enableTestLogging = (level: LoggerLevel = 'info'): void => {
  setLogLevel(level);
};

export const disableTestLogging = (): void => {
  setLogLevel('silent');
};

export const isLevelEnabled = (level: LoggerLevel): boolean => {
  return baseLogger.isLevelEnabled(level);
};

interface TimerResult {
  end: (context?: Record<string, unknown>) => number;
}

export const createTimer = (operation: string, log: pino.Logger = logger): TimerResult => {
  const start = process.hrtime.bigint();

  return {
    end: (context: Record<string, unknown> = {}): number => {
      const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;

      log.debug({
        ...context,
        operation,
        durationMs,
        action: 'performance'
      }, `${operation} took ${durationMs.toFixed(2)}ms`);

      return durationMs;
    }
  };
};

export default logger;
