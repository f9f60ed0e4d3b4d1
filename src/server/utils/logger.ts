import pino from 'pino';
import type { Logger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';
import { getEnv } from '../config/env.js';

export type LogContext = Record<string, unknown>;

const runContext = new AsyncLocalStorage<LogContext>();

/**
 * Fields bound to the current ingestion run or request, if any
 */
export function getRunContext(): LogContext {
  return runContext.getStore() ?? {};
}

/**
 * Run `fn` with extra log fields; nested scopes inherit the outer fields.
 * Every logger, including module-level ones, picks them up through the mixin.
 */
export function withRunContext<T>(context: LogContext, fn: () => T): T {
  return runContext.run({ ...getRunContext(), ...context }, fn);
}

function createLogger(): Logger {
  const { NODE_ENV, LOG_LEVEL } = getEnv();
  const isDevelopment = NODE_ENV === 'development';
  const defaultLevel = NODE_ENV === 'test' ? 'silent' : isDevelopment ? 'debug' : 'info';

  return pino({
    level: LOG_LEVEL || defaultLevel,
    base: { env: NODE_ENV, service: 'visa-context-pipeline' },
    mixin: () => getRunContext(),
    redact: { paths: ['apiKey', '*.apiKey', 'headers.authorization'], censor: '[redacted]' },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
      },
    }),
  });
}

export const logger = createLogger();

/**
 * Logger for one component; the fields are fixed, run context is added per line
 */
export function createChildLogger(bindings: LogContext): Logger {
  return logger.child(bindings);
}

export type { Logger };
