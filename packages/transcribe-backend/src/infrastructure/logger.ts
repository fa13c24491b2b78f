// packages/transcribe-backend/src/infrastructure/logger.ts

// Pino-based JSON logger with a minimal typed wrapper.
// - Container-friendly (stdout JSON), pretty printing in development only.
// - Silent under the test runner unless LOG_LEVEL says otherwise.
// - Child loggers carry component, job and worker bindings.

import pino from 'pino';

export interface LogFields {
  jobId?: string;
  workerId?: string;
  component?: string;
  event?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string | Error, fields?: LogFields): void;
  debug(msg: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

function resolveLogLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

// logger.declaration()
export const logger: Logger = createRootLogger();

function createRootLogger(): Logger {
  const base = pino({
    level: resolveLogLevel(),
    base: { service: 'transcribe-backend' },
    timestamp: pino.stdTimeFunctions.isoTime,
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname,service',
            },
          }
        : undefined,
  });

  return wrapPino(base);
}

export function wrapPino(instance: pino.Logger): Logger {
  return {
    info(msg, fields) {
      instance.info(fields ?? {}, msg);
    },
    warn(msg, fields) {
      instance.warn(fields ?? {}, msg);
    },
    error(msg, fields) {
      if (msg instanceof Error) {
        instance.error({ ...(fields ?? {}), err: serializeError(msg) }, msg.message);
      } else {
        instance.error(fields ?? {}, msg);
      }
    },
    debug(msg, fields) {
      instance.debug(fields ?? {}, msg);
    },
    child(bindings) {
      return wrapPino(instance.child(bindings));
    },
  };
}

function serializeError(error: Error): Record<string, unknown> {
  const serialized: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if (error.cause instanceof Error) {
    serialized.cause = { name: error.cause.name, message: error.cause.message };
  }
  return serialized;
}

export function createComponentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}

export function createJobLogger(jobId: string, workerId?: string, parent: Logger = logger): Logger {
  return parent.child(workerId ? { jobId, workerId } : { jobId });
}
