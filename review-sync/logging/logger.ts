import pino from 'pino';
import type { ILogger, LogContext } from '../core/interfaces';

export interface LoggerOptions {
  level?: string;
  name?: string;
}

/**
 * pino-backed ILogger. Context goes in as structured fields, the message last.
 */
export function createLogger(options: LoggerOptions = {}): ILogger {
  const base = pino({
    name: options.name ?? 'review-sync',
    level: options.level ?? 'info',
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
    },
  });
  return wrap(base);
}

/** Logger that drops everything (tests) */
export function createSilentLogger(): ILogger {
  return wrap(pino({ level: 'silent' }));
}

function wrap(base: pino.Logger): ILogger {
  return {
    debug: (message: string, context?: LogContext) => base.debug(context ?? {}, message),
    info: (message: string, context?: LogContext) => base.info(context ?? {}, message),
    warn: (message: string, context?: LogContext) => base.warn(context ?? {}, message),
    error: (message: string, context?: LogContext) => base.error(context ?? {}, message),
    child: (bindings: LogContext) => wrap(base.child(bindings)),
  };
}
