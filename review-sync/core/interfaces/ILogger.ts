export type LogContext = Record<string, unknown>;

/**
 * Logger handed to every component; nothing in core reaches for a global one.
 */
export interface ILogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(bindings: LogContext): ILogger;
}
