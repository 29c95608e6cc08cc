/** Structured context attached to a log line. Never put token values or passwords here. */
export type LogContext = Record<string, unknown>;

/**
 * Logging hook accepted by the client. Shaped so `console`, pino and most structured
 * loggers can be passed directly or through a thin adapter.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const noop = () => {};

/** Default logger: drops everything. */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
