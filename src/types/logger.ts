/** Structured context attached to a log line. */
export type LogContext = Record<string, unknown>;

/**
 * Minimal logger contract. `console` satisfies it, as do pino- or winston-style
 * loggers wrapped to take `(message, context)`.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
}

/** Logger that drops everything; the default when none is configured. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
};
