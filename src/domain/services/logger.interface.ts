/**
 * Injection token for the logger service.
 * Components receive a logger through this token instead of a process-wide instance.
 */
export const LOGGER_SERVICE = Symbol('LOGGER_SERVICE');

/**
 * Additional context for structured logs.
 */
export interface LogContext {
  [key: string]: unknown;
}

/**
 * Logging contract used by every layer.
 * Substituted with jest mocks in tests.
 */
export interface ILogger {
  log(message: string, context?: LogContext): void;

  warn(message: string, context?: LogContext): void;

  /**
   * Logs an error. Pass the caught error's `stack` in the context when there is one.
   */
  error(message: string, context?: LogContext): void;

  debug(message: string, context?: LogContext): void;
}
