/** Structured fields attached to a log line */
export type LogContext = Record<string, unknown>;

/**
 * Shared logger interface for consistent logging across the resolver packages
 */
export interface Logger {
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error): void;
  debug(message: string, context?: LogContext): void;
}
