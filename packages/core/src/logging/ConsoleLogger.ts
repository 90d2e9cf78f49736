import { StructuredError } from '../exceptions/StructuredError';
import type { LogContext, Logger } from '../interfaces/Logger';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ConsoleLoggerOptions {
  enableLogs?: boolean;
  prefix?: string;
  /** Receives each formatted line. Defaults to `console.error`, keeping stdout free for reports. */
  write?: (line: string) => void;
}

/**
 * One line per call: `[extent] warn Error recorded error=InvalidName("Missing name")`.
 * Structured errors print as their kind, followed by the cause chain.
 */
export function formatLogLine(prefix: string, level: LogLevel, message: string, context?: LogContext): string {
  const fields = Object.entries(context ?? {})
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`);
  return [prefix, level, message, ...fields].join(' ');
}

function formatValue(value: unknown): string {
  if (value instanceof Error) {
    const label = value instanceof StructuredError ? value.kind : value.name;
    const cause = value.cause instanceof Error ? ` <- ${formatValue(value.cause)}` : '';
    return `${label}(${JSON.stringify(value.message)})${cause}`;
  }
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

/**
 * Console-backed {@link Logger}. Every method is a no-op when logs are disabled,
 * so a descriptor can carry a logger unconditionally.
 */
export class ConsoleLogger implements Logger {
  private readonly enableLogs: boolean;
  private readonly prefix: string;
  private readonly write: (line: string) => void;

  constructor({ enableLogs = true, prefix = '[extent]', write = (line) => console.error(line) }: ConsoleLoggerOptions = {}) {
    this.enableLogs = enableLogs;
    this.prefix = prefix;
    this.write = write;
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error): void {
    this.log('error', message, error && { error });
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.enableLogs) return;
    this.write(formatLogLine(this.prefix, level, message, context));
  }
}

/** Logger that drops everything; handy default for library callers. */
export const silentLogger: Logger = new ConsoleLogger({ enableLogs: false });
