/**
 * Logging sink interface
 *
 * Operations receive a logger instead of writing to a process-wide one, so
 * callers decide where messages go and tests can assert on them directly.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ILogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}
