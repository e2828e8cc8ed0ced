/**
 * Structured stderr logger
 *
 * Writes one JSON object per line through console.error. Stdout is left to
 * the MCP stdio transport.
 */

import { ILogger, LogLevel } from "../interfaces/ILogger";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export class StderrLogger implements ILogger {
  private readonly minimumLevel: LogLevel;
  private readonly component: string | undefined;

  constructor(minimumLevel: LogLevel = "info", component?: string) {
    this.minimumLevel = minimumLevel;
    this.component = component;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write("error", message, context);
  }

  /**
   * Logger for a named component sharing this logger's level
   */
  child(component: string): StderrLogger {
    return new StderrLogger(this.minimumLevel, component);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minimumLevel];
  }

  private write(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    console.error(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level: level.toUpperCase(),
        component: this.component,
        message,
        context,
      })
    );
  }
}

/**
 * Logger that discards everything
 */
export const silentLogger: ILogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
