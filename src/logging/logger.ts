/**
 * Logging collaborator
 *
 * Services receive a Logger instead of calling console directly, so tests
 * can silence or capture output. Never pass PINs, passwords, tokens or key
 * bytes in a message or context.
 */

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger whose messages carry a `[component]` prefix */
  child(component: string): Logger;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface ConsoleLoggerOptions {
  /** Minimum level written (default: info) */
  level?: LogLevel;
  /** Prefix for every line, e.g. "CleanupService" */
  component?: string;
}

export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private component?: string;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.component = options.component;
  }

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write("error", message, context);
  }

  child(component: string): Logger {
    return new ConsoleLogger({ level: this.level, component });
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const line = this.component ? `[${this.component}] ${message}` : message;
    const args: unknown[] = context ? [line, context] : [line];

    switch (level) {
      case "debug":
        console.debug(...args);
        break;
      case "info":
        console.log(...args);
        break;
      case "warn":
        console.warn(...args);
        break;
      case "error":
        console.error(...args);
        break;
    }
  }
}

class SilentLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}

export const silentLogger: Logger = new SilentLogger();

export function createLogger(options?: ConsoleLoggerOptions): Logger {
  return new ConsoleLogger(options);
}
