export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

export interface ConsoleLoggerOptions {
  minLevel?: LogLevel;
  /** Prepended as `[prefix]` to every line */
  prefix?: string;
}

export function createConsoleLogger(options?: ConsoleLoggerOptions): Logger {
  const minLevel = options?.minLevel ?? LogLevel.INFO;
  const tag = options?.prefix ? `[${options.prefix}] ` : '';

  function format(message: string, context?: Record<string, unknown>): string {
    if (!context || Object.keys(context).length === 0) return tag + message;
    return `${tag}${message} ${JSON.stringify(context)}`;
  }

  return {
    debug(message, context) {
      if (minLevel <= LogLevel.DEBUG) console.debug(format(message, context));
    },
    info(message, context) {
      if (minLevel <= LogLevel.INFO) console.info(format(message, context));
    },
    warn(message, context) {
      if (minLevel <= LogLevel.WARN) console.warn(format(message, context));
    },
    error(message, error, context) {
      if (minLevel > LogLevel.ERROR) return;
      if (error) console.error(format(message, context), error);
      else console.error(format(message, context));
    },
  };
}

export const silentLogger: Logger = createConsoleLogger({ minLevel: LogLevel.SILENT });
