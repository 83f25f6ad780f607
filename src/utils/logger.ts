// Logger Module
// Provides structured logging with levels and metadata

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerConfig {
  level?: LogLevel;
  enableConsole?: boolean;
}

export interface LogContext {
  module: string;
  action?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevelName;
  module: string;
  action?: string;
  message: string;
  error?: string;
  [key: string]: unknown;
}

const LEVEL_NAMES: Record<LogLevel, LogLevelName> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error'
};

export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  switch (name?.trim().toLowerCase()) {
    case 'debug': return LogLevel.DEBUG;
    case 'info': return LogLevel.INFO;
    case 'warn': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    default: return undefined;
  }
}

// bigint values cannot go through JSON.stringify as-is
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export class Logger {
  constructor(private readonly module: string, private readonly config?: LoggerConfig) {}

  private effectiveConfig(): LoggerConfig {
    return this.config ?? globalConfig;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level >= (this.effectiveConfig().level ?? LogLevel.INFO);
  }

  private log(level: LogLevel, contextOrMessage: LogContext | string, messageOrError?: string | Error): void {
    if (!this.isLevelEnabled(level)) return;

    let message: string;
    let context: LogContext;
    let error: Error | undefined;

    if (typeof contextOrMessage === 'string') {
      message = contextOrMessage;
      if (messageOrError instanceof Error) {
        error = messageOrError;
      } else if (messageOrError) {
        message = messageOrError;
      }
      context = { module: this.module };
    } else {
      context = { ...contextOrMessage };
      message = typeof messageOrError === 'string' ? messageOrError : '';
      if (messageOrError instanceof Error) {
        error = messageOrError;
      } else if (context.error instanceof Error) {
        error = context.error;
      }
      delete context.error;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      ...context,
      message,
      ...(error && { error: error.stack || error.message })
    };

    if (this.effectiveConfig().enableConsole !== false) {
      // stderr keeps log lines apart from program output
      console.error(JSON.stringify(entry, jsonReplacer));
    }
  }

  debug(contextOrMessage: LogContext | string, messageOrError?: string | Error): void {
    this.log(LogLevel.DEBUG, contextOrMessage, messageOrError);
  }

  info(contextOrMessage: LogContext | string, messageOrError?: string | Error): void {
    this.log(LogLevel.INFO, contextOrMessage, messageOrError);
  }

  warn(contextOrMessage: LogContext | string, messageOrError?: string | Error): void {
    this.log(LogLevel.WARN, contextOrMessage, messageOrError);
  }

  error(contextOrMessage: LogContext | string, messageOrError?: string | Error): void {
    this.log(LogLevel.ERROR, contextOrMessage, messageOrError);
  }
}

// Global configuration
let globalConfig: LoggerConfig = {
  level: parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO,
  enableConsole: true
};

/**
 * Merge settings into the configuration shared by every logger created
 * without its own config.
 */
export function configureLogger(config: LoggerConfig): void {
  globalConfig = { ...globalConfig, ...config };
}

export function getLoggerConfig(): LoggerConfig {
  return { ...globalConfig };
}

// Factory function to create module-specific loggers
export function getLogger(module: string, config?: LoggerConfig): Logger {
  return new Logger(module, config);
}
