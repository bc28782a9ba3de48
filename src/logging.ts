/**
 * Logging for the client. Nothing is logged unless a logger is configured.
 */

/**
 * Log levels.
 */
export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  /** Creates a child logger with additional context. */
  child(context: Record<string, unknown>): Logger;
}

/**
 * Log configuration.
 */
export interface LogConfig {
  /** Minimum log level. */
  level: LogLevel;
  /** Emit one JSON object per line instead of text. */
  json: boolean;
  /** Prefix each text line with an ISO timestamp. */
  timestamps: boolean;
}

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: LogLevel.Info,
  json: false,
  timestamps: true,
};

/**
 * Parses a level name such as `"debug"` or `"WARN"`.
 * Returns undefined for anything else.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return Object.values(LogLevel).find((level) => level === normalized);
}

/**
 * Logger writing to the console.
 */
export class ConsoleLogger implements Logger {
  private readonly config: LogConfig;
  private readonly baseContext: Record<string, unknown>;

  constructor(config: Partial<LogConfig> = {}, baseContext: Record<string, unknown> = {}) {
    this.config = { ...DEFAULT_LOG_CONFIG, ...config };
    this.baseContext = baseContext;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context, error);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger(this.config, { ...this.baseContext, ...context });
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.level]) {
      return;
    }

    const fields = { ...this.baseContext, ...context };
    const write = this.writerFor(level);

    if (this.config.json) {
      write(
        JSON.stringify({
          level,
          message,
          timestamp: new Date().toISOString(),
          ...fields,
          ...(error && { error: { name: error.name, message: error.message } }),
        })
      );
      return;
    }

    const parts: string[] = [];
    if (this.config.timestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }
    parts.push(`[${level.toUpperCase()}]`, message);
    if (Object.keys(fields).length > 0) {
      parts.push(JSON.stringify(fields));
    }
    if (error) {
      parts.push(`${error.name}: ${error.message}`);
    }
    write(parts.join(' '));
  }

  private writerFor(level: LogLevel): (line: string) => void {
    switch (level) {
      case LogLevel.Debug:
        return console.debug;
      case LogLevel.Info:
        return console.info;
      case LogLevel.Warn:
        return console.warn;
      case LogLevel.Error:
        return console.error;
    }
  }
}

/**
 * Logger that discards everything.
 */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}
