/**
 * Logger for consistent console output across the build pipeline
 */

/**
 * Log levels
 */
export enum LogLevel {
  SILLY = 0,
  VERBOSE = 1,
  DEBUG = 2,
  INFO = 3,
  WARN = 4,
  ERROR = 5,
  NONE = 6, // Silent mode - no output
}

const LOG_LEVEL_NAMES: Record<string, LogLevel> = {
  silly: LogLevel.SILLY,
  verbose: LogLevel.VERBOSE,
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  none: LogLevel.NONE,
};

/**
 * Resolve a level name such as "debug" (case-insensitive)
 * Unknown or missing names fall back to the given default
 */
export function parseLogLevel(
  name: string | undefined,
  fallback: LogLevel = LogLevel.INFO,
): LogLevel {
  if (!name) return fallback;
  return LOG_LEVEL_NAMES[name.toLowerCase()] ?? fallback;
}

export interface LoggerOptions {
  level?: LogLevel | undefined;
  context?: string | undefined;
  useStderr?: boolean | undefined;
}

/**
 * Logger with a process-wide singleton and fresh instances for tests
 */
export class Logger {
  /** The singleton instance */
  private static instance: Logger | null = null;

  private level: LogLevel;
  private context: string | undefined;
  private useStderr: boolean;

  private constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.context = options.context;
    this.useStderr = options.useStderr ?? false;
  }

  /**
   * Get the singleton instance of Logger
   */
  public static getInstance(options?: LoggerOptions): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger(options);
    } else if (options?.useStderr !== undefined) {
      Logger.instance.useStderr = options.useStderr;
    }
    return Logger.instance;
  }

  /**
   * Reset the singleton instance (primarily for testing)
   */
  public static resetInstance(): void {
    Logger.instance = null;
  }

  /**
   * Create a fresh instance without affecting the singleton
   */
  public static createFresh(options?: LoggerOptions): Logger {
    return new Logger(options);
  }

  private formatMessage(message: string): string {
    const timestamp = new Date().toISOString();
    return this.context
      ? `[${timestamp}] [${this.context}] ${message}`
      : `[${timestamp}] ${message}`;
  }

  public silly(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.SILLY) {
      console.debug(this.formatMessage(message), ...args);
    }
  }

  public verbose(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.VERBOSE) {
      console.debug(this.formatMessage(message), ...args);
    }
  }

  public debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) {
      console.debug(this.formatMessage(message), ...args);
    }
  }

  public info(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) {
      if (this.useStderr) {
        console.error(this.formatMessage(message), ...args);
      } else {
        console.info(this.formatMessage(message), ...args);
      }
    }
  }

  public warn(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) {
      console.warn(this.formatMessage(message), ...args);
    }
  }

  public error(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.ERROR) {
      console.error(this.formatMessage(message), ...args);
    }
  }

  /**
   * Create a child logger with a specific context
   */
  public child(context: string): Logger {
    return Logger.createFresh({
      level: this.level,
      context,
      useStderr: this.useStderr,
    });
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Send info output to stderr, leaving stdout to command results
   */
  public setUseStderr(useStderr: boolean): void {
    this.useStderr = useStderr;
  }
}
