/**
 * Logger for the BVH reader
 *
 * Supports different log levels and timing operations.
 */

/**
 * Log Levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

/**
 * Logger Options Interface
 */
export interface LoggerOptions {
  level?: LogLevel;
  timestamp?: boolean;
  duration?: boolean;
  prefix?: string;
}

/**
 * Logger Context Interface
 */
export interface LoggerContext {
  operation?: string | undefined;
  stage?: string | undefined;
  filePath?: string | undefined;
  fileSize?: number | undefined;
  duration?: number | undefined;
  [key: string]: unknown;
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Console logger with level filtering and ANSI colours
 */
export class Logger {
  private options: Required<LoggerOptions>;
  private startTimes: Map<string, number> = new Map();

  constructor(options: LoggerOptions = {}) {
    this.options = {
      level: options.level || LogLevel.INFO,
      timestamp: options.timestamp ?? true,
      duration: options.duration ?? true,
      prefix: options.prefix || 'BVH',
    };
  }

  get level(): LogLevel {
    return this.options.level;
  }

  /**
   * Format timestamp
   */
  private formatTimestamp(): string {
    if (!this.options.timestamp) return '';
    return new Date().toISOString().slice(11, 23);
  }

  /**
   * Get colors for terminal output
   */
  private getColor(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return '\x1b[90m'; // Gray for debug info
      case LogLevel.INFO:
        return '\x1b[36m'; // Cyan for operations
      case LogLevel.WARN:
        return '\x1b[33m'; // Yellow for warnings
      case LogLevel.ERROR:
        return '\x1b[31m'; // Red for errors
      default:
        return '\x1b[90m';
    }
  }

  /**
   * Reset ANSI color
   */
  private getResetColor(): string {
    return '\x1b[0m';
  }

  /**
   * Check if should log based on level
   */
  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.options.level);
  }

  /**
   * Base log method
   */
  private log(level: LogLevel, message: string, context?: LoggerContext): void {
    if (!this.shouldLog(level)) return;

    const timestamp = this.formatTimestamp();
    const color = this.getColor(level);
    const reset = this.getResetColor();
    const prefix = `${this.options.prefix} [${level.toUpperCase()}]`;
    const timeStr = timestamp ? ` @ ${timestamp}` : '';

    const logMessage = `${color}${prefix}${timeStr} ${message}${reset}`;

    if (context) {
      console.log(logMessage, context);
    } else {
      console.log(logMessage);
    }
  }

  debug(message: string, context?: LoggerContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LoggerContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LoggerContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LoggerContext): void {
    this.log(LogLevel.ERROR, message, context);
  }

  /**
   * Start timing an operation
   */
  startTiming(operation: string): void {
    this.startTimes.set(operation, Date.now());
    this.debug(`Starting operation: ${operation}`, { operation });
  }

  /**
   * End timing an operation
   */
  endTiming(operation: string, context?: LoggerContext): void {
    const startTime = this.startTimes.get(operation);
    if (startTime !== undefined) {
      this.startTimes.delete(operation);
      this.debug(`Completed operation: ${operation}`, {
        operation,
        ...(this.options.duration ? { duration: Date.now() - startTime } : {}),
        ...context
      });
    }
  }

  /**
   * Run a synchronous operation between startTiming and endTiming
   */
  withTiming<T>(operation: string, fn: () => T, context?: LoggerContext): T {
    this.startTiming(operation);
    try {
      const result = fn();
      this.endTiming(operation, { ...context, success: true });
      return result;
    } catch (error) {
      this.endTiming(operation, { ...context, success: false, error: error instanceof Error ? error.message : String(error) });
      throw error;
    }
  }

  /**
   * Log file operation
   */
  logFileOperation(operation: string, filePath: string, fileSize?: number, context?: LoggerContext): void {
    this.debug(`File operation: ${operation}`, {
      operation,
      filePath,
      fileSize,
      ...context
    });
  }

  /**
   * Log parse stage
   */
  logStage(stage: string, context?: LoggerContext): void {
    this.debug(`Parse stage: ${stage}`, {
      stage,
      ...context
    });
  }
}

/**
 * Create logger with custom options
 */
export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}

/**
 * Logger factory for readers
 */
export const LoggerFactory = {
  /**
   * Logger for a reader; debug output only when `debug` is set
   */
  forReader(debug: boolean, prefix: string): Logger {
    return createLogger({
      level: debug ? LogLevel.DEBUG : LogLevel.ERROR,
      timestamp: true,
      duration: true,
      prefix
    });
  },
};
