/**
 * Logging utilities for the build system
 */

import { LogLevel } from '../types';

/** ANSI color codes for console output */
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m'
};

/** Log level hierarchy for filtering */
const LOG_LEVELS: Record<LogLevel, number> = {
  [LogLevel.Error]: 0,
  [LogLevel.Warn]: 1,
  [LogLevel.Info]: 2,
  [LogLevel.Debug]: 3,
  [LogLevel.Trace]: 4
};

/** Anything log lines can be written to */
export interface LogOutput {
  write(chunk: string): unknown;
}

/** Logger configuration */
export interface LoggerConfig {
  /** Current log level */
  level: LogLevel;
  /** Whether to use colors in output */
  colors: boolean;
  /** Whether to include timestamps */
  timestamps: boolean;
  /** Output stream for logs */
  output: LogOutput;
}

/** Default logger configuration */
const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: LogLevel.Info,
  colors: Boolean(process.stderr.isTTY) && process.env.NODE_ENV !== 'test',
  timestamps: true,
  output: process.stderr
};

/**
 * Build system logger with level-based filtering and colored output.
 * Child loggers share their parent's configuration object, so
 * reconfiguring the root applies to every scope.
 */
export class Logger {
  private readonly config: LoggerConfig;
  private readonly prefix?: string;
  private readonly startTime: number;

  constructor(config: Partial<LoggerConfig> = {}, prefix?: string, shared?: LoggerConfig) {
    this.config = shared ?? { ...DEFAULT_LOGGER_CONFIG, ...config };
    this.prefix = prefix;
    this.startTime = Date.now();
  }

  /**
   * Update configuration in place
   */
  configure(config: Partial<LoggerConfig>): void {
    Object.assign(this.config, config);
  }

  /**
   * Set the minimum log level
   */
  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  get level(): LogLevel {
    return this.config.level;
  }

  error(message: string, ...args: unknown[]): void {
    this.log(LogLevel.Error, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log(LogLevel.Warn, message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.Info, message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.Debug, message, ...args);
  }

  trace(message: string, ...args: unknown[]): void {
    this.log(LogLevel.Trace, message, ...args);
  }

  /**
   * Log a success message (info level with green color)
   */
  success(message: string, ...args: unknown[]): void {
    this.logColored(LogLevel.Info, 'green', '✅', message, ...args);
  }

  /**
   * Log a failure message (error level with red color)
   */
  failure(message: string, ...args: unknown[]): void {
    this.logColored(LogLevel.Error, 'red', '❌', message, ...args);
  }

  /**
   * Log a step message (info level with cyan color)
   */
  step(message: string, ...args: unknown[]): void {
    this.logColored(LogLevel.Info, 'cyan', '➡️', message, ...args);
  }

  /**
   * Log timing information
   */
  timing(label: string, startTime: number): void {
    const duration = Date.now() - startTime;
    this.logColored(LogLevel.Debug, 'magenta', '⏱️', `${label}: ${duration}ms`);
  }

  /**
   * Create a child logger with additional prefix
   */
  child(prefix: string): Logger {
    const childPrefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return new Logger({}, childPrefix, this.config);
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    this.logColored(level, this.getLevelColor(level), this.getLevelSymbol(level), message, ...args);
  }

  /**
   * Log with specific color and symbol
   */
  private logColored(
    level: LogLevel,
    color: keyof typeof COLORS,
    symbol: string,
    message: string,
    ...args: unknown[]
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const timestamp = this.config.timestamps ? this.getTimestamp() : '';
    const prefix = this.prefix ? `[${this.prefix}] ` : '';
    const levelStr = level.toUpperCase().padEnd(5);

    let formattedMessage = `${timestamp}${prefix}${symbol} ${levelStr} ${message}`;

    if (args.length > 0) {
      const formattedArgs = args.map(arg =>
        typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)
      );
      formattedMessage += ' ' + formattedArgs.join(' ');
    }

    if (this.config.colors) {
      formattedMessage = `${COLORS[color]}${formattedMessage}${COLORS.reset}`;
    }

    this.config.output.write(formattedMessage + '\n');
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] <= LOG_LEVELS[this.config.level];
  }

  private getLevelColor(level: LogLevel): keyof typeof COLORS {
    switch (level) {
      case LogLevel.Error:
        return 'red';
      case LogLevel.Warn:
        return 'yellow';
      case LogLevel.Info:
        return 'white';
      case LogLevel.Debug:
        return 'blue';
      case LogLevel.Trace:
        return 'dim';
    }
  }

  private getLevelSymbol(level: LogLevel): string {
    switch (level) {
      case LogLevel.Error:
        return '🚨';
      case LogLevel.Warn:
        return '⚠️';
      case LogLevel.Info:
        return 'ℹ️';
      case LogLevel.Debug:
        return '🔍';
      case LogLevel.Trace:
        return '🔬';
    }
  }

  private getTimestamp(): string {
    const now = new Date();
    const elapsedSeconds = ((now.getTime() - this.startTime) / 1000).toFixed(3);
    return `[${now.toISOString()}] [+${elapsedSeconds}s] `;
  }
}

/** Global logger instance */
export const logger = new Logger();

/**
 * Configure the global logger and every scoped logger
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  logger.configure(config);
}

/**
 * Create a scoped logger for a specific module
 */
export function createLogger(scope: string): Logger {
  return logger.child(scope);
}

/**
 * Parse a log level name, e.g. from an environment variable
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return Object.values(LogLevel).find(level => level === value);
}
