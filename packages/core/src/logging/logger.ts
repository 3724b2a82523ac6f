/**
 * Level-filtered logger shared by the wordseed packages
 */

import { LogLevel } from '../types/enums.js';

/** ANSI color codes for console output */
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
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

/** Anything log lines can be written to (process.stdout, process.stderr, a test buffer) */
export interface LogSink {
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
  /** Output sink for logs */
  output: LogSink;
}

function defaultConfig(): LoggerConfig {
  return {
    level: LogLevel.Info,
    colors: Boolean(process.stdout.isTTY) && process.env.NODE_ENV !== 'test',
    timestamps: true,
    output: process.stdout
  };
}

/**
 * Level-filtered logger with optional colored output
 *
 * Child loggers share their parent's settings object, so configuring the
 * root logger also reconfigures every scoped logger created from it.
 */
export class Logger {
  private readonly config: LoggerConfig;
  private readonly prefix?: string;

  constructor(config: Partial<LoggerConfig> = {}, prefix?: string, shared?: LoggerConfig) {
    this.config = shared ?? { ...defaultConfig(), ...config };
    this.prefix = prefix;
  }

  get level(): LogLevel {
    return this.config.level;
  }

  /**
   * Set the minimum log level
   */
  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  /**
   * Merge new settings into this logger's configuration
   */
  configure(config: Partial<LoggerConfig>): void {
    Object.assign(this.config, config);
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
    this.logColored(LogLevel.Info, 'green', '✔', message, ...args);
  }

  /**
   * Log a failure message (error level with red color)
   */
  failure(message: string, ...args: unknown[]): void {
    this.logColored(LogLevel.Error, 'red', '✖', message, ...args);
  }

  /**
   * Create a child logger with additional prefix
   */
  child(prefix: string): Logger {
    const childPrefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return new Logger({}, childPrefix, this.config);
  }

  /**
   * Check if message should be logged based on level
   */
  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] <= LOG_LEVELS[this.config.level];
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    this.logColored(level, this.getLevelColor(level), this.getLevelSymbol(level), message, ...args);
  }

  private logColored(
    level: LogLevel,
    color: keyof typeof COLORS,
    symbol: string,
    message: string,
    ...args: unknown[]
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const timestamp = this.config.timestamps ? `[${new Date().toISOString()}] ` : '';
    const prefix = this.prefix ? `[${this.prefix}] ` : '';
    const levelStr = level.toUpperCase().padEnd(5);

    let formattedMessage = `${timestamp}${prefix}${symbol} ${levelStr} ${message}`;

    if (args.length > 0) {
      const formattedArgs = args.map(arg =>
        typeof arg === 'object' && arg !== null ? JSON.stringify(arg) : String(arg)
      );
      formattedMessage += ' ' + formattedArgs.join(' ');
    }

    if (this.config.colors) {
      formattedMessage = `${COLORS[color]}${formattedMessage}${COLORS.reset}`;
    }

    this.config.output.write(formattedMessage + '\n');
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
        return '✖';
      case LogLevel.Warn:
        return '!';
      case LogLevel.Info:
        return 'i';
      case LogLevel.Debug:
        return '·';
      case LogLevel.Trace:
        return '»';
    }
  }
}

/** Global logger instance */
export const logger = new Logger();

/**
 * Configure the global logger
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
