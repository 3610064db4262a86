/**
 * Logging utilities shared by the SalesBook packages
 */

/** Log levels, from quietest to most verbose */
export enum LogLevel {
  Silent = 'silent',
  Error = 'error',
  Warn = 'warn',
  Info = 'info',
  Debug = 'debug',
  Trace = 'trace',
}

/** ANSI color codes for console output */
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  white: '\x1b[37m',
};

/** Log level hierarchy for filtering */
const LOG_LEVELS: Record<LogLevel, number> = {
  [LogLevel.Silent]: -1,
  [LogLevel.Error]: 0,
  [LogLevel.Warn]: 1,
  [LogLevel.Info]: 2,
  [LogLevel.Debug]: 3,
  [LogLevel.Trace]: 4,
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
  /** Scope shown in front of every message */
  prefix?: string;
  /** Output stream for logs; stdout stays free for command feedback */
  output: LogOutput;
}

const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: LogLevel.Warn,
  colors: Boolean(process.stderr.isTTY) && process.env.NODE_ENV !== 'test',
  timestamps: true,
  output: process.stderr,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}

/**
 * Level-filtered logger with optional colored output
 */
export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
  }

  get level(): LogLevel {
    return this.config.level;
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  /**
   * Replace part of the configuration in place
   */
  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  error(message: string, ...args: unknown[]): void {
    this.log(LogLevel.Error, 'red', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log(LogLevel.Warn, 'yellow', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.Info, 'white', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.Debug, 'blue', message, args);
  }

  trace(message: string, ...args: unknown[]): void {
    this.log(LogLevel.Trace, 'dim', message, args);
  }

  /**
   * Create a child logger with additional prefix. The child gets a copy of
   * the configuration; later changes to the parent do not reach it.
   */
  child(prefix: string): Logger {
    const childPrefix = this.config.prefix
      ? `${this.config.prefix}:${prefix}`
      : prefix;

    return new Logger({
      ...this.config,
      prefix: childPrefix,
    });
  }

  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.Silent && LOG_LEVELS[level] <= LOG_LEVELS[this.config.level];
  }

  private log(level: LogLevel, color: keyof typeof COLORS, message: string, args: unknown[]): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const timestamp = this.config.timestamps ? `[${new Date().toISOString()}] ` : '';
    const prefix = this.config.prefix ? `[${this.config.prefix}] ` : '';
    const levelStr = level.toUpperCase().padEnd(5);

    let formattedMessage = `${timestamp}${prefix}${levelStr} ${message}`;

    if (args.length > 0) {
      const formattedArgs = args.map(formatArg);
      formattedMessage += ' ' + formattedArgs.join(' ');
    }

    if (this.config.colors) {
      formattedMessage = `${COLORS[color]}${formattedMessage}${COLORS.reset}`;
    }

    this.config.output.write(formattedMessage + '\n');
  }
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return `${arg.name}: ${arg.message}`;
  }
  if (typeof arg === 'object' && arg !== null) {
    return JSON.stringify(arg);
  }
  return String(arg);
}

/** Global logger instance */
export const logger = new Logger();

/**
 * Configure the global logger. Loggers already created with `createLogger`
 * keep their own copy.
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
