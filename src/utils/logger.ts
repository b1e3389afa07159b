import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  SUCCESS = 'SUCCESS'
}

// SUCCESS ranks highest so it prints at every level
const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.SUCCESS]: 4,
};

const PREFIX: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: chalk.gray('[DEBUG]'),
  [LogLevel.INFO]: chalk.blue('[INFO]'),
  [LogLevel.WARN]: chalk.yellow('[WARN]'),
  [LogLevel.ERROR]: chalk.red('[ERROR]'),
  [LogLevel.SUCCESS]: chalk.green('[SUCCESS]'),
};

/**
 * Process-wide logger. Warnings and errors go to stderr so they never
 * interleave with model output streamed to stdout.
 */
class Logger {
  private static instance: Logger;
  private logLevel: LogLevel = LogLevel.INFO;

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLogLevel(level: LogLevel) {
    this.logLevel = level;
  }

  debug(message: string, ...args: unknown[]) {
    this.log(LogLevel.DEBUG, message, args);
  }

  info(message: string, ...args: unknown[]) {
    this.log(LogLevel.INFO, message, args);
  }

  warn(message: string, ...args: unknown[]) {
    this.log(LogLevel.WARN, message, args);
  }

  /** Log an error line, then the stack of `error` (or its JSON form). */
  error(message: string, error?: unknown, ...args: unknown[]) {
    if (!this.log(LogLevel.ERROR, message, args) || error === undefined || error === null) {
      return;
    }
    const detail = error instanceof Error ? (error.stack ?? error.message) : JSON.stringify(error, null, 2);
    console.error(chalk.red(detail));
  }

  success(message: string, ...args: unknown[]) {
    this.log(LogLevel.SUCCESS, message, args);
  }

  private log(level: LogLevel, message: string, args: unknown[]): boolean {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.logLevel]) {
      return false;
    }

    const line = `${chalk.gray(new Date().toISOString())} ${PREFIX[level]} ${message}`;
    if (level === LogLevel.WARN || level === LogLevel.ERROR) {
      console.error(line, ...args);
    } else {
      console.log(line, ...args);
    }
    return true;
  }
}

export const logger = Logger.getInstance();
