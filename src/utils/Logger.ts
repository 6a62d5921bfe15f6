import chalk from 'chalk';
import { formatErrorChain } from './Errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

const LEVEL_PREFIXES: Record<LogLevel, string> = {
  debug: chalk.cyan('[DEBUG]'),
  info: chalk.blue('[INFO]'),
  warn: chalk.yellow('[WARN]'),
  error: chalk.red('[ERROR]'),
};

const MESSAGE_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.white,
  warn: chalk.yellow,
  error: chalk.red,
};

/**
 * Diagnostic logger. Everything goes to stderr so that command output on
 * stdout can be piped or eval'd by a shell.
 */
export class Logger {
  private static instance: Logger;
  private logLevel: LogLevel = 'info';
  private readonly levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLevel(): LogLevel {
    return this.logLevel;
  }

  isDebugEnabled(): boolean {
    return this.shouldLog('debug');
  }

  debug(message: string, meta?: unknown): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log('error', message, meta);
  }

  success(message: string, meta?: unknown): void {
    if (this.shouldLog('info')) {
      const formatted = chalk.green(`✓ ${message}`);
      console.error(`${formatted}${meta ? ` ${this.formatMeta(meta)}` : ''}`);
    }
  }

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const prefix = LEVEL_PREFIXES[level];
    const formatted = this.formatMessage(level, message);
    const metaStr = meta ? ` ${this.formatMeta(meta)}` : '';

    if (level === 'debug') {
      console.error(`${this.getTimestamp()} ${prefix} ${formatted}${metaStr}`);
    } else {
      console.error(`${prefix} ${formatted}${metaStr}`);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levels[level] >= this.levels[this.logLevel];
  }

  private getTimestamp(): string {
    return chalk.gray(new Date().toISOString());
  }

  private formatMessage(level: LogLevel, message: string): string {
    return MESSAGE_COLORS[level](message);
  }

  private formatMeta(meta: unknown): string {
    if (typeof meta === 'string') {
      return chalk.gray(`(${meta})`);
    }

    if (meta instanceof Error) {
      return chalk.red(`(${this.isDebugEnabled() ? formatErrorChain(meta) : meta.message})`);
    }

    try {
      return chalk.gray(`(${JSON.stringify(meta)})`);
    } catch {
      return chalk.gray(`(${String(meta)})`);
    }
  }
}

export const logger = Logger.getInstance();
