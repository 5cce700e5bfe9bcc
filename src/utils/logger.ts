/**
 * @arch propweave.infra.logging
 *
 * Console logging for the engine and the CLI.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

class Logger {
  private level: LogLevel = 'info';
  private prefix: string = '';
  private readonly parent?: Logger;

  constructor(parent?: Logger) {
    this.parent = parent;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Children follow their root logger's level, so `logger.setLevel()`
   * also silences every child created before the call.
   */
  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled('debug')) return;
    console.log(chalk.gray(`[DEBUG] ${this.formatMessage(message)}`));
    if (data) {
      console.log(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled('info')) return;
    console.log(chalk.blue(`[INFO] ${this.formatMessage(message)}`));
    if (data) {
      console.log(chalk.blue(JSON.stringify(data, null, 2)));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled('warn')) return;
    console.warn(chalk.yellow(`[WARN] ${this.formatMessage(message)}`));
    if (data) {
      console.warn(chalk.yellow(JSON.stringify(data, null, 2)));
    }
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.isEnabled('error')) return;
    console.error(chalk.red(`[ERROR] ${this.formatMessage(message)}`));
    if (error instanceof Error) {
      console.error(chalk.red(error.stack || error.message));
    } else if (error) {
      console.error(chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  /**
   * Create a child logger with a nested prefix.
   */
  child(prefix: string): Logger {
    const child = new Logger(this.parent ?? this);
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

export const logger = new Logger();

export { Logger };
