/**
 * Logging utility with levels and colors
 */

import chalk from 'chalk';
import type { LogLevel } from '../core/types.js';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

/**
 * Render fields as key=value pairs, skipping undefined values
 */
function formatFields(fields?: LogFields): string {
  if (!fields) return '';
  const parts = Object.entries(fields)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${typeof v === 'string' && /\s/.test(v) ? JSON.stringify(v) : String(v)}`);
  return parts.length ? ` ${chalk.dim(parts.join(' '))}` : '';
}

/**
 * Logger class with configurable levels
 */
class Logger {
  private level: LogLevel = 'info';
  private quiet = false;

  setLevel(level: LogLevel) {
    this.level = level;
  }

  setQuiet(quiet: boolean) {
    this.quiet = quiet;
  }

  private shouldLog(level: LogLevel): boolean {
    if (this.quiet && level !== 'error') {
      return false;
    }
    return LEVELS[level] >= LEVELS[this.level];
  }

  debug(message: string, fields?: LogFields) {
    if (this.shouldLog('debug')) {
      console.log(chalk.gray(`[DEBUG] ${message}`) + formatFields(fields));
    }
  }

  info(message: string, fields?: LogFields) {
    if (this.shouldLog('info')) {
      console.log(chalk.blue(`[INFO] ${message}`) + formatFields(fields));
    }
  }

  warn(message: string, fields?: LogFields) {
    if (this.shouldLog('warn')) {
      console.warn(chalk.yellow(`[WARN] ${message}`) + formatFields(fields));
    }
  }

  error(message: string, fields?: LogFields) {
    if (this.shouldLog('error')) {
      console.error(chalk.red(`[ERROR] ${message}`) + formatFields(fields));
    }
  }

  /**
   * Success log (info level)
   */
  success(message: string, fields?: LogFields) {
    if (this.shouldLog('info')) {
      console.log(chalk.green(`[✓] ${message}`) + formatFields(fields));
    }
  }

  /**
   * Progress log (debug level; scans can be long)
   */
  progress(message: string, current: number, total: number) {
    if (this.shouldLog('debug') && total > 0) {
      const percentage = Math.round((current / total) * 100);
      console.log(chalk.cyan(`[${percentage}%] ${message} (${current}/${total})`));
    }
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
