/**
 * Structured logging utility for the pretask runner
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import chalk from 'chalk';
import type { LogLevel } from '../types';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  critical: 4,
};

const LOG_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
  critical: chalk.magenta,
};

interface LogContext {
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  file?: string;
  console: boolean;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

class Logger {
  private config: LoggerConfig;
  private minLevel: number;

  constructor(config: LoggerConfig) {
    this.config = config;
    this.minLevel = LOG_LEVELS[config.level];

    if (config.file) {
      const dir = dirname(config.file);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
  }

  private isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= this.minLevel;
  }

  private formatConsole(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(8);

    let output = `${LOG_COLORS[level](`${timestamp} [${levelStr}]`)} ${message}`;

    if (context && Object.keys(context).length > 0) {
      const contextStr = Object.entries(context)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(' ');
      output += ` ${chalk.gray(contextStr)}`;
    }

    return output;
  }

  private formatJson(level: LogLevel, message: string, context?: LogContext): string {
    return JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...context,
    });
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    // Diagnostics go to stderr so task output on stdout stays clean
    if (this.config.console) {
      console.error(this.formatConsole(level, message, context));
    }

    if (this.config.file) {
      appendFileSync(this.config.file, this.formatJson(level, message, context) + '\n');
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  critical(message: string, context?: LogContext): void {
    this.log('critical', message, context);
  }

  /**
   * Log a task lifecycle event
   */
  taskEvent(
    event: 'started' | 'completed' | 'failed' | 'skipped',
    taskName: string,
    context?: LogContext
  ): void {
    const level = event === 'failed' ? 'error' : 'debug';
    this.log(level, `task_${event}`, { task: taskName, ...context });
  }
}

let globalLogger: Logger | null = null;

/**
 * Initialize the global logger
 */
export function initLogger(config: LoggerConfig): Logger {
  globalLogger = new Logger(config);
  return globalLogger;
}

/**
 * Get the global logger instance
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger({
      level: 'info',
      console: true,
    });
  }
  return globalLogger;
}

export { Logger };
