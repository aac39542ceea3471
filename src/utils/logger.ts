import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import chalk from 'chalk';
import { errorMessage } from './errors.js';

export type LogLevel = 'info' | 'debug';

export interface LoggerOptions {
  level?: LogLevel;
  /** Suppress terminal output; the log file (if any) still receives every line. */
  quiet?: boolean;
  file?: string;
  scope?: string;
}

export class Logger {
  private readonly debugMode: boolean;
  private readonly scope: string;

  constructor(private readonly options: LoggerOptions = {}) {
    this.debugMode = options.level === 'debug';
    this.scope = options.scope ?? 'hnm';
    if (options.file) {
      mkdirSync(dirname(options.file), { recursive: true });
    }
  }

  /** Same sinks and level, different scope; `overrides` can redirect the file. */
  child(scope: string, overrides: Pick<LoggerOptions, 'file'> = {}): Logger {
    return new Logger({ ...this.options, ...overrides, scope });
  }

  info(message: string): void {
    this.write('INFO', message);
    if (!this.options.quiet) console.log(chalk.blue('ℹ'), message);
  }

  success(message: string): void {
    this.write('INFO', message);
    if (!this.options.quiet) console.log(chalk.green('✓'), message);
  }

  warn(message: string): void {
    this.write('WARNING', message);
    if (!this.options.quiet) console.log(chalk.yellow('⚠'), message);
  }

  error(message: string): void {
    this.write('ERROR', message);
    if (!this.options.quiet) console.error(chalk.red('✗'), message);
  }

  debug(message: string): void {
    if (!this.debugMode) return;
    this.write('DEBUG', message);
    if (!this.options.quiet) console.log(chalk.gray('[DEBUG]'), message);
  }

  private write(level: string, message: string): void {
    if (!this.options.file) return;
    const line = `${new Date().toISOString()} - ${this.scope} - ${level} - ${message}\n`;
    try {
      appendFileSync(this.options.file, line, 'utf-8');
    } catch (error) {
      console.error(chalk.red('✗'), `Cannot write to ${this.options.file}: ${errorMessage(error)}`);
    }
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}
