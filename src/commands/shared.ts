import { join } from 'path';
import readline from 'readline';
import { InvalidArgumentError } from 'commander';
import { loadConfig, resolveStorePath, type AppConfig } from '../utils/config.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface Runtime {
  config: AppConfig;
  logger: Logger;
  storePath: string;
}

export interface RuntimeOptions {
  /** Keep the terminal clean for machine-readable output. */
  quiet?: boolean;
  /** File name under the logs directory. */
  logFile?: string;
  scope?: string;
}

export function loadRuntime(options: RuntimeOptions = {}): Runtime {
  const config = loadConfig();
  const logger = createLogger({
    level: config.LOG_LEVEL,
    quiet: options.quiet,
    file: options.logFile ? join(config.LOGS_DIR, options.logFile) : undefined,
    scope: options.scope,
  });
  return { config, logger, storePath: resolveStorePath(config.DATABASE_URL) };
}

export const positiveInt = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got: ${value}`);
  }
  return parsed;
};

export const intInRange =
  (min: number, max: number) =>
  (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
      throw new InvalidArgumentError(`Expected an integer from ${min} to ${max}, got: ${value}`);
    }
    return parsed;
  };

export const nonNegativeNumber = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`Expected a non-negative number, got: ${value}`);
  }
  return parsed;
};

export async function confirm(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const answer = await new Promise<string>((resolve) => {
    rl.question(question, resolve);
  });
  rl.close();

  return answer.trim().toLowerCase() === 'y';
}
