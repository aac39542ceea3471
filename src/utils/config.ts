import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { ValidationError } from './errors.js';

const SQLITE_URL_PREFIX = 'sqlite:///';

const intVar = (fallback: string, min: number, max: number) =>
  z
    .string()
    .default(fallback)
    .transform((value) => Number(value))
    .pipe(z.number().int().min(min).max(max));

const envSchema = z
  .object({
    DATA_DIR: z.string().min(1).default(join(homedir(), '.hn-mirror')),
    DATABASE_URL: z.string().min(1).optional(),
    BACKUP_DIR: z.string().min(1).optional(),
    HN_API_URL: z.string().url().default('https://hacker-news.firebaseio.com/v0'),
    TOP_STORIES_LIMIT: intVar('5', 1, 500),
    TOP_COMMENTS_LIMIT: intVar('10', 1, 100),
    REQUEST_TIMEOUT_MS: intVar('30000', 100, 600_000),
    MIN_FREE_DISK_PERCENT: intVar('10', 0, 100),
    BACKUP_KEEP: intVar('10', 1, 1000),
    SERVER_PORT: intVar('8000', 1, 65_535),
    API_URL: z.string().url().default('http://localhost:8000/api'),
    PROXY_URL: z.string().url().optional(),
    LOG_LEVEL: z.enum(['info', 'debug']).default('info'),
  })
  .transform((env) => ({
    ...env,
    HN_API_URL: env.HN_API_URL.replace(/\/+$/, ''),
    API_URL: env.API_URL.replace(/\/+$/, ''),
    DATABASE_URL: env.DATABASE_URL ?? `${SQLITE_URL_PREFIX}${join(env.DATA_DIR, 'hackernews.db')}`,
    BACKUP_DIR: env.BACKUP_DIR ?? join(env.DATA_DIR, 'backups'),
    LOGS_DIR: join(env.DATA_DIR, 'logs'),
  }));

export type AppConfig = Readonly<z.infer<typeof envSchema>>;

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  return Object.freeze(envSchema.parse(env));
};

/** Filesystem path of the store behind a `sqlite:///` URL. */
export function resolveStorePath(databaseUrl: string): string {
  if (!databaseUrl.startsWith(SQLITE_URL_PREFIX)) {
    throw new ValidationError(`Unsupported database URL: ${databaseUrl}`);
  }
  const path = databaseUrl.slice(SQLITE_URL_PREFIX.length);
  if (!path) {
    throw new ValidationError(`Unsupported database URL: ${databaseUrl}`);
  }
  return path;
}
