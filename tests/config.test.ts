import { describe, expect, it } from 'vitest';
import { homedir } from 'os';
import { join } from 'path';
import { loadConfig, resolveStorePath } from '../src/utils/config.js';
import { ValidationError } from '../src/utils/errors.js';

describe('loadConfig', () => {
  it('fills defaults from an empty environment', () => {
    const config = loadConfig({});
    const dataDir = join(homedir(), '.hn-mirror');

    expect(config).toMatchObject({
      DATA_DIR: dataDir,
      DATABASE_URL: `sqlite:///${join(dataDir, 'hackernews.db')}`,
      BACKUP_DIR: join(dataDir, 'backups'),
      LOGS_DIR: join(dataDir, 'logs'),
      HN_API_URL: 'https://hacker-news.firebaseio.com/v0',
      TOP_STORIES_LIMIT: 5,
      TOP_COMMENTS_LIMIT: 10,
      REQUEST_TIMEOUT_MS: 30000,
      MIN_FREE_DISK_PERCENT: 10,
      BACKUP_KEEP: 10,
      SERVER_PORT: 8000,
      API_URL: 'http://localhost:8000/api',
      LOG_LEVEL: 'info',
    });
    expect(config.PROXY_URL).toBeUndefined();
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });

  it('derives paths from DATA_DIR and parses numbers', () => {
    const config = loadConfig({
      DATA_DIR: '/srv/hn',
      TOP_STORIES_LIMIT: '30',
      HN_API_URL: 'http://127.0.0.1:9000/v0/',
      LOG_LEVEL: 'debug',
    });

    expect(config.DATABASE_URL).toBe('sqlite:////srv/hn/hackernews.db');
    expect(config.BACKUP_DIR).toBe('/srv/hn/backups');
    expect(config.TOP_STORIES_LIMIT).toBe(30);
    expect(config.HN_API_URL).toBe('http://127.0.0.1:9000/v0');
    expect(config.LOG_LEVEL).toBe('debug');
  });

  it('keeps explicit DATABASE_URL and BACKUP_DIR', () => {
    const config = loadConfig({ DATABASE_URL: 'sqlite:///tmp/x.db', BACKUP_DIR: '/tmp/b' });
    expect(config.DATABASE_URL).toBe('sqlite:///tmp/x.db');
    expect(config.BACKUP_DIR).toBe('/tmp/b');
  });

  it.each([
    ['TOP_STORIES_LIMIT', '0'],
    ['TOP_STORIES_LIMIT', 'many'],
    ['SERVER_PORT', '70000'],
    ['LOG_LEVEL', 'verbose'],
    ['HN_API_URL', 'not a url'],
  ])('rejects %s=%s', (key, value) => {
    expect(() => loadConfig({ [key]: value })).toThrow();
  });
});

describe('resolveStorePath', () => {
  it('strips the sqlite prefix', () => {
    expect(resolveStorePath('sqlite:////var/lib/hn.db')).toBe('/var/lib/hn.db');
    expect(resolveStorePath('sqlite:///data/hn.db')).toBe('data/hn.db');
  });

  it('rejects other schemes', () => {
    expect(() => resolveStorePath('postgres://localhost/hn')).toThrow(ValidationError);
    expect(() => resolveStorePath('sqlite:///')).toThrow('Unsupported database URL: sqlite:///');
  });
});
