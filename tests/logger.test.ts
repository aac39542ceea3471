import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { Logger } from '../src/utils/logger.js';
import { createTempDir } from './helpers.js';

const LINE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z - (\S+) - (\w+) - (.*)$/;

describe('Logger', () => {
  let root: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ root, cleanup } = createTempDir());
  });

  afterEach(() => {
    vi.restoreAllMocks();
    cleanup();
  });

  function fileLines(path: string): string[][] {
    return readFileSync(path, 'utf-8')
      .trim()
      .split('\n')
      .map((line) => LINE.exec(line)?.slice(1) ?? [line]);
  }

  it('writes timestamped lines with scope and level to its file', () => {
    const file = join(root, 'logs', 'refresh.log');
    const logger = new Logger({ quiet: true, file, scope: 'refresh' });

    logger.info('started');
    logger.success('done');
    logger.warn('careful');
    logger.error('failed');

    expect(fileLines(file)).toEqual([
      ['refresh', 'INFO', 'started'],
      ['refresh', 'INFO', 'done'],
      ['refresh', 'WARNING', 'careful'],
      ['refresh', 'ERROR', 'failed'],
    ]);
  });

  it('only records debug lines at debug level', () => {
    const file = join(root, 'app.log');
    new Logger({ quiet: true, file }).debug('hidden');
    new Logger({ quiet: true, file, level: 'debug' }).debug('shown');

    expect(fileLines(file)).toEqual([['hnm', 'DEBUG', 'shown']]);
  });

  it('keeps nothing on the terminal when quiet', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const logger = new Logger({ quiet: true });
    logger.info('a');
    logger.error('b');

    expect(log).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
  });

  it('prints errors to stderr when not quiet', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    new Logger().error('broken');

    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][1]).toBe('broken');
  });

  it('gives a child its own scope and optionally its own file', () => {
    const parentFile = join(root, 'api.log');
    const childFile = join(root, 'backup.log');
    const parent = new Logger({ quiet: true, file: parentFile, scope: 'server' });

    parent.child('api').info('request');
    parent.child('backup', { file: childFile }).info('copied');

    expect(fileLines(parentFile)).toEqual([['api', 'INFO', 'request']]);
    expect(fileLines(childFile)).toEqual([['backup', 'INFO', 'copied']]);
  });
});
