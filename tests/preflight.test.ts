import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { openDb } from '../src/db/index.js';
import {
  checkDirectoryAccess,
  checkDiskSpace,
  checkRemoteReachable,
  checkStoreIntegrity,
  describePreflightChecks,
  runPreflightChecks,
} from '../src/services/preflight.js';
import { FakeSource, createTempDir } from './helpers.js';

describe('pre-flight checks', () => {
  let root: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ root, cleanup } = createTempDir());
  });

  afterEach(() => {
    cleanup();
  });

  describe('checkDirectoryAccess', () => {
    it('passes for a writable directory', async () => {
      expect(await checkDirectoryAccess(root)).toBeNull();
    });

    it('fails for a missing directory', async () => {
      const missing = join(root, 'nope');
      expect(await checkDirectoryAccess(missing)).toBe(`Data directory ${missing} does not exist`);
    });

    it('fails for a plain file', async () => {
      const file = join(root, 'file.txt');
      writeFileSync(file, 'x');
      expect(await checkDirectoryAccess(file)).toBe(`Data directory ${file} is not a directory`);
    });
  });

  describe('checkDiskSpace', () => {
    it('passes with no minimum', async () => {
      expect(await checkDiskSpace(root, 0)).toBeNull();
    });

    it('fails when the minimum cannot be met', async () => {
      const error = await checkDiskSpace(root, 101);
      expect(error).toMatch(/^Disk space critically low: \d+\.\d% free \(minimum 101%\)$/);
    });
  });

  describe('checkStoreIntegrity', () => {
    it('passes when the store does not exist yet', async () => {
      expect(await checkStoreIntegrity(join(root, 'missing.db'))).toBeNull();
    });

    it('passes for a healthy store', async () => {
      const path = join(root, 'ok.db');
      openDb(path).close();
      expect(await checkStoreIntegrity(path)).toBeNull();
    });

    it('fails for a file that is not a database', async () => {
      const path = join(root, 'broken.db');
      writeFileSync(path, 'this is not a sqlite file, just some text padding it out'.repeat(20));
      expect(await checkStoreIntegrity(path)).toMatch(/^Database integrity check failed: /);
    });
  });

  it('checkRemoteReachable reports an unreachable remote', async () => {
    const source = new FakeSource();
    expect(await checkRemoteReachable(source)).toBeNull();
    source.reachable = false;
    expect(await checkRemoteReachable(source)).toBe('HackerNews API is unavailable');
  });

  it('runPreflightChecks stops at the first failure in order', async () => {
    const source = new FakeSource();
    source.reachable = false;
    const missing = join(root, 'nope');

    const error = await runPreflightChecks({
      dataDir: missing,
      storePath: join(missing, 'hackernews.db'),
      minFreeDiskPercent: 0,
      source,
    });

    expect(error).toBe(`Data directory ${missing} does not exist`);
  });

  it('runPreflightChecks passes in a healthy environment', async () => {
    const error = await runPreflightChecks({
      dataDir: root,
      storePath: join(root, 'hackernews.db'),
      minFreeDiskPercent: 0,
      source: new FakeSource(),
    });
    expect(error).toBeNull();
  });

  it('describePreflightChecks reports every check', async () => {
    const source = new FakeSource();
    source.reachable = false;

    const results = await describePreflightChecks({
      dataDir: root,
      storePath: join(root, 'hackernews.db'),
      minFreeDiskPercent: 0,
      source,
    });

    expect(results).toEqual([
      { name: 'directory', error: null },
      { name: 'disk', error: null },
      { name: 'integrity', error: null },
      { name: 'remote', error: 'HackerNews API is unavailable' },
    ]);
  });
});
