import { constants, existsSync } from 'fs';
import { access, stat, statfs } from 'fs/promises';
import { integrityCheck } from '../db/index.js';
import { errorMessage } from '../utils/errors.js';
import type { ItemSource } from './hn-client.js';

/** A check resolves to `null` when it passes, or to a readable failure. */
export type CheckResult = string | null;

export interface PreflightOptions {
  dataDir: string;
  storePath: string;
  minFreeDiskPercent: number;
  source: Pick<ItemSource, 'probe'>;
}

export interface NamedCheckResult {
  name: string;
  error: CheckResult;
}

export async function checkDirectoryAccess(dir: string): Promise<CheckResult> {
  try {
    const info = await stat(dir);
    if (!info.isDirectory()) {
      return `Data directory ${dir} is not a directory`;
    }
  } catch {
    return `Data directory ${dir} does not exist`;
  }

  try {
    await access(dir, constants.R_OK | constants.W_OK);
  } catch {
    return `Data directory ${dir} is not readable and writable`;
  }
  return null;
}

export async function checkDiskSpace(dir: string, minFreePercent: number): Promise<CheckResult> {
  try {
    const stats = await statfs(dir);
    if (stats.blocks === 0) return null;
    const freePercent = (stats.bavail / stats.blocks) * 100;
    if (freePercent < minFreePercent) {
      return `Disk space critically low: ${freePercent.toFixed(1)}% free (minimum ${minFreePercent}%)`;
    }
    return null;
  } catch (error) {
    return `Cannot read disk usage for ${dir}: ${errorMessage(error)}`;
  }
}

/** A missing file passes: the store is created on first use. */
export async function checkStoreIntegrity(storePath: string): Promise<CheckResult> {
  if (!existsSync(storePath)) return null;
  try {
    const result = integrityCheck(storePath);
    return result === 'ok' ? null : `Database integrity check failed: ${result}`;
  } catch (error) {
    return `Database integrity check failed: ${errorMessage(error)}`;
  }
}

export async function checkRemoteReachable(source: Pick<ItemSource, 'probe'>): Promise<CheckResult> {
  return (await source.probe()) ? null : 'HackerNews API is unavailable';
}

/** All four checks in order, without stopping at the first failure. */
export async function describePreflightChecks(options: PreflightOptions): Promise<NamedCheckResult[]> {
  return [
    { name: 'directory', error: await checkDirectoryAccess(options.dataDir) },
    { name: 'disk', error: await checkDiskSpace(options.dataDir, options.minFreeDiskPercent) },
    { name: 'integrity', error: await checkStoreIntegrity(options.storePath) },
    { name: 'remote', error: await checkRemoteReachable(options.source) },
  ];
}

export async function runPreflightChecks(options: PreflightOptions): Promise<CheckResult> {
  const checks: Array<() => Promise<CheckResult>> = [
    () => checkDirectoryAccess(options.dataDir),
    () => checkDiskSpace(options.dataDir, options.minFreeDiskPercent),
    () => checkStoreIntegrity(options.storePath),
    () => checkRemoteReachable(options.source),
  ];

  for (const check of checks) {
    const error = await check();
    if (error) return error;
  }
  return null;
}
