import { constants, copyFileSync, existsSync, mkdirSync, readdirSync, statSync, unlinkSync } from 'fs';
import { join } from 'path';
import { integrityCheck } from '../db/index.js';
import type { BackupInfo, RestoreResult } from '../models/backup.js';
import { ConflictError, InvalidBackupError, NotFoundError, errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export const BACKUP_PREFIX = 'hackernews';
const BACKUP_NAME = new RegExp(`^${BACKUP_PREFIX}_(\\d{14})\\.db$`);

export interface BackupServiceOptions {
  storePath: string;
  backupDir: string;
  keep: number;
}

/** `YYYYMMDDHHMMSS` in UTC. */
export function formatBackupTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:T]/g, '').slice(0, 14);
}

/** Inverse of {@link formatBackupTimestamp}; null unless it names a real instant. */
export function parseBackupTimestamp(timestamp: string): Date | null {
  const match = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/.exec(timestamp);
  if (!match) return null;
  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  return formatBackupTimestamp(date) === timestamp ? date : null;
}

export class BackupService {
  constructor(
    private readonly options: BackupServiceOptions,
    private readonly logger: Logger
  ) {}

  createBackup(): BackupInfo {
    const { storePath } = this.options;
    if (!existsSync(storePath)) {
      this.logger.error(`Database file not found at ${storePath}`);
      throw new NotFoundError(`Database file not found at ${storePath}`);
    }

    const backupDir = this.ensureBackupDir();
    const createdAt = new Date();
    const timestamp = formatBackupTimestamp(createdAt);
    const filename = `${BACKUP_PREFIX}_${timestamp}.db`;
    const path = join(backupDir, filename);

    try {
      copyFileSync(storePath, path, constants.COPYFILE_EXCL);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
        this.logger.error(`Backup already exists: ${path}`);
        throw new ConflictError(`Backup already exists: ${filename}`);
      }
      throw error;
    }
    this.logger.info(`Database backup created: ${path}`);

    const info: BackupInfo = {
      filename,
      path,
      timestamp,
      created_at: createdAt.toISOString(),
      size_bytes: statSync(path).size,
    };

    this.pruneBackups();
    return info;
  }

  /** Newest first; names that do not carry a valid timestamp are skipped. */
  listBackups(): BackupInfo[] {
    const backupDir = this.ensureBackupDir();
    const backups: BackupInfo[] = [];

    for (const filename of readdirSync(backupDir)) {
      const match = BACKUP_NAME.exec(filename);
      if (!match) continue;

      const timestamp = match[1];
      const createdAt = parseBackupTimestamp(timestamp);
      if (!createdAt) {
        this.logger.warn(`Skipping invalid backup file: ${filename}`);
        continue;
      }

      const path = join(backupDir, filename);
      backups.push({
        filename,
        path,
        timestamp,
        created_at: createdAt.toISOString(),
        size_bytes: statSync(path).size,
      });
    }

    return backups.sort((a, b) => b.timestamp.localeCompare(a.timestamp));
  }

  getBackup(filename: string): BackupInfo | null {
    return this.listBackups().find((backup) => backup.filename === filename) ?? null;
  }

  validateBackup(path: string): boolean {
    if (!existsSync(path) || statSync(path).size === 0) {
      this.logger.error(`Backup file does not exist or is empty: ${path}`);
      return false;
    }

    try {
      const result = integrityCheck(path);
      if (result !== 'ok') {
        this.logger.error(`Backup file failed integrity check: ${path}`);
        return false;
      }
      return true;
    } catch (error) {
      this.logger.error(`Error validating backup file ${path}: ${errorMessage(error)}`);
      return false;
    }
  }

  restoreFromBackup(filename: string): RestoreResult {
    this.logger.info(`Starting database restore from: ${filename}`);

    const backup = this.getBackup(filename);
    if (!backup) {
      this.logger.error(`Backup file not found: ${filename}`);
      throw new NotFoundError(`Backup file not found: ${filename}`);
    }

    if (!this.validateBackup(backup.path)) {
      throw new InvalidBackupError(`Invalid backup file: ${filename}`);
    }

    const { storePath } = this.options;
    let safetyBackup: string | null = null;
    if (existsSync(storePath)) {
      safetyBackup = join(this.ensureBackupDir(), `pre_restore_${formatBackupTimestamp(new Date())}.db`);
      copyFileSync(storePath, safetyBackup);
      this.logger.info(`Created safety backup before restore: ${safetyBackup}`);
    }

    copyFileSync(backup.path, storePath);
    this.logger.success(`Database successfully restored from: ${filename}`);

    return {
      success: true,
      restored_from: filename,
      restored_at: new Date().toISOString(),
      safety_backup: safetyBackup,
    };
  }

  /** Delete all but the newest `keep` backups, by filename timestamp. */
  pruneBackups(): string[] {
    const removed: string[] = [];
    for (const old of this.listBackups().slice(this.options.keep)) {
      try {
        unlinkSync(old.path);
        removed.push(old.filename);
        this.logger.info(`Removed old backup: ${old.path}`);
      } catch (error) {
        this.logger.error(`Error removing old backup ${old.path}: ${errorMessage(error)}`);
      }
    }
    return removed;
  }

  private ensureBackupDir(): string {
    mkdirSync(this.options.backupDir, { recursive: true });
    return this.options.backupDir;
  }
}
