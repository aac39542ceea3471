import { Command } from 'commander';
import { join } from 'path';
import ora from 'ora';
import { withStore } from '../db/index.js';
import type { BackupInfo } from '../models/backup.js';
import { BackupService } from '../services/backup.js';
import { runRefreshCycle, type RefreshOutcome } from '../services/refresh.js';
import { errorMessage } from '../utils/errors.js';
import { loadRuntime, nonNegativeNumber } from './shared.js';

interface CronOptions {
  interval: number;
  backup?: boolean;
  force?: boolean;
  quiet?: boolean;
}

interface CronResult {
  success: boolean;
  skipped: false;
  startedAt: string;
  refresh: RefreshOutcome | null;
  backup: BackupInfo | null;
  errors: string[];
}

export function shouldRun(lastRefreshAt: string | null, intervalHours: number, now: Date = new Date()): boolean {
  if (!lastRefreshAt) return true;
  const hoursSinceLastRun = (now.getTime() - new Date(lastRefreshAt).getTime()) / (1000 * 60 * 60);
  return hoursSinceLastRun >= intervalHours;
}

export function createCronCommand(): Command {
  return new Command('cron')
    .description(`Unattended refresh for crontab.

Runs a refresh cycle unless the last logged refresh is younger than the
interval, then optionally snapshots the store.

Examples:
  hnm cron                       # refresh if the last one is 1h+ old
  hnm cron --force --quiet       # always refresh, print JSON only
  hnm cron -i 6 --backup         # every 6h, back up after a successful refresh
  0 * * * * hnm cron --quiet >> ~/.hn-mirror/logs/cron.log 2>&1`)
    .option('-i, --interval <hours>', 'Minimum hours between refreshes', nonNegativeNumber, 1)
    .option('--backup', 'Create a backup after a successful refresh')
    .option('--force', 'Ignore the interval check')
    .option('--quiet', 'No progress output; print the JSON result only')
    .action(async (options: CronOptions) => {
      const quiet = options.quiet ?? false;
      const result: CronResult = {
        success: true,
        skipped: false,
        startedAt: new Date().toISOString(),
        refresh: null,
        backup: null,
        errors: [],
      };

      try {
        const { config, logger, storePath } = loadRuntime({ quiet: true, logFile: 'refresh.log', scope: 'cron' });

        if (!options.force) {
          const last = await withStore(storePath, (store) => store.getLastRefresh());
          const lastRunAt = last?.refresh_time ?? null;
          if (!shouldRun(lastRunAt, options.interval)) {
            const skipped = { skipped: true, reason: 'interval_not_reached', lastRunAt, intervalHours: options.interval };
            console.log(quiet ? JSON.stringify(skipped) : `Skipped: last refresh at ${lastRunAt}, interval ${options.interval}h not reached`);
            return;
          }
        }

        const spinner = quiet ? null : ora('Refreshing...').start();
        result.refresh = await runRefreshCycle(config, logger);
        if (result.refresh.status === 'success') {
          spinner?.succeed(`Refreshed ${result.refresh.stories_refreshed} stories, ${result.refresh.comments_refreshed} comments`);
        } else {
          result.success = false;
          result.errors.push(result.refresh.error_message ?? 'refresh failed');
          spinner?.fail(`Refresh failed: ${result.refresh.error_message ?? 'unknown error'}`);
        }

        if (options.backup && result.success) {
          const backupSpinner = quiet ? null : ora('Backing up...').start();
          const backups = new BackupService(
            { storePath, backupDir: config.BACKUP_DIR, keep: config.BACKUP_KEEP },
            logger.child('backup', { file: join(config.LOGS_DIR, 'backup.log') })
          );
          try {
            result.backup = backups.createBackup();
            backupSpinner?.succeed(`Backup written to ${result.backup.path}`);
          } catch (error) {
            result.errors.push(`backup: ${errorMessage(error)}`);
            backupSpinner?.fail('Backup failed');
          }
        }
      } catch (error) {
        result.success = false;
        result.errors.push(errorMessage(error));
        if (!quiet) console.error('Error:', errorMessage(error));
      }

      if (quiet) {
        console.log(JSON.stringify(result));
      }
      if (!result.success) {
        process.exitCode = 1;
      }
    });
}
