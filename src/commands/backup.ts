import { Command } from 'commander';
import chalk from 'chalk';
import { BackupService } from '../services/backup.js';
import { errorMessage } from '../utils/errors.js';
import { renderBackupList } from '../dashboard/render.js';
import { confirm, loadRuntime } from './shared.js';

function openBackupService(quiet: boolean): BackupService {
  const { config, logger, storePath } = loadRuntime({ quiet, logFile: 'backup.log', scope: 'backup' });
  return new BackupService(
    { storePath, backupDir: config.BACKUP_DIR, keep: config.BACKUP_KEEP },
    logger
  );
}

function fail(error: unknown): void {
  console.error(chalk.red('✗'), errorMessage(error));
  process.exitCode = 1;
}

export function createBackupCommand(): Command {
  const backup = new Command('backup').description('Create, list and restore store snapshots');

  backup
    .command('create')
    .description('Copy the live store into the backup directory and prune old copies')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      try {
        const info = openBackupService(options.json ?? false).createBackup();
        if (options.json) {
          console.log(JSON.stringify(info, null, 2));
        }
      } catch (error) {
        fail(error);
      }
    });

  backup
    .command('list')
    .description('List backups, newest first')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      try {
        const backups = openBackupService(true).listBackups();
        if (options.json) {
          console.log(JSON.stringify(backups, null, 2));
          return;
        }
        console.log(renderBackupList(backups));
      } catch (error) {
        fail(error);
      }
    });

  backup
    .command('restore')
    .description('Replace the live store with a backup; the current file is kept as pre_restore_<ts>.db')
    .argument('<filename>', 'Backup file name, as shown by "backup list"')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .option('--json', 'Output as JSON')
    .action(async (filename: string, options: { yes?: boolean; json?: boolean }) => {
      try {
        if (!options.yes) {
          console.log(chalk.yellow(`The live store will be replaced with ${filename}.`));
          if (!(await confirm('Continue? (y/N) '))) {
            console.log('Cancelled');
            return;
          }
        }

        const result = openBackupService(options.json ?? false).restoreFromBackup(filename);
        if (options.json) {
          console.log(JSON.stringify(result, null, 2));
        } else if (result.safety_backup) {
          console.log(chalk.gray(`Previous store saved as ${result.safety_backup}`));
        }
      } catch (error) {
        fail(error);
      }
    });

  return backup;
}
