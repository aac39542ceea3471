import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, statSync } from 'fs';
import { withStore } from '../db/index.js';
import type { StoreStats } from '../services/store.js';
import { errorMessage } from '../utils/errors.js';
import { formatDateTime } from '../utils/format.js';
import { loadRuntime } from './shared.js';

interface StatusData {
  store: {
    path: string;
    sizeBytes: number;
  };
  counts: Omit<StoreStats, 'lastRefresh'>;
  lastRefresh: StoreStats['lastRefresh'];
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function printColoredStatus(data: StatusData): void {
  console.log(chalk.bold.cyan('\nHN Mirror status'));
  console.log(chalk.gray('-'.repeat(60)));

  console.log(chalk.bold('\nStore'));
  console.log(`  Path: ${chalk.gray(data.store.path)}`);
  console.log(`  Size: ${chalk.yellow(formatBytes(data.store.sizeBytes))}`);

  console.log(chalk.bold('\nContent'));
  console.log(`  Stories:  ${chalk.yellow(data.counts.stories)} (${chalk.cyan(data.counts.topStories)} top)`);
  console.log(`  Comments: ${chalk.yellow(data.counts.comments)} (${data.counts.links} links)`);
  console.log(`  Users:    ${chalk.yellow(data.counts.users)}`);

  console.log(chalk.bold('\nRefreshes'));
  console.log(`  Total: ${chalk.yellow(data.counts.refreshes)}`);
  const last = data.lastRefresh;
  if (last) {
    const state = last.status === 'success' ? chalk.green(last.status) : chalk.red(last.status);
    console.log(`  Last:  ${chalk.gray(formatDateTime(last.refresh_time))} (${state})`);
    console.log(`         ${last.stories_refreshed} stories, ${last.comments_refreshed} comments`);
    if (last.error_message) {
      console.log(`  Error: ${chalk.red(last.error_message)}`);
    }
  } else {
    console.log(`  Last:  ${chalk.gray(formatDateTime(null))}`);
  }

  console.log(chalk.gray('\n' + '-'.repeat(60)));
  console.log(chalk.gray('Tip: use --json for machine-readable output\n'));
}

export function createStatusCommand(): Command {
  return new Command('status')
    .description(`Show local store statistics and the last refresh.

Examples:
  hnm status              # coloured summary
  hnm status --json       # JSON output`)
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      try {
        const { storePath } = loadRuntime({ quiet: options.json });
        const { lastRefresh, ...counts } = await withStore(storePath, (store) => store.getStats());
        const data: StatusData = {
          store: { path: storePath, sizeBytes: existsSync(storePath) ? statSync(storePath).size : 0 },
          counts,
          lastRefresh,
        };

        if (options.json) {
          console.log(JSON.stringify(data, null, 2));
        } else {
          printColoredStatus(data);
        }
      } catch (error) {
        console.error(chalk.red('✗'), errorMessage(error));
        process.exitCode = 1;
      }
    });
}
