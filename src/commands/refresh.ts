import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { runRefreshCycle, type RefreshOutcome } from '../services/refresh.js';
import { errorMessage } from '../utils/errors.js';
import { formatDateTime } from '../utils/format.js';
import { loadRuntime } from './shared.js';

export function printOutcome(outcome: RefreshOutcome): void {
  const ok = outcome.status === 'success';
  console.log();
  console.log(chalk.bold('Refresh Result:'));
  console.log(`  Status:   ${ok ? chalk.green(outcome.status) : chalk.red(outcome.status)}`);
  console.log(`  Time:     ${chalk.dim(formatDateTime(outcome.refresh_time))}`);
  console.log(`  Stories:  ${chalk.cyan(outcome.stories_refreshed)}`);
  console.log(`  Comments: ${chalk.cyan(outcome.comments_refreshed)}`);
  if (outcome.error_message) {
    console.log(`  Error:    ${chalk.red(outcome.error_message)}`);
  }
  if (outcome.refresh_id === null) {
    console.log(chalk.yellow('  (no refresh_log row could be written)'));
  }
  console.log();
}

export function createRefreshCommand(): Command {
  return new Command('refresh')
    .description('Fetch the current top stories and their top-level comments into the local store')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      try {
        const { config, logger } = loadRuntime({ quiet: true, logFile: 'refresh.log', scope: 'refresh' });
        const spinner = options.json ? null : ora('Refreshing from HackerNews...').start();

        const outcome = await runRefreshCycle(config, logger);

        if (outcome.status === 'success') {
          spinner?.succeed(`Stored ${outcome.stories_refreshed} stories and ${outcome.comments_refreshed} comments`);
        } else {
          spinner?.fail('Refresh failed');
          process.exitCode = 1;
        }

        if (options.json) {
          console.log(JSON.stringify(outcome));
        } else {
          printOutcome(outcome);
        }
      } catch (error) {
        if (options.json) {
          console.log(JSON.stringify({ error: errorMessage(error) }));
        } else {
          console.error(chalk.red('✗'), errorMessage(error));
        }
        process.exitCode = 1;
      }
    });
}
