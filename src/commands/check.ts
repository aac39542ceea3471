import { Command } from 'commander';
import chalk from 'chalk';
import { dirname } from 'path';
import { HnClient } from '../services/hn-client.js';
import { describePreflightChecks } from '../services/preflight.js';
import { errorMessage } from '../utils/errors.js';
import { loadRuntime } from './shared.js';

export function createCheckCommand(): Command {
  return new Command('check')
    .description(`Run the pre-flight checks a refresh would run, without refreshing.

Checks, in order: data directory access, free disk space, store integrity,
HackerNews API reachability.`)
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      try {
        const { config, logger, storePath } = loadRuntime({ quiet: options.json });
        const client = new HnClient(
          {
            baseUrl: config.HN_API_URL,
            timeoutMs: config.REQUEST_TIMEOUT_MS,
            topStoriesLimit: config.TOP_STORIES_LIMIT,
            proxyUrl: config.PROXY_URL,
          },
          logger.child('hn-client')
        );

        const results = await describePreflightChecks({
          dataDir: dirname(storePath),
          storePath,
          minFreeDiskPercent: config.MIN_FREE_DISK_PERCENT,
          source: client,
        }).finally(() => client.close());

        const passed = results.every((result) => result.error === null);
        if (options.json) {
          console.log(JSON.stringify({ passed, checks: results }, null, 2));
        } else {
          for (const result of results) {
            const line = result.error
              ? `${chalk.red('✗')} ${result.name.padEnd(10)} ${chalk.red(result.error)}`
              : `${chalk.green('✓')} ${result.name.padEnd(10)} ${chalk.gray('ok')}`;
            console.log(line);
          }
        }
        if (!passed) process.exitCode = 1;
      } catch (error) {
        console.error(chalk.red('✗'), errorMessage(error));
        process.exitCode = 1;
      }
    });
}
