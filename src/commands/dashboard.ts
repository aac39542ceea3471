import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { DashboardClient } from '../dashboard/client.js';
import {
  renderBackupList,
  renderCommentThread,
  renderStoryCard,
  renderSystemStatus,
  renderUser,
} from '../dashboard/render.js';
import { STORY_COMMENTS_MAX_LIMIT } from '../models/comment.js';
import type { SystemStatus } from '../models/refresh-log.js';
import { TOP_STORIES_MAX_LIMIT } from '../models/story.js';
import { loadConfig } from '../utils/config.js';
import { errorMessage } from '../utils/errors.js';
import { confirm, intInRange, positiveInt } from './shared.js';

interface DashboardOptions {
  api?: string;
  story?: number;
  user?: string;
  refresh?: boolean;
  limit?: number;
  backups?: boolean;
  backup?: boolean;
  restore?: string;
  yes?: boolean;
  json?: boolean;
}

export type DashboardView = 'stories' | 'comments';

const VIEW_MAX_LIMIT: Record<DashboardView, number> = {
  stories: TOP_STORIES_MAX_LIMIT,
  comments: STORY_COMMENTS_MAX_LIMIT,
};

/**
 * The limit sent to the read API: `--limit` when given, otherwise the
 * configured default capped at what the API accepts for the view.
 */
export function resolveDashboardLimit(view: DashboardView, requested: number | undefined, configured: number): number {
  const max = VIEW_MAX_LIMIT[view];
  if (requested === undefined) return Math.min(configured, max);
  if (requested > max) {
    throw new InvalidArgumentError(`--limit for ${view} must be at most ${max}, got: ${requested}`);
  }
  return requested;
}

async function fetchStatus(client: DashboardClient): Promise<SystemStatus | null> {
  try {
    return await client.getSystemStatus();
  } catch (error) {
    console.error(chalk.red(`Could not reach the API: ${errorMessage(error)}`));
    return null;
  }
}

async function showStory(client: DashboardClient, id: number, limit: number, json: boolean): Promise<void> {
  const [story, comments] = await Promise.all([client.getStory(id), client.getStoryComments(id, limit)]);
  if (json) {
    console.log(JSON.stringify({ story, comments }, null, 2));
    return;
  }
  console.log(renderStoryCard(story));
  console.log();
  console.log(chalk.bold(`Top comments (${comments.length})`));
  console.log(chalk.gray('-'.repeat(60)));
  console.log(comments.length > 0 ? renderCommentThread(comments) : chalk.dim('No comments'));
}

async function showOverview(client: DashboardClient, limit: number, json: boolean): Promise<void> {
  const status = await fetchStatus(client);
  if (!status) {
    if (json) console.log(JSON.stringify({ status: null, stories: [] }, null, 2));
    else console.log(renderSystemStatus(null));
    process.exitCode = 1;
    return;
  }

  const stories = await client.getTopStories(limit);
  if (json) {
    console.log(JSON.stringify({ status, stories }, null, 2));
    return;
  }

  console.log(chalk.bold.cyan('\nHackerNews Mirror'));
  console.log(chalk.gray('-'.repeat(60)));
  console.log(renderSystemStatus(status));
  console.log(chalk.gray('-'.repeat(60)));
  if (stories.length === 0) {
    console.log(chalk.dim('No stories yet. Run a refresh first.'));
  }
  for (const story of stories) {
    console.log(renderStoryCard(story));
    console.log();
  }
  console.log(chalk.gray('Tip: hnm dashboard --story <id> for comments\n'));
}

export function createDashboardCommand(): Command {
  return new Command('dashboard')
    .description(`Terminal dashboard over the read API.

Examples:
  hnm dashboard                    # status and top stories
  hnm dashboard --story 3          # one story with its comments
  hnm dashboard --user someone     # a user profile
  hnm dashboard --refresh          # trigger a background refresh
  hnm dashboard --backups          # backups on the server
  hnm dashboard --restore <file>   # restore the server's store from a backup`)
    .option('--api <url>', 'Read API base URL (default: API_URL)')
    .option('-s, --story <id>', 'Show one story (local id) with its comments', positiveInt)
    .option('-u, --user <username>', 'Show a user profile')
    .option('--refresh', 'Trigger a refresh on the server')
    .option(
      '-l, --limit <n>',
      `Number of stories (max ${TOP_STORIES_MAX_LIMIT}) or comments (max ${STORY_COMMENTS_MAX_LIMIT}) to show`,
      intInRange(1, STORY_COMMENTS_MAX_LIMIT)
    )
    .option('--backups', 'List backups on the server')
    .option('--backup', 'Create a backup on the server')
    .option('--restore <filename>', 'Restore the server store from a backup')
    .option('-y, --yes', 'Skip the restore confirmation prompt')
    .option('--json', 'Output as JSON')
    .action(async (options: DashboardOptions) => {
      const json = options.json ?? false;
      try {
        const config = loadConfig();
        const client = new DashboardClient(options.api ?? config.API_URL);

        if (options.refresh) {
          await client.triggerRefresh();
          console.log(json ? JSON.stringify({ status: 'refresh_started' }) : chalk.green('✓ Refresh started'));
          return;
        }

        if (options.backups) {
          const backups = await client.listBackups();
          console.log(json ? JSON.stringify(backups, null, 2) : renderBackupList(backups));
          return;
        }

        if (options.backup) {
          const info = await client.createBackup();
          console.log(json ? JSON.stringify(info, null, 2) : chalk.green(`✓ Backup created: ${info.filename}`));
          return;
        }

        if (options.restore !== undefined) {
          if (!options.yes) {
            console.log(chalk.yellow(`The server store will be replaced with ${options.restore}.`));
            if (!(await confirm('Continue? (y/N) '))) {
              console.log('Cancelled');
              return;
            }
          }
          const result = await client.restoreBackup(options.restore);
          console.log(
            json ? JSON.stringify(result, null, 2) : chalk.green(`✓ Restored from ${result.restored_from}`)
          );
          return;
        }

        if (options.user) {
          const user = await client.getUser(options.user);
          console.log(json ? JSON.stringify(user, null, 2) : renderUser(user));
          return;
        }

        if (options.story !== undefined) {
          const limit = resolveDashboardLimit('comments', options.limit, config.TOP_COMMENTS_LIMIT);
          await showStory(client, options.story, limit, json);
          return;
        }

        await showOverview(client, resolveDashboardLimit('stories', options.limit, config.TOP_STORIES_LIMIT), json);
      } catch (error) {
        console.error(chalk.red('✗'), errorMessage(error));
        process.exitCode = 1;
      }
    });
}
