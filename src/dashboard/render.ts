import chalk from 'chalk';
import type { BackupInfo } from '../models/backup.js';
import type { CommentView } from '../models/comment.js';
import type { SystemStatus } from '../models/refresh-log.js';
import type { StoryView } from '../models/story.js';
import type { UserView } from '../models/user.js';
import { formatDateTime, formatRelativeTime, htmlToText } from '../utils/format.js';

const BODY_INDENT = '     ';

export function renderStoryCard(story: StoryView, now: Date = new Date()): string {
  const lines = [`${chalk.cyan(String(story.id).padStart(4))} ${chalk.bold(story.title)}`];

  if (story.url) {
    lines.push(`${BODY_INDENT}${chalk.blue(story.url)}`);
  }

  const meta = [
    `by ${story.by ?? 'unknown'}`,
    formatRelativeTime(story.time, now),
    `${story.descendants ?? 0} comments`,
  ].join(' • ');
  lines.push(`${BODY_INDENT}${chalk.yellow(`${story.score ?? 0} points`)} ${meta}`);

  if (story.text) {
    for (const line of htmlToText(story.text).split('\n')) {
      lines.push(`${BODY_INDENT}${chalk.dim(line)}`);
    }
  }

  return lines.join('\n');
}

/**
 * Nest comments under their parent when the parent is among `comments`,
 * keeping the given (rank) order within each level.
 */
export function renderCommentThread(comments: CommentView[], now: Date = new Date()): string {
  const byHnId = new Map(comments.map((comment) => [comment.hn_id, comment]));
  const children = new Map<number, CommentView[]>();
  const roots: CommentView[] = [];

  for (const comment of comments) {
    const parent = comment.parent_id === null ? undefined : byHnId.get(comment.parent_id);
    if (parent && parent !== comment) {
      const siblings = children.get(parent.hn_id) ?? [];
      siblings.push(comment);
      children.set(parent.hn_id, siblings);
    } else {
      roots.push(comment);
    }
  }

  const blocks: string[] = [];
  const seen = new Set<number>();

  const visit = (comment: CommentView, depth: number): void => {
    if (seen.has(comment.hn_id)) return;
    seen.add(comment.hn_id);

    const indent = '  '.repeat(depth);
    const header = `${indent}${chalk.bold(comment.by ?? 'unknown')} • ${chalk.dim(formatRelativeTime(comment.time, now))}`;
    const body = comment.text
      ? htmlToText(comment.text)
          .split('\n')
          .map((line) => `${indent}  ${line}`)
      : [`${indent}  ${chalk.italic('[deleted]')}`];
    blocks.push([header, ...body].join('\n'));

    for (const child of children.get(comment.hn_id) ?? []) {
      visit(child, depth + 1);
    }
  };

  for (const root of roots) {
    visit(root, 0);
  }

  return blocks.join('\n\n');
}

export function renderSystemStatus(status: SystemStatus | null): string {
  const lines = [status ? chalk.green('System: Online') : chalk.red('System: Offline')];
  const last = status?.last_refresh;

  if (!last) {
    lines.push(chalk.dim('No refresh data available'));
    return lines.join('\n');
  }

  const state = last.status === 'success' ? chalk.green(last.status) : chalk.red(last.status);
  lines.push(`Last refresh: ${formatDateTime(last.refresh_time)} (${state})`);
  lines.push(`Stories: ${last.stories_refreshed}`);
  lines.push(`Comments: ${last.comments_refreshed}`);
  if (last.error_message) {
    lines.push(chalk.red(`Error: ${last.error_message}`));
  }
  return lines.join('\n');
}

export function renderUser(user: UserView): string {
  const lines = [
    chalk.bold(user.username),
    `  Karma:   ${chalk.yellow(user.karma ?? 'unknown')}`,
    `  Created: ${formatDateTime(user.created_time)}`,
  ];
  if (user.about) {
    lines.push(`  About:   ${htmlToText(user.about)}`);
  }
  return lines.join('\n');
}

export function renderBackupList(backups: BackupInfo[]): string {
  if (backups.length === 0) return chalk.gray('No backups yet');
  return backups
    .map(
      (info) =>
        `${chalk.cyan(info.filename)}  ${chalk.gray(formatDateTime(info.created_at))}  ${(info.size_bytes / 1024).toFixed(1)} KB`
    )
    .join('\n');
}
