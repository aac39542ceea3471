import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as requestLogger } from 'hono/logger';
import { z } from 'zod';
import { withStore } from '../db/index.js';
import { STORY_COMMENTS_MAX_LIMIT } from '../models/comment.js';
import type { SystemStatus } from '../models/refresh-log.js';
import { TOP_STORIES_MAX_LIMIT } from '../models/story.js';
import type { BackupService } from '../services/backup.js';
import type { RefreshOutcome } from '../services/refresh.js';
import { toRefreshLogView } from '../services/store.js';
import { ConflictError, NotFoundError, ValidationError, errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export interface ApiDeps {
  storePath: string;
  backups: BackupService;
  logger: Logger;
  /** Runs one full refresh cycle; the API never awaits it. */
  startRefresh: () => Promise<RefreshOutcome>;
}

const limitParam = (max: number, fallback: number) =>
  z.coerce.number().int().min(1).max(max).default(fallback);

const storyIdParam = z.coerce.number().int().positive();
const usernameParam = z.string().min(1).max(64);
const backupNameParam = z.string().regex(/^[\w.-]+$/, 'must be a plain file name');

function parseParam<S extends z.ZodTypeAny>(schema: S, value: unknown, name: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? 'invalid value';
    throw new ValidationError(`Invalid ${name}: ${reason}`);
  }
  return result.data;
}

export function createApp(deps: ApiDeps): Hono {
  const app = new Hono();
  const { storePath, backups, logger } = deps;

  app.use('*', cors());
  app.use('*', requestLogger((message, ...rest) => logger.info([message, ...rest].join(' '))));

  app.onError((error, c) => {
    if (error instanceof NotFoundError) {
      return c.json({ detail: error.message }, 404);
    }
    if (error instanceof ValidationError) {
      return c.json({ detail: error.message }, 400);
    }
    if (error instanceof ConflictError) {
      return c.json({ detail: error.message }, 409);
    }
    logger.error(`Unhandled error on ${c.req.method} ${c.req.path}: ${errorMessage(error)}`);
    return c.json({ detail: 'Internal server error' }, 500);
  });

  app.notFound((c) => c.json({ detail: 'Not Found' }, 404));

  app.get('/', (c) => c.json({ message: 'HN mirror read API' }));

  app.get('/health', (c) => c.json({ status: 'ok', now: new Date().toISOString() }));

  // Stories
  app.get('/api/stories/top', async (c) => {
    const limit = parseParam(limitParam(TOP_STORIES_MAX_LIMIT, 5), c.req.query('limit'), 'limit');
    return c.json(await withStore(storePath, (store) => store.getTopStories(limit)));
  });

  app.get('/api/stories/:id', async (c) => {
    const id = parseParam(storyIdParam, c.req.param('id'), 'story id');
    const story = await withStore(storePath, (store) => store.getStoryView(id));
    if (!story) throw new NotFoundError('Story not found');
    return c.json(story);
  });

  app.get('/api/stories/:id/comments', async (c) => {
    const id = parseParam(storyIdParam, c.req.param('id'), 'story id');
    const limit = parseParam(limitParam(STORY_COMMENTS_MAX_LIMIT, 10), c.req.query('limit'), 'limit');
    const comments = await withStore(storePath, (store) => {
      if (!store.getStoryById(id)) throw new NotFoundError('Story not found');
      return store.getStoryComments(id, limit);
    });
    return c.json(comments);
  });

  // Users
  app.get('/api/users/:username', async (c) => {
    const username = parseParam(usernameParam, c.req.param('username'), 'username');
    const user = await withStore(storePath, (store) => store.getUserView(username));
    if (!user) throw new NotFoundError('User not found');
    return c.json(user);
  });

  // System
  app.get('/api/system/status', async (c) => {
    const last = await withStore(storePath, (store) => store.getLastRefresh());
    const status: SystemStatus = { status: 'ok', last_refresh: last ? toRefreshLogView(last) : null };
    return c.json(status);
  });

  app.post('/api/system/refresh', (c) => {
    void deps.startRefresh().then(
      (outcome) => logger.info(`Background refresh finished: ${outcome.status}`),
      (error: unknown) => logger.error(`Background refresh crashed: ${errorMessage(error)}`)
    );
    return c.json({ status: 'refresh_started' });
  });

  app.get('/api/system/backups', (c) => c.json(backups.listBackups()));

  app.post('/api/system/backups', (c) => c.json(backups.createBackup()));

  app.post('/api/system/backups/:filename/restore', (c) => {
    const filename = parseParam(backupNameParam, c.req.param('filename'), 'backup filename');
    return c.json(backups.restoreFromBackup(filename));
  });

  return app;
}
