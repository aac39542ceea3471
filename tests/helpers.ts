import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { serve } from '@hono/node-server';
import type { Hono } from 'hono';
import { openDb, type Db } from '../src/db/index.js';
import type { HnItem, HnUser } from '../src/models/hn-item.js';
import type { ItemSource } from '../src/services/hn-client.js';
import { StoreService } from '../src/services/store.js';
import { Logger } from '../src/utils/logger.js';

export function quietLogger(): Logger {
  return new Logger({ quiet: true });
}

export function createTempDir(prefix = 'hnm-test-'): { root: string; cleanup: () => void } {
  const root = mkdtempSync(join(tmpdir(), prefix));
  return { root, cleanup: () => rmSync(root, { recursive: true, force: true }) };
}

export function createTestStore(): { root: string; dbPath: string; db: Db; store: StoreService; cleanup: () => void } {
  const { root, cleanup } = createTempDir();
  const dbPath = join(root, 'hackernews.db');
  const db = openDb(dbPath);
  return {
    root,
    dbPath,
    db,
    store: new StoreService(db),
    cleanup: () => {
      db.close();
      cleanup();
    },
  };
}

export function story(id: number, overrides: Partial<Extract<HnItem, { type: 'story' }>> = {}): HnItem {
  return {
    id,
    type: 'story',
    title: `Story ${id}`,
    by: 'alice',
    score: 100,
    time: 1_700_000_000,
    descendants: 0,
    kids: [],
    ...overrides,
  };
}

export function comment(id: number, parent: number, overrides: Partial<Extract<HnItem, { type: 'comment' }>> = {}): HnItem {
  return {
    id,
    type: 'comment',
    parent,
    by: 'bob',
    text: `Comment ${id}`,
    time: 1_700_000_100,
    kids: [],
    ...overrides,
  };
}

/** In-memory stand-in for the remote API. Records every item request. */
export class FakeSource implements ItemSource {
  readonly items = new Map<number, HnItem>();
  readonly users = new Map<string, HnUser>();
  topIds: number[] = [];
  reachable = true;
  readonly requestedItems: number[] = [];
  readonly requestedUsers: string[] = [];

  constructor(items: HnItem[] = [], users: HnUser[] = []) {
    for (const item of items) this.items.set(item.id, item);
    for (const user of users) this.users.set(user.id, user);
  }

  async fetchItem(id: number): Promise<HnItem | null> {
    this.requestedItems.push(id);
    return this.items.get(id) ?? null;
  }

  async fetchUser(username: string): Promise<HnUser | null> {
    this.requestedUsers.push(username);
    return this.users.get(username) ?? null;
  }

  async fetchTopStoryIds(): Promise<number[]> {
    return [...this.topIds];
  }

  async probe(): Promise<boolean> {
    return this.reachable;
  }
}

/** Serve a Hono app on an ephemeral local port for the duration of a test. */
export async function serveApp(app: Hono): Promise<{ url: string; close: () => Promise<void> }> {
  return new Promise((resolve) => {
    const server = serve({ fetch: app.fetch, port: 0, hostname: '127.0.0.1' }, (info) => {
      resolve({
        url: `http://127.0.0.1:${info.port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((error) => (error ? fail(error) : done()));
          }),
      });
    });
  });
}
