import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { Hono } from 'hono';
import { HnClient } from '../src/services/hn-client.js';
import { quietLogger, serveApp } from './helpers.js';

const items: Record<string, unknown> = {
  '1': { id: 1, type: 'story', by: 'alice', time: 1_700_000_000, score: 5, kids: [11] },
  '11': { id: 11, type: 'comment', by: 'bob', parent: 1, text: 'hi', time: 1_700_000_100 },
  '12': { id: 12, type: 'job', title: 'Hiring' },
  '13': { id: 13, type: 'story', title: 42 },
  '14': null,
  '15': { id: 15, type: 'story', title: 'Far future', time: 10_000_000_000_000 },
};

function createFakeHn(): Hono {
  const app = new Hono();
  app.get('/topstories.json', (c) => c.json([1, 2, 3, 4, 5, 6, 7]));
  app.get('/item/:file', async (c) => {
    const id = c.req.param('file').replace(/\.json$/, '');
    if (id === '500') return c.json({ error: 'boom' }, 500);
    if (id === '777') {
      await new Promise((resolve) => setTimeout(resolve, 1000));
    }
    return c.body(JSON.stringify(id in items ? items[id] : null), 200, { 'Content-Type': 'application/json' });
  });
  app.get('/user/:file', (c) => {
    const name = decodeURIComponent(c.req.param('file').replace(/\.json$/, ''));
    if (name === 'alice') return c.json({ id: 'alice', karma: 10, created: 1_600_000_000 });
    if (name === 'carol') return c.json({ karma: 42, created: 1_600_000_000, about: 'hi' });
    return c.json(null);
  });
  return app;
}

describe('HnClient', () => {
  let server: { url: string; close: () => Promise<void> };
  let client: HnClient;
  const logger = quietLogger();

  beforeAll(async () => {
    server = await serveApp(createFakeHn());
    client = new HnClient({ baseUrl: `${server.url}/`, timeoutMs: 200, topStoriesLimit: 3 }, logger);
  });

  afterAll(async () => {
    client.close();
    await server.close();
  });

  it('returns the first ids of the top list up to the limit', async () => {
    expect(await client.fetchTopStoryIds()).toEqual([1, 2, 3]);
  });

  it('parses a story and fills defaults', async () => {
    const item = await client.fetchItem(1);
    expect(item).toEqual({
      id: 1,
      type: 'story',
      by: 'alice',
      time: 1_700_000_000,
      score: 5,
      kids: [11],
      title: '',
    });
  });

  it('parses a comment with its parent', async () => {
    const item = await client.fetchItem(11);
    expect(item?.type).toBe('comment');
    expect(item).toMatchObject({ parent: 1, text: 'hi', kids: [] });
  });

  it('accepts item types the pipeline does not store', async () => {
    expect((await client.fetchItem(12))?.type).toBe('job');
  });

  it('returns null for an item that does not exist', async () => {
    expect(await client.fetchItem(14)).toBeNull();
    expect(await client.fetchItem(999)).toBeNull();
  });

  it('returns null and logs when the item is malformed', async () => {
    const error = vi.spyOn(logger, 'error');
    expect(await client.fetchItem(13)).toBeNull();
    expect(error).toHaveBeenCalledWith('Error fetching item 13: Malformed response for item 13: title: Expected string, received number');
    error.mockRestore();
  });

  it('rejects an item whose time is outside the date range', async () => {
    const error = vi.spyOn(logger, 'error');
    expect(await client.fetchItem(15)).toBeNull();
    expect(error).toHaveBeenCalledWith(
      'Error fetching item 15: Malformed response for item 15: time: Number must be less than or equal to 8640000000000'
    );
    error.mockRestore();
  });

  it('returns null and logs on an HTTP error', async () => {
    const error = vi.spyOn(logger, 'error');
    expect(await client.fetchItem(500)).toBeNull();
    expect(error).toHaveBeenCalledWith('Error fetching item 500: HTTP 500: Internal Server Error');
    error.mockRestore();
  });

  it('fetches a user profile', async () => {
    expect(await client.fetchUser('alice')).toEqual({ id: 'alice', karma: 10, created: 1_600_000_000 });
    expect(await client.fetchUser('nobody')).toBeNull();
  });

  it('parses a profile body that carries no id', async () => {
    expect(await client.fetchUser('carol')).toEqual({ karma: 42, created: 1_600_000_000, about: 'hi' });
  });

  it('reports reachability with a HEAD request', async () => {
    expect(await client.probe()).toBe(true);
  });

  it('gives up on a slow response after the timeout', async () => {
    const slow = new HnClient({ baseUrl: server.url, timeoutMs: 100, topStoriesLimit: 3 }, logger);
    const error = vi.spyOn(logger, 'error');
    try {
      expect(await slow.fetchItem(777)).toBeNull();
      expect(error).toHaveBeenCalledWith('Error fetching item 777: Timed out after 100ms');
    } finally {
      error.mockRestore();
      slow.close();
    }
  });
});

describe('HnClient against a failing remote', () => {
  let server: { url: string; close: () => Promise<void> };
  let client: HnClient;

  beforeAll(async () => {
    const app = new Hono();
    app.all('*', (c) => c.json({ error: 'down' }, 503));
    server = await serveApp(app);
    client = new HnClient({ baseUrl: server.url, timeoutMs: 1000, topStoriesLimit: 5 }, quietLogger());
  });

  afterAll(async () => {
    client.close();
    await server.close();
  });

  it('returns an empty top list', async () => {
    expect(await client.fetchTopStoryIds()).toEqual([]);
  });

  it('fails the probe', async () => {
    expect(await client.probe()).toBe(false);
  });
});
