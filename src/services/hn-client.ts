import fetch from 'node-fetch';
import { Agent as HttpAgent } from 'http';
import { Agent as HttpsAgent } from 'https';
import { HttpsProxyAgent } from 'https-proxy-agent';
import type { z } from 'zod';
import {
  hnItemSchema,
  hnUserSchema,
  itemIdListSchema,
  type HnItem,
  type HnUser,
} from '../models/hn-item.js';
import { RemoteDataError, errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

/** What the refresh pipeline needs from the remote API. */
export interface ItemSource {
  fetchItem(id: number): Promise<HnItem | null>;
  fetchUser(username: string): Promise<HnUser | null>;
  fetchTopStoryIds(): Promise<number[]>;
  probe(): Promise<boolean>;
}

export interface HnClientOptions {
  baseUrl: string;
  timeoutMs: number;
  topStoriesLimit: number;
  proxyUrl?: string;
}

function createAgent(options: HnClientOptions): HttpAgent {
  if (new URL(options.baseUrl).protocol === 'http:') {
    return new HttpAgent({ keepAlive: true });
  }
  if (options.proxyUrl) {
    return new HttpsProxyAgent(options.proxyUrl, { keepAlive: true });
  }
  return new HttpsAgent({ keepAlive: true });
}

export class HnClient implements ItemSource {
  private readonly agent: HttpAgent;
  private readonly baseUrl: string;

  constructor(
    private readonly options: HnClientOptions,
    private readonly logger: Logger
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.agent = createAgent(options);
  }

  async fetchItem(id: number): Promise<HnItem | null> {
    try {
      const body = await this.request(`/item/${id}.json`);
      if (body === null) {
        this.logger.debug(`Item ${id} does not exist upstream`);
        return null;
      }
      return this.parse(hnItemSchema, body, `item ${id}`);
    } catch (error) {
      this.logger.error(`Error fetching item ${id}: ${errorMessage(error)}`);
      return null;
    }
  }

  async fetchUser(username: string): Promise<HnUser | null> {
    try {
      const body = await this.request(`/user/${encodeURIComponent(username)}.json`);
      if (body === null) {
        this.logger.debug(`User ${username} does not exist upstream`);
        return null;
      }
      return this.parse(hnUserSchema, body, `user ${username}`);
    } catch (error) {
      this.logger.error(`Error fetching user ${username}: ${errorMessage(error)}`);
      return null;
    }
  }

  async fetchTopStoryIds(): Promise<number[]> {
    try {
      const body = await this.request('/topstories.json');
      const ids = this.parse(itemIdListSchema, body, 'top stories');
      return ids.slice(0, this.options.topStoriesLimit);
    } catch (error) {
      this.logger.error(`Error fetching top stories: ${errorMessage(error)}`);
      return [];
    }
  }

  async probe(): Promise<boolean> {
    try {
      await this.request('/topstories.json', 'HEAD');
      return true;
    } catch (error) {
      this.logger.debug(`Reachability probe failed: ${errorMessage(error)}`);
      return false;
    }
  }

  /** Release pooled sockets. The client is unusable afterwards. */
  close(): void {
    this.agent.destroy();
  }

  private async request(path: string, method: 'GET' | 'HEAD' = 'GET'): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method,
        agent: this.agent,
        signal: controller.signal,
        headers: {
          'User-Agent': 'hn-mirror/1.0',
          Accept: 'application/json',
        },
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
      }
      if (method === 'HEAD') return null;
      return await response.json();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`Timed out after ${this.options.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  private parse<S extends z.ZodTypeAny>(schema: S, body: unknown, resource: string): z.output<S> {
    const result = schema.safeParse(body);
    if (!result.success) {
      const detail = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new RemoteDataError(resource, detail);
    }
    return result.data;
  }
}
