import { dirname } from 'path';
import { openDb, type Db } from '../db/index.js';
import { unixToIso, type StoryItem } from '../models/hn-item.js';
import type { RefreshLogInput, RefreshLogView } from '../models/refresh-log.js';
import { resolveStorePath, type AppConfig } from '../utils/config.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { HnClient, type ItemSource } from './hn-client.js';
import { runPreflightChecks } from './preflight.js';
import { StoreService, toRefreshLogView } from './store.js';

export const TOP_STORIES_FAILED = 'Failed to fetch top stories';

export type RefreshOutcome = RefreshLogView;

export interface RefreshPipelineConfig {
  store: StoreService;
  source: ItemSource;
  logger: Logger;
  dataDir: string;
  storePath: string;
  topCommentsLimit: number;
  minFreeDiskPercent: number;
}

interface ResolvedStory {
  storyId: number;
  item: StoryItem;
}

export class RefreshPipeline {
  private readonly store: StoreService;
  private readonly source: ItemSource;
  private readonly logger: Logger;

  constructor(private readonly config: RefreshPipelineConfig) {
    this.store = config.store;
    this.source = config.source;
    this.logger = config.logger;
  }

  /**
   * One refresh cycle. Always attempts to leave exactly one refresh_log row
   * and never rejects; rows written before a failure stay written.
   */
  async run(): Promise<RefreshOutcome> {
    try {
      this.logger.info('Starting data refresh');

      const preflightError = await runPreflightChecks({
        dataDir: this.config.dataDir,
        storePath: this.config.storePath,
        minFreeDiskPercent: this.config.minFreeDiskPercent,
        source: this.source,
      });
      if (preflightError) {
        this.logger.error(`Pre-flight check failed: ${preflightError}`);
        return this.finish({ stories_refreshed: 0, comments_refreshed: 0, status: 'error', error_message: preflightError });
      }

      const topStoryIds = await this.source.fetchTopStoryIds();
      if (topStoryIds.length === 0) {
        return this.finish({
          stories_refreshed: 0,
          comments_refreshed: 0,
          status: 'error',
          error_message: TOP_STORIES_FAILED,
        });
      }
      this.logger.debug(`Top story ids: ${topStoryIds.join(', ')}`);

      const resolved: ResolvedStory[] = [];
      for (const hnId of topStoryIds) {
        const story = await this.processStory(hnId);
        if (story) resolved.push(story);
      }

      this.store.markTopStories(resolved.map((story) => story.storyId));

      let totalComments = 0;
      for (const story of resolved) {
        totalComments += await this.processStoryComments(story);
      }

      return this.finish({
        stories_refreshed: resolved.length,
        comments_refreshed: totalComments,
        status: 'success',
      });
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Error refreshing data: ${message}`);
      return this.finish({ stories_refreshed: 0, comments_refreshed: 0, status: 'error', error_message: message });
    }
  }

  /** Reuse a stored author, else create one from the remote profile, else a bare row. */
  async resolveUser(username: string | undefined): Promise<number | null> {
    if (!username) return null;

    const existing = this.store.getUserByUsername(username);
    if (existing) return existing.id;

    const profile = await this.source.fetchUser(username);
    if (!profile) {
      return this.store.createUser({ username }).id;
    }

    return this.store.createUser({
      username,
      karma: profile.karma ?? null,
      created_time: unixToIso(profile.created),
      about: profile.about ?? null,
    }).id;
  }

  private async processStory(hnId: number): Promise<ResolvedStory | null> {
    const item = await this.source.fetchItem(hnId);
    if (!item || item.type !== 'story') {
      this.logger.warn(`Item ${hnId} is not a valid story`);
      return null;
    }

    const byUserId = await this.resolveUser(item.by);

    const existing = this.store.getStoryByHnId(hnId);
    if (existing) {
      this.store.updateStory(existing.id, {
        title: item.title,
        url: item.url ?? null,
        score: item.score ?? null,
        descendants: item.descendants ?? null,
        text: item.text ?? null,
        is_top: true,
      });
      return { storyId: existing.id, item };
    }

    const created = this.store.createStory({
      hn_id: hnId,
      title: item.title,
      url: item.url ?? null,
      score: item.score ?? null,
      time: unixToIso(item.time),
      by_user_id: byUserId,
      descendants: item.descendants ?? null,
      text: item.text ?? null,
      type: item.type,
      is_top: true,
    });
    return { storyId: created.id, item };
  }

  private async processStoryComments(story: ResolvedStory): Promise<number> {
    const commentIds = story.item.kids.slice(0, this.config.topCommentsLimit);
    let processed = 0;

    for (const [rank, hnId] of commentIds.entries()) {
      const commentId = await this.processComment(hnId);
      if (commentId === null) continue;
      this.store.linkStoryComment(story.storyId, commentId, rank);
      processed++;
    }

    this.logger.debug(`Story ${story.item.id}: ${processed}/${commentIds.length} comments stored`);
    return processed;
  }

  private async processComment(hnId: number): Promise<number | null> {
    const item = await this.source.fetchItem(hnId);
    if (!item || item.type !== 'comment') {
      this.logger.warn(`Item ${hnId} is not a valid comment`);
      return null;
    }

    const byUserId = await this.resolveUser(item.by);

    // Only root comments are ingested, so level stays 0.
    const existing = this.store.getCommentByHnId(hnId);
    if (existing) {
      this.store.updateComment(existing.id, { text: item.text ?? null, level: 0, is_top_level: true });
      return existing.id;
    }

    return this.store.createComment({
      hn_id: hnId,
      text: item.text ?? null,
      time: unixToIso(item.time),
      by_user_id: byUserId,
      parent_hn_id: item.parent ?? null,
      level: 0,
      is_top_level: true,
    }).id;
  }

  private finish(entry: RefreshLogInput): RefreshOutcome {
    try {
      const row = this.store.logRefresh(entry);
      if (row.status === 'success') {
        this.logger.success(
          `Data refresh completed: ${row.stories_refreshed} stories, ${row.comments_refreshed} comments`
        );
      } else {
        this.logger.error(`Data refresh failed: ${row.error_message ?? 'unknown error'}`);
      }
      return toRefreshLogView(row);
    } catch (error) {
      this.logger.error(`Could not write refresh log: ${errorMessage(error)}`);
      return unloggedOutcome(entry);
    }
  }
}

function unloggedOutcome(entry: RefreshLogInput): RefreshOutcome {
  return {
    refresh_id: null,
    refresh_time: new Date().toISOString(),
    stories_refreshed: entry.stories_refreshed,
    comments_refreshed: entry.comments_refreshed,
    status: entry.status,
    error_message: entry.error_message ?? null,
  };
}

/**
 * Run one cycle with a remote client and a store connection scoped to it;
 * both are released when the cycle ends, whatever the outcome.
 */
export async function runRefreshCycle(config: AppConfig, logger: Logger): Promise<RefreshOutcome> {
  const client = new HnClient(
    {
      baseUrl: config.HN_API_URL,
      timeoutMs: config.REQUEST_TIMEOUT_MS,
      topStoriesLimit: config.TOP_STORIES_LIMIT,
      proxyUrl: config.PROXY_URL,
    },
    logger.child('hn-client')
  );
  let db: Db | null = null;

  try {
    const storePath = resolveStorePath(config.DATABASE_URL);
    db = openDb(storePath);
    const pipeline = new RefreshPipeline({
      store: new StoreService(db),
      source: client,
      logger,
      dataDir: dirname(storePath),
      storePath,
      topCommentsLimit: config.TOP_COMMENTS_LIMIT,
      minFreeDiskPercent: config.MIN_FREE_DISK_PERCENT,
    });
    return await pipeline.run();
  } catch (error) {
    const message = errorMessage(error);
    logger.error(`Refresh could not start: ${message}`);
    return unloggedOutcome({ stories_refreshed: 0, comments_refreshed: 0, status: 'error', error_message: message });
  } finally {
    client.close();
    db?.close();
  }
}
