import fetch from 'node-fetch';
import { z } from 'zod';
import type { BackupInfo, RestoreResult } from '../models/backup.js';
import type { CommentView } from '../models/comment.js';
import type { SystemStatus } from '../models/refresh-log.js';
import type { StoryView } from '../models/story.js';
import type { UserView } from '../models/user.js';

export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

const storyViewSchema: z.ZodType<StoryView> = z.object({
  id: z.number(),
  hn_id: z.number(),
  title: z.string(),
  url: z.string().nullable(),
  score: z.number().nullable(),
  time: z.string().nullable(),
  by: z.string().nullable(),
  descendants: z.number().nullable(),
  text: z.string().nullable(),
  type: z.string().nullable(),
  is_top: z.boolean(),
});

const commentViewSchema: z.ZodType<CommentView> = z.object({
  id: z.number(),
  hn_id: z.number(),
  text: z.string().nullable(),
  time: z.string().nullable(),
  by: z.string().nullable(),
  level: z.number(),
  parent_id: z.number().nullable(),
  rank: z.number().nullable(),
});

const userViewSchema: z.ZodType<UserView> = z.object({
  id: z.number(),
  username: z.string(),
  karma: z.number().nullable(),
  created_time: z.string().nullable(),
  about: z.string().nullable(),
});

const systemStatusSchema: z.ZodType<SystemStatus> = z.object({
  status: z.literal('ok'),
  last_refresh: z
    .object({
      refresh_id: z.number().nullable(),
      refresh_time: z.string(),
      stories_refreshed: z.number(),
      comments_refreshed: z.number(),
      status: z.enum(['success', 'error']),
      error_message: z.string().nullable(),
    })
    .nullable(),
});

const backupInfoSchema: z.ZodType<BackupInfo> = z.object({
  filename: z.string(),
  path: z.string(),
  timestamp: z.string(),
  created_at: z.string(),
  size_bytes: z.number(),
});

const restoreResultSchema: z.ZodType<RestoreResult> = z.object({
  success: z.literal(true),
  restored_from: z.string(),
  restored_at: z.string(),
  safety_backup: z.string().nullable(),
});

const refreshStartedSchema = z.object({ status: z.literal('refresh_started') });

const errorBodySchema = z.object({ detail: z.string() });

/** HTTP client for the read API, used by the terminal dashboard. */
export class DashboardClient {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly timeoutMs = 10_000
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  getTopStories(limit = 5): Promise<StoryView[]> {
    return this.request(z.array(storyViewSchema), `/stories/top?limit=${limit}`);
  }

  getStory(id: number): Promise<StoryView> {
    return this.request(storyViewSchema, `/stories/${id}`);
  }

  getStoryComments(id: number, limit = 10): Promise<CommentView[]> {
    return this.request(z.array(commentViewSchema), `/stories/${id}/comments?limit=${limit}`);
  }

  getUser(username: string): Promise<UserView> {
    return this.request(userViewSchema, `/users/${encodeURIComponent(username)}`);
  }

  getSystemStatus(): Promise<SystemStatus> {
    return this.request(systemStatusSchema, '/system/status');
  }

  async triggerRefresh(): Promise<void> {
    await this.request(refreshStartedSchema, '/system/refresh', 'POST');
  }

  listBackups(): Promise<BackupInfo[]> {
    return this.request(z.array(backupInfoSchema), '/system/backups');
  }

  createBackup(): Promise<BackupInfo> {
    return this.request(backupInfoSchema, '/system/backups', 'POST');
  }

  restoreBackup(filename: string): Promise<RestoreResult> {
    return this.request(
      restoreResultSchema,
      `/system/backups/${encodeURIComponent(filename)}/restore`,
      'POST'
    );
  }

  private async request<T>(
    schema: z.ZodType<T>,
    path: string,
    method: 'GET' | 'POST' = 'GET'
  ): Promise<T> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      signal: AbortSignal.timeout(this.timeoutMs),
      headers: { Accept: 'application/json' },
    });
    const body: unknown = await response.json().catch(() => null);

    if (!response.ok) {
      const parsed = errorBodySchema.safeParse(body);
      throw new ApiError(
        response.status,
        parsed.success ? parsed.data.detail : `HTTP ${response.status}: ${response.statusText}`
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      throw new ApiError(response.status, `Unexpected response from ${path}`);
    }
    return result.data;
  }
}
