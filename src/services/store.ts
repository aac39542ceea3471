import type { Db } from '../db/index.js';
import type { UserInput, UserRow, UserView } from '../models/user.js';
import type { StoryInput, StoryRow, StoryUpdate, StoryView } from '../models/story.js';
import type {
  CommentInput,
  CommentRow,
  CommentUpdate,
  CommentView,
  StoryCommentRow,
} from '../models/comment.js';
import type { RefreshLogInput, RefreshLogRow, RefreshLogView } from '../models/refresh-log.js';

export interface StoreStats {
  users: number;
  stories: number;
  topStories: number;
  comments: number;
  links: number;
  refreshes: number;
  lastRefresh: RefreshLogView | null;
}

interface StoryViewRow extends StoryRow {
  by_username: string | null;
}

interface CommentViewRow extends CommentRow {
  by_username: string | null;
  comment_rank: number | null;
}

const now = (): string => new Date().toISOString();

function toStoryView(row: StoryViewRow): StoryView {
  return {
    id: row.id,
    hn_id: row.hn_id,
    title: row.title,
    url: row.url,
    score: row.score,
    time: row.time,
    by: row.by_username,
    descendants: row.descendants,
    text: row.text,
    type: row.type,
    is_top: row.is_top === 1,
  };
}

function toCommentView(row: CommentViewRow): CommentView {
  return {
    id: row.id,
    hn_id: row.hn_id,
    text: row.text,
    time: row.time,
    by: row.by_username,
    level: row.level,
    parent_id: row.parent_hn_id,
    rank: row.comment_rank,
  };
}

export function toRefreshLogView(row: RefreshLogRow): RefreshLogView {
  return {
    refresh_id: row.id,
    refresh_time: row.refresh_time,
    stories_refreshed: row.stories_refreshed,
    comments_refreshed: row.comments_refreshed,
    status: row.status,
    error_message: row.error_message,
  };
}

export class StoreService {
  constructor(private readonly db: Db) {}

  // User operations
  getUserById(id: number): UserRow | null {
    return this.db.prepare<[number], UserRow>('SELECT * FROM users WHERE id = ?').get(id) ?? null;
  }

  getUserByUsername(username: string): UserRow | null {
    return (
      this.db.prepare<[string], UserRow>('SELECT * FROM users WHERE username = ?').get(username) ??
      null
    );
  }

  createUser(input: UserInput): UserRow {
    const result = this.db
      .prepare<[string, number | null, string | null, string | null, string]>(`
        INSERT INTO users (username, karma, created_time, about, last_updated)
        VALUES (?, ?, ?, ?, ?)
      `)
      .run(
        input.username,
        input.karma ?? null,
        input.created_time ?? null,
        input.about ?? null,
        now()
      );
    return this.requireRow(this.getUserById(Number(result.lastInsertRowid)), 'user');
  }

  getUserView(username: string): UserView | null {
    const user = this.getUserByUsername(username);
    if (!user) return null;
    return {
      id: user.id,
      username: user.username,
      karma: user.karma,
      created_time: user.created_time,
      about: user.about,
    };
  }

  // Story operations
  getStoryById(id: number): StoryRow | null {
    return this.db.prepare<[number], StoryRow>('SELECT * FROM stories WHERE id = ?').get(id) ?? null;
  }

  getStoryByHnId(hnId: number): StoryRow | null {
    return (
      this.db.prepare<[number], StoryRow>('SELECT * FROM stories WHERE hn_id = ?').get(hnId) ?? null
    );
  }

  createStory(input: StoryInput): StoryRow {
    const result = this.db
      .prepare(`
        INSERT INTO stories (
          hn_id, title, url, score, time, by_user_id, descendants, text, type, is_top, last_updated
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        input.hn_id,
        input.title,
        input.url ?? null,
        input.score ?? null,
        input.time ?? null,
        input.by_user_id ?? null,
        input.descendants ?? null,
        input.text ?? null,
        input.type ?? null,
        input.is_top ? 1 : 0,
        now()
      );
    return this.requireRow(this.getStoryById(Number(result.lastInsertRowid)), 'story');
  }

  updateStory(id: number, update: StoryUpdate): StoryRow | null {
    this.db
      .prepare(`
        UPDATE stories
        SET title = ?, url = ?, score = ?, descendants = ?, text = ?, is_top = ?, last_updated = ?
        WHERE id = ?
      `)
      .run(
        update.title,
        update.url,
        update.score,
        update.descendants,
        update.text,
        update.is_top ? 1 : 0,
        now(),
        id
      );
    return this.getStoryById(id);
  }

  /** Clear the top flag everywhere, then set it on exactly `storyIds`. */
  markTopStories(storyIds: number[]): void {
    const timestamp = now();
    const clear = this.db.prepare<[string]>(
      'UPDATE stories SET is_top = 0, last_updated = ? WHERE is_top = 1'
    );
    const mark = this.db.prepare<[string, number]>(
      'UPDATE stories SET is_top = 1, last_updated = ? WHERE id = ?'
    );

    const apply = this.db.transaction((ids: number[]) => {
      clear.run(timestamp);
      for (const id of ids) {
        mark.run(timestamp, id);
      }
    });

    apply(storyIds);
  }

  getTopStories(limit = 5): StoryView[] {
    return this.db
      .prepare<[number], StoryViewRow>(`
        SELECT s.*, u.username AS by_username
        FROM stories s
        LEFT JOIN users u ON s.by_user_id = u.id
        WHERE s.is_top = 1
        ORDER BY s.score DESC, s.id ASC
        LIMIT ?
      `)
      .all(limit)
      .map(toStoryView);
  }

  getStoryView(id: number): StoryView | null {
    const row = this.db
      .prepare<[number], StoryViewRow>(`
        SELECT s.*, u.username AS by_username
        FROM stories s
        LEFT JOIN users u ON s.by_user_id = u.id
        WHERE s.id = ?
      `)
      .get(id);
    return row ? toStoryView(row) : null;
  }

  // Comment operations
  getCommentById(id: number): CommentRow | null {
    return (
      this.db.prepare<[number], CommentRow>('SELECT * FROM comments WHERE id = ?').get(id) ?? null
    );
  }

  getCommentByHnId(hnId: number): CommentRow | null {
    return (
      this.db.prepare<[number], CommentRow>('SELECT * FROM comments WHERE hn_id = ?').get(hnId) ??
      null
    );
  }

  createComment(input: CommentInput): CommentRow {
    const result = this.db
      .prepare(`
        INSERT INTO comments (
          hn_id, text, time, by_user_id, parent_hn_id, level, is_top_level, last_updated
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        input.hn_id,
        input.text ?? null,
        input.time ?? null,
        input.by_user_id ?? null,
        input.parent_hn_id ?? null,
        input.level ?? 0,
        input.is_top_level ? 1 : 0,
        now()
      );
    return this.requireRow(this.getCommentById(Number(result.lastInsertRowid)), 'comment');
  }

  updateComment(id: number, update: CommentUpdate): CommentRow | null {
    this.db
      .prepare(`
        UPDATE comments SET text = ?, level = ?, is_top_level = ?, last_updated = ?
        WHERE id = ?
      `)
      .run(update.text, update.level, update.is_top_level ? 1 : 0, now(), id);
    return this.getCommentById(id);
  }

  linkStoryComment(storyId: number, commentId: number, rank: number): StoryCommentRow {
    const result = this.db
      .prepare<[number, number, number, string]>(`
        INSERT INTO story_comments (story_id, comment_id, comment_rank, refresh_time)
        VALUES (?, ?, ?, ?)
      `)
      .run(storyId, commentId, rank, now());
    const row = this.db
      .prepare<[number], StoryCommentRow>('SELECT * FROM story_comments WHERE id = ?')
      .get(Number(result.lastInsertRowid));
    return this.requireRow(row ?? null, 'story comment link');
  }

  getStoryCommentLinks(storyId: number): StoryCommentRow[] {
    return this.db
      .prepare<[number], StoryCommentRow>(
        'SELECT * FROM story_comments WHERE story_id = ? ORDER BY comment_rank, id'
      )
      .all(storyId);
  }

  getStoryComments(storyId: number, limit = 10): CommentView[] {
    return this.db
      .prepare<[number, number], CommentViewRow>(`
        SELECT c.*, sc.comment_rank, u.username AS by_username
        FROM story_comments sc
        JOIN comments c ON sc.comment_id = c.id
        LEFT JOIN users u ON c.by_user_id = u.id
        WHERE sc.story_id = ?
        ORDER BY sc.comment_rank ASC, sc.id ASC
        LIMIT ?
      `)
      .all(storyId, limit)
      .map(toCommentView);
  }

  // Refresh log operations
  logRefresh(input: RefreshLogInput): RefreshLogRow {
    const result = this.db
      .prepare<[string, number, number, string, string | null]>(`
        INSERT INTO refresh_log (refresh_time, stories_refreshed, comments_refreshed, status, error_message)
        VALUES (?, ?, ?, ?, ?)
      `)
      .run(
        now(),
        input.stories_refreshed,
        input.comments_refreshed,
        input.status,
        input.error_message ?? null
      );
    const row = this.db
      .prepare<[number], RefreshLogRow>('SELECT * FROM refresh_log WHERE id = ?')
      .get(Number(result.lastInsertRowid));
    return this.requireRow(row ?? null, 'refresh log');
  }

  getLastRefresh(): RefreshLogRow | null {
    return (
      this.db
        .prepare<[], RefreshLogRow>('SELECT * FROM refresh_log ORDER BY refresh_time DESC, id DESC LIMIT 1')
        .get() ?? null
    );
  }

  countRefreshes(): number {
    return this.count('SELECT COUNT(*) AS count FROM refresh_log');
  }

  getStats(): StoreStats {
    const last = this.getLastRefresh();
    return {
      users: this.count('SELECT COUNT(*) AS count FROM users'),
      stories: this.count('SELECT COUNT(*) AS count FROM stories'),
      topStories: this.count('SELECT COUNT(*) AS count FROM stories WHERE is_top = 1'),
      comments: this.count('SELECT COUNT(*) AS count FROM comments'),
      links: this.count('SELECT COUNT(*) AS count FROM story_comments'),
      refreshes: this.countRefreshes(),
      lastRefresh: last ? toRefreshLogView(last) : null,
    };
  }

  private count(sql: string): number {
    return this.db.prepare<[], { count: number }>(sql).get()?.count ?? 0;
  }

  private requireRow<T>(row: T | null, kind: string): T {
    if (!row) {
      throw new Error(`Failed to read back ${kind} after insert`);
    }
    return row;
  }
}
