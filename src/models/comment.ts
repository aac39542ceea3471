/** Largest `limit` the read API takes for a story's comments. */
export const STORY_COMMENTS_MAX_LIMIT = 20;

export interface CommentRow {
  id: number;
  hn_id: number;
  text: string | null;
  time: string | null;
  by_user_id: number | null;
  parent_hn_id: number | null;
  level: number;
  is_top_level: number;
  last_updated: string;
}

export interface CommentInput {
  hn_id: number;
  text?: string | null;
  time?: string | null;
  by_user_id?: number | null;
  parent_hn_id?: number | null;
  level?: number;
  is_top_level?: boolean;
}

export interface CommentUpdate {
  text: string | null;
  level: number;
  is_top_level: boolean;
}

export interface StoryCommentRow {
  id: number;
  story_id: number;
  comment_id: number;
  comment_rank: number | null;
  refresh_time: string;
}

export interface CommentView {
  id: number;
  hn_id: number;
  text: string | null;
  time: string | null;
  by: string | null;
  level: number;
  parent_id: number | null;
  rank: number | null;
}
