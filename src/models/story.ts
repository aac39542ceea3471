/** Largest `limit` the read API takes for the top-stories list. */
export const TOP_STORIES_MAX_LIMIT = 10;

export interface StoryRow {
  id: number;
  hn_id: number;
  title: string;
  url: string | null;
  score: number | null;
  time: string | null;
  by_user_id: number | null;
  descendants: number | null;
  text: string | null;
  type: string | null;
  is_top: number;
  last_updated: string;
}

export interface StoryInput {
  hn_id: number;
  title: string;
  url?: string | null;
  score?: number | null;
  time?: string | null;
  by_user_id?: number | null;
  descendants?: number | null;
  text?: string | null;
  type?: string | null;
  is_top?: boolean;
}

/** Fields a refresh may change on an already stored story. */
export interface StoryUpdate {
  title: string;
  url: string | null;
  score: number | null;
  descendants: number | null;
  text: string | null;
  is_top: boolean;
}

export interface StoryView {
  id: number;
  hn_id: number;
  title: string;
  url: string | null;
  score: number | null;
  time: string | null;
  by: string | null;
  descendants: number | null;
  text: string | null;
  type: string | null;
  is_top: boolean;
}
