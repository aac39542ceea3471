export type RefreshStatus = 'success' | 'error';

export interface RefreshLogRow {
  id: number;
  refresh_time: string;
  stories_refreshed: number;
  comments_refreshed: number;
  status: RefreshStatus;
  error_message: string | null;
}

export interface RefreshLogInput {
  stories_refreshed: number;
  comments_refreshed: number;
  status: RefreshStatus;
  error_message?: string | null;
}

export interface RefreshLogView {
  refresh_id: number | null;
  refresh_time: string;
  stories_refreshed: number;
  comments_refreshed: number;
  status: RefreshStatus;
  error_message: string | null;
}

export interface SystemStatus {
  status: 'ok';
  last_refresh: RefreshLogView | null;
}
