export const SCHEMA = `
-- Authors, created the first time a story or comment references them
CREATE TABLE IF NOT EXISTS users (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  username TEXT NOT NULL UNIQUE,
  karma INTEGER,
  created_time DATETIME,
  about TEXT,
  last_updated DATETIME NOT NULL
);

CREATE TABLE IF NOT EXISTS stories (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  hn_id INTEGER NOT NULL UNIQUE,
  title TEXT NOT NULL,
  url TEXT,
  score INTEGER,
  time DATETIME,
  by_user_id INTEGER,
  descendants INTEGER,            -- remote comment count, not rows stored here
  text TEXT,                      -- self posts only
  type TEXT,
  is_top INTEGER NOT NULL DEFAULT 0,
  last_updated DATETIME NOT NULL,
  FOREIGN KEY (by_user_id) REFERENCES users(id)
);

CREATE TABLE IF NOT EXISTS comments (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  hn_id INTEGER NOT NULL UNIQUE,
  text TEXT,                      -- NULL when deleted upstream
  time DATETIME,
  by_user_id INTEGER,
  parent_hn_id INTEGER,           -- remote id, informational only
  level INTEGER NOT NULL DEFAULT 0,
  is_top_level INTEGER NOT NULL DEFAULT 0,
  last_updated DATETIME NOT NULL,
  FOREIGN KEY (by_user_id) REFERENCES users(id)
);

-- One row per (story, comment) link written by a refresh; not unique per pair
CREATE TABLE IF NOT EXISTS story_comments (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  story_id INTEGER NOT NULL,
  comment_id INTEGER NOT NULL,
  comment_rank INTEGER,
  refresh_time DATETIME NOT NULL,
  FOREIGN KEY (story_id) REFERENCES stories(id),
  FOREIGN KEY (comment_id) REFERENCES comments(id)
);

CREATE TABLE IF NOT EXISTS refresh_log (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  refresh_time DATETIME NOT NULL,
  stories_refreshed INTEGER NOT NULL DEFAULT 0,
  comments_refreshed INTEGER NOT NULL DEFAULT 0,
  status TEXT NOT NULL CHECK (status IN ('success', 'error')),
  error_message TEXT
);

CREATE INDEX IF NOT EXISTS idx_stories_is_top ON stories(is_top);
CREATE INDEX IF NOT EXISTS idx_stories_score ON stories(score);
CREATE INDEX IF NOT EXISTS idx_story_comments_story_rank ON story_comments(story_id, comment_rank);
CREATE INDEX IF NOT EXISTS idx_refresh_log_time ON refresh_log(refresh_time);
`;
