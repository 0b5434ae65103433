export const SCHEMA_VERSION = '1';

export const PRAGMA_SQL = `
PRAGMA journal_mode = WAL;
PRAGMA busy_timeout = 5000;
PRAGMA synchronous = NORMAL;
PRAGMA foreign_keys = ON;
`;

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS schema_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS source_files (
  source_file_id INTEGER PRIMARY KEY,
  source TEXT NOT NULL,
  header_version INTEGER,
  format_version INTEGER NOT NULL,
  session_kind TEXT NOT NULL CHECK(session_kind IN ('session','tabs')),
  finalization TEXT NOT NULL
    CHECK(finalization IN ('EndOfStream','TruncatedRecord','ToleranceExceeded')),
  records_read INTEGER NOT NULL,
  commands_applied INTEGER NOT NULL,
  bytes_consumed INTEGER NOT NULL,
  active_window_id INTEGER,
  exported_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS windows (
  source_file_id INTEGER NOT NULL,
  window_id INTEGER NOT NULL,
  ordinal INTEGER NOT NULL,
  window_type INTEGER,
  x INTEGER,
  y INTEGER,
  width INTEGER,
  height INTEGER,
  show_state TEXT,
  selected_tab_index INTEGER,
  selected_tab_id INTEGER,
  app_name TEXT,
  closed INTEGER NOT NULL DEFAULT 0,
  closed_at TEXT,
  PRIMARY KEY(source_file_id, window_id),
  FOREIGN KEY(source_file_id) REFERENCES source_files(source_file_id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS tabs (
  source_file_id INTEGER NOT NULL,
  tab_id INTEGER NOT NULL,
  ordinal INTEGER NOT NULL,
  window_id INTEGER,
  index_in_window INTEGER,
  active_navigation_index INTEGER,
  pinned INTEGER NOT NULL DEFAULT 0,
  extension_app_id TEXT,
  user_agent_override TEXT,
  session_storage_id TEXT,
  last_active_time TEXT,
  closed INTEGER NOT NULL DEFAULT 0,
  closed_at TEXT,
  PRIMARY KEY(source_file_id, tab_id),
  FOREIGN KEY(source_file_id) REFERENCES source_files(source_file_id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS navigations (
  navigation_id INTEGER PRIMARY KEY,
  source_file_id INTEGER NOT NULL,
  tab_id INTEGER NOT NULL,
  nav_index INTEGER NOT NULL,
  pruned INTEGER NOT NULL DEFAULT 0,
  url TEXT,
  title TEXT,
  referrer TEXT,
  timestamp TEXT,
  transition_type TEXT NOT NULL,
  transition_raw INTEGER NOT NULL,
  search_terms TEXT,
  http_status_code INTEGER,
  original_request_url TEXT,
  has_post_data INTEGER NOT NULL DEFAULT 0,
  is_overwrite INTEGER NOT NULL DEFAULT 0,
  page_state_size INTEGER NOT NULL DEFAULT 0,
  has_form_state INTEGER NOT NULL DEFAULT 0,
  page_state_error TEXT,
  FOREIGN KEY(source_file_id) REFERENCES source_files(source_file_id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS diagnostics (
  diagnostic_id INTEGER PRIMARY KEY,
  source_file_id INTEGER NOT NULL,
  kind TEXT NOT NULL CHECK(kind IN ('TruncatedRecord','UnknownCommand','MalformedCommand')),
  byte_offset INTEGER NOT NULL,
  command_id INTEGER,
  detail TEXT NOT NULL,
  FOREIGN KEY(source_file_id) REFERENCES source_files(source_file_id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_navigations_tab ON navigations(source_file_id, tab_id);
CREATE INDEX IF NOT EXISTS idx_diagnostics_source ON diagnostics(source_file_id);
`;
