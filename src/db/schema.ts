/**
 * SQLite schema for the trailpace store
 */

export const SCHEMA_VERSION = '001';

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS schema_versions (
  version TEXT PRIMARY KEY,
  applied_at TEXT DEFAULT (datetime('now')),
  description TEXT,
  migration_hash TEXT
);

-- Coefficient overrides: scope 'global' or a user key
CREATE TABLE IF NOT EXISTS prediction_configs (
  scope TEXT PRIMARY KEY,
  config TEXT NOT NULL,
  updated_at TEXT DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS strategies (
  id TEXT PRIMARY KEY,
  title TEXT NOT NULL,
  track_name TEXT,
  target_minutes REAL NOT NULL,
  start_hour REAL NOT NULL,
  fatigue_intensity REAL NOT NULL,
  waypoints TEXT NOT NULL,
  created_at TEXT DEFAULT (datetime('now'))
);

CREATE INDEX IF NOT EXISTS strategies_created_idx ON strategies(created_at);
`;

export const REQUIRED_TABLES = ['schema_versions', 'prediction_configs', 'strategies'] as const;
