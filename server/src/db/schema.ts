export const SCHEMA_VERSION = 1;

export const CREATE_TABLES = `
-- Schema version tracking
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER NOT NULL
);

-- Players, identity plus per-game counters
CREATE TABLE IF NOT EXISTS players (
  device_id       TEXT PRIMARY KEY,
  nickname        TEXT NOT NULL DEFAULT '',
  name            TEXT NOT NULL,
  profile_pic     TEXT,
  role            TEXT NOT NULL DEFAULT 'unassigned',
  team            TEXT,
  physical_tag    INTEGER NOT NULL DEFAULT 0,
  photo_visible   INTEGER NOT NULL DEFAULT 1,
  location_share  INTEGER NOT NULL DEFAULT 1,
  captures        INTEGER NOT NULL DEFAULT 0,
  escapes         INTEGER NOT NULL DEFAULT 0,
  times_captured  INTEGER NOT NULL DEFAULT 0,
  sightings       INTEGER NOT NULL DEFAULT 0,
  infections      INTEGER NOT NULL DEFAULT 0,
  bonus_points    INTEGER NOT NULL DEFAULT 0,
  achievements    TEXT NOT NULL DEFAULT '[]',
  sighted_targets TEXT NOT NULL DEFAULT '[]',
  joined_at       INTEGER NOT NULL,
  last_seen_at    INTEGER NOT NULL
);

-- Safe-zone beacons
CREATE TABLE IF NOT EXISTS beacons (
  beacon_id TEXT PRIMARY KEY,
  name      TEXT NOT NULL,
  rssi      INTEGER NOT NULL,
  active    INTEGER NOT NULL DEFAULT 1
);

-- Bounties keyed by target
CREATE TABLE IF NOT EXISTS bounties (
  target_id TEXT PRIMARY KEY,
  points    INTEGER NOT NULL,
  reason    TEXT NOT NULL DEFAULT '',
  set_at    INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS moderators (
  device_id TEXT PRIMARY KEY
);

-- Single row: mode and settings
CREATE TABLE IF NOT EXISTS game_config (
  id                   INTEGER PRIMARY KEY CHECK (id = 1),
  mode                 TEXT NOT NULL,
  duration_minutes     INTEGER NOT NULL,
  countdown_seconds    INTEGER NOT NULL,
  honor_system         INTEGER NOT NULL DEFAULT 0,
  allow_role_change    INTEGER NOT NULL DEFAULT 0,
  capture_rssi         INTEGER NOT NULL,
  safezone_rssi        INTEGER NOT NULL,
  proximity_alert_rssi INTEGER NOT NULL,
  team_red             INTEGER NOT NULL DEFAULT 0,
  team_blue            INTEGER NOT NULL DEFAULT 0,
  saved_at             INTEGER NOT NULL
);
`;
