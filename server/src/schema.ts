/**
 * Database Schema Definition
 *
 * This is the single source of truth for the database DDL.
 * Both production (db.ts) and tests apply it through openDatabase(), and
 * db/schema.ts mirrors it as drizzle table objects for queries.
 */

const SCHEMA: string = `
CREATE TABLE IF NOT EXISTS leaderboard (
  track TEXT PRIMARY KEY NOT NULL,
  discord_channel TEXT NOT NULL,
  weather_condition INTEGER NOT NULL,
  weather_temperature REAL NOT NULL,
  weather_rain REAL NOT NULL,
  grip_level INTEGER,
  allowed_classes TEXT NOT NULL DEFAULT '[]',
  show_technical INTEGER NOT NULL DEFAULT 0,
  time_of_day INTEGER NOT NULL DEFAULT 0,
  fixed_setup INTEGER NOT NULL DEFAULT 0,
  created_at TEXT DEFAULT CURRENT_TIMESTAMP,
  updated_at TEXT DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE IF NOT EXISTS lap_time (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  track TEXT NOT NULL,
  driver_id TEXT NOT NULL,
  driver_name TEXT NOT NULL,
  car TEXT NOT NULL,
  car_class TEXT,
  lap_time REAL,
  sector1 REAL,
  sector2 REAL,
  created_at TEXT DEFAULT CURRENT_TIMESTAMP,
  updated_at TEXT DEFAULT CURRENT_TIMESTAMP,
  FOREIGN KEY(track) REFERENCES leaderboard(track),
  UNIQUE(track, driver_id)
);

CREATE TABLE IF NOT EXISTS blacklist (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  driver_id TEXT NOT NULL UNIQUE,
  reason TEXT,
  blacklisted_at TEXT DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE IF NOT EXISTS auth_session (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  driver_id TEXT NOT NULL,
  driver_name TEXT NOT NULL,
  token TEXT NOT NULL UNIQUE,
  created_at TEXT DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_lap_time_track ON lap_time(track, lap_time);
CREATE INDEX IF NOT EXISTS idx_auth_session_driver ON auth_session(driver_id);
`;

export { SCHEMA };
