import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { MONTHS } from "./types.js";

export type MetadataDb = Database.Database;

/**
 * Open (creating if needed) the station metadata database. Pass ":memory:" for a
 * throwaway database. The caller owns the handle and closes it.
 */
export function openMetadataDb(dbPath: string): MetadataDb {
  if (dbPath !== ":memory:") {
    // Ensure parent dir exists
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  if (dbPath !== ":memory:") db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  db.exec(`
CREATE TABLE IF NOT EXISTS station (
  id             INTEGER PRIMARY KEY AUTOINCREMENT,
  usaf_id        TEXT NOT NULL UNIQUE,
  wban_ids       TEXT NOT NULL,  -- comma separated, every WBAN ever paired with this USAF id
  recent_wban_id TEXT NOT NULL,
  name           TEXT,
  icao_code      TEXT,
  latitude       REAL,
  longitude      REAL,
  elevation      REAL,           -- meters
  state          TEXT
);

CREATE TABLE IF NOT EXISTS filecount (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  station_id    INTEGER NOT NULL,
  wban_id       TEXT NOT NULL,
  year          INTEGER NOT NULL,
  ${MONTHS.map((month) => `${month} INTEGER,`).join("\n  ")}
  count         INTEGER,
  n_zero_months INTEGER,
  quality       TEXT,          -- 'low' | 'medium' | 'high'
  UNIQUE(station_id, wban_id, year),
  FOREIGN KEY(station_id) REFERENCES station(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS filecount_station_year ON filecount(station_id, year);
`);

  return db;
}
