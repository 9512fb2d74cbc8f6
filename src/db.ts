import Database from "better-sqlite3";
import fs from "fs";
import path from "path";

export type Db = Database.Database;

/** Opens (creating if needed) the zone database. Pass ":memory:" for a throwaway one. */
export function openDatabase(dbPath: string): Db {
  if (dbPath !== ":memory:") {
    // Ensure parent dir exists
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");

  db.exec(`
CREATE TABLE IF NOT EXISTS zones (
  id                      TEXT PRIMARY KEY,
  name                    TEXT NOT NULL,
  zone_number             INTEGER NOT NULL,
  state                   TEXT,
  boundary                TEXT NOT NULL, -- JSON array of {lat, lng} objects
  is_active               INTEGER NOT NULL DEFAULT 1,
  delivery_fee            INTEGER NOT NULL DEFAULT 25,
  min_order_amount        INTEGER NOT NULL DEFAULT 200,
  estimated_delivery_time TEXT NOT NULL DEFAULT '30-45 mins',
  description             TEXT,
  created_at              INTEGER NOT NULL,
  updated_at              INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_zones_active ON zones(is_active) WHERE is_active = 1;
`);

  return db;
}
