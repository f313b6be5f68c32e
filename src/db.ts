import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import BetterSqlite3 from "better-sqlite3";
import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";

export type Database = BetterSqlite3.Database;

const PRAGMAS = [
  "busy_timeout = 5000",
  "journal_mode = WAL",
  "synchronous = NORMAL",
  "temp_store = DEFAULT",
];

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS images (
  id               INTEGER PRIMARY KEY AUTOINCREMENT,
  name             TEXT NOT NULL,
  path             TEXT NOT NULL,
  size_bytes       INTEGER NOT NULL,
  width            INTEGER NOT NULL DEFAULT 0,
  height           INTEGER NOT NULL DEFAULT 0,
  content_hash     TEXT NOT NULL,
  file_created_at  INTEGER NOT NULL,
  file_modified_at INTEGER NOT NULL,
  date_taken       INTEGER,
  camera_model     TEXT,
  extra_metadata   TEXT,
  scanned_at       INTEGER NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS images_path_idx ON images(path);
CREATE INDEX IF NOT EXISTS images_hash_idx ON images(content_hash);
CREATE INDEX IF NOT EXISTS images_name_idx ON images(name);

CREATE TABLE IF NOT EXISTS processed_files (
  id             INTEGER PRIMARY KEY AUTOINCREMENT,
  path           TEXT NOT NULL,
  content_hash   TEXT NOT NULL,
  last_processed INTEGER NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS processed_files_path_idx ON processed_files(path);
CREATE INDEX IF NOT EXISTS processed_files_hash_idx ON processed_files(content_hash);

CREATE TABLE IF NOT EXISTS meta (
  key   TEXT PRIMARY KEY NOT NULL,
  value TEXT
);
`;

export function getDb(
  dbPath: string,
  { logger }: { logger?: Logger } = {},
): Database {
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const db = new BetterSqlite3(dbPath);
  for (const pragma of PRAGMAS) {
    try {
      db.pragma(pragma);
    } catch (err) {
      // fails when another connection holds the lock
      logger?.debug("pragma not applied", { pragma, error: describeError(err) });
    }
  }
  db.exec(SCHEMA_SQL);
  return db;
}
