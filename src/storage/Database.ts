import Database from "better-sqlite3";

export function initializeDatabase(dbPath: string): Database.Database {
  const db = new Database(dbPath);

  db.pragma("journal_mode = WAL");

  db.exec(`
    CREATE TABLE IF NOT EXISTS clickstream_events (
      id          INTEGER PRIMARY KEY AUTOINCREMENT,
      event_time  TEXT    NOT NULL,
      event_name  TEXT    NOT NULL,
      attributes  TEXT    NOT NULL DEFAULT '{}',
      created_at  TEXT    NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS dataset_columns (
      position    INTEGER PRIMARY KEY,
      name        TEXT    NOT NULL UNIQUE
    );

    CREATE TABLE IF NOT EXISTS dataset_meta (
      key         TEXT    PRIMARY KEY,
      value       TEXT    NOT NULL
    );
  `);

  return db;
}
