import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

export type Db = BetterSqlite3.Database;

// Opens (or creates) the state database and makes sure the schema exists.
// Pass ':memory:' for a throwaway database.
export function openDatabase(file: string): Db {
  if (file !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
  }

  const db: Db = new Database(file);

  // Set WAL so a crash mid-write never leaves a torn page behind
  db.pragma('journal_mode = WAL');

  // Drafts waiting on a reviewer decision
  db.exec(`
    CREATE TABLE IF NOT EXISTS pending_drafts (
      id TEXT PRIMARY KEY,
      text TEXT NOT NULL,
      image_path TEXT NOT NULL,
      created_at TEXT NOT NULL
    )
  `);

  // Published post texts, oldest first by seq
  db.exec(`
    CREATE TABLE IF NOT EXISTS history (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      text TEXT NOT NULL,
      published_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  return db;
}
