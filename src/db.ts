import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

const PRAGMAS = [
  "busy_timeout = 5000",
  "journal_mode = WAL",
  "synchronous = NORMAL",
];

export function getDb(dbPath: string): Database.Database {
  mkdirSync(dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  for (const pragma of PRAGMAS) {
    try {
      db.pragma(pragma);
    } catch {
      // another process holding the db may block a pragma; carry on without it
    }
  }

  db.exec(`
  CREATE TABLE IF NOT EXISTS snapshot (
    path     TEXT PRIMARY KEY NOT NULL,
    checksum TEXT NOT NULL
  );
`);

  db.exec(`
  CREATE TABLE IF NOT EXISTS meta (
    key TEXT PRIMARY KEY NOT NULL,
    value TEXT
  );
`);

  return db;
}
