import Database from "better-sqlite3";
import { dirname } from "node:path";
import { ensureDir } from "../config/paths.js";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS memory_data (
  id           INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id      TEXT NOT NULL,
  file_path    TEXT NOT NULL,
  content      TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  scanned_at   INTEGER NOT NULL,
  UNIQUE (user_id, file_path, content_hash)
);
CREATE INDEX IF NOT EXISTS idx_memory_data_user ON memory_data(user_id, scanned_at);

CREATE TABLE IF NOT EXISTS rentals (
  id             INTEGER PRIMARY KEY AUTOINCREMENT,
  token          TEXT NOT NULL UNIQUE,
  seller_user_id TEXT NOT NULL,
  created_at     INTEGER NOT NULL,
  expires_at     INTEGER,
  revoked_at     INTEGER
);
CREATE INDEX IF NOT EXISTS idx_rentals_seller ON rentals(seller_user_id, created_at);

CREATE TABLE IF NOT EXISTS sellers (
  user_id          TEXT PRIMARY KEY,
  host_fingerprint TEXT NOT NULL,
  first_seen       INTEGER NOT NULL,
  last_seen        INTEGER NOT NULL,
  metadata         TEXT DEFAULT '{}'
);

CREATE TABLE IF NOT EXISTS buyers (
  user_id          TEXT PRIMARY KEY,
  host_fingerprint TEXT NOT NULL,
  first_seen       INTEGER NOT NULL,
  last_seen        INTEGER NOT NULL,
  metadata         TEXT DEFAULT '{}'
);
`;

export interface PersonaDBOptions {
  /** How long a statement waits on a locked database before failing. */
  readonly busyTimeoutMs?: number;
}

export class PersonaDB {
  private db: Database.Database;

  /** `path` may be ":memory:" for an in-process database. */
  constructor(path: string, opts: PersonaDBOptions = {}) {
    if (path !== ":memory:") ensureDir(dirname(path));
    this.db = new Database(path, { timeout: opts.busyTimeoutMs ?? 5_000 });
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA_SQL);
  }

  raw(): Database.Database {
    return this.db;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
