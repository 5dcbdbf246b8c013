import Database from "better-sqlite3";
import { join } from "node:path";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS users (
  user_id     TEXT PRIMARY KEY,
  mode        TEXT NOT NULL DEFAULT 'data' CHECK(mode IN ('data','chat')),
  created_at  INTEGER NOT NULL,
  last_active INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS chat_history (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id     TEXT NOT NULL REFERENCES users(user_id),
  role        TEXT NOT NULL CHECK(role IN ('user','assistant')),
  content     TEXT NOT NULL,
  created_at  INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_chat_history_user
  ON chat_history(user_id, id);
`;

export const DB_FILENAME = "state.db";

export class StateDB {
  private db: Database.Database;

  /** Opens `<stateDir>/state.db`, or an in-memory database for ":memory:". */
  constructor(stateDir: string) {
    const location = stateDir === ":memory:" ? stateDir : join(stateDir, DB_FILENAME);
    this.db = new Database(location);
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
