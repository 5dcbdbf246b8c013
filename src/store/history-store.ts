import type Database from "better-sqlite3";
import type { Logger } from "../logging/logger.js";
import { DEFAULT_MODE, isUserMode, type UserMode } from "../conversation/mode.js";
import type { ConversationTurn, TurnRole } from "../conversation/types.js";
import type { StateDB } from "./db.js";
import type { HistoryStore } from "./types.js";

interface TurnRow {
  role: TurnRole;
  content: string;
  created_at: number;
}

export class SqliteHistoryStore implements HistoryStore {
  private readonly db: Database.Database;
  private readonly logger: Logger;

  constructor(stateDb: StateDB, logger: Logger) {
    this.db = stateDb.raw();
    this.logger = logger.child({ component: "history-store" });
  }

  private touchUser(userId: string, mode?: UserMode): void {
    const now = Date.now();
    this.db
      .prepare(
        `INSERT INTO users (user_id, mode, created_at, last_active)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(user_id) DO UPDATE SET
           mode = COALESCE(?, users.mode),
           last_active = excluded.last_active`,
      )
      .run(userId, mode ?? DEFAULT_MODE, now, now, mode ?? null);
  }

  /** Runs a write in a transaction; failures are logged and reported as false. */
  private write(action: string, userId: string, fn: () => void): boolean {
    try {
      this.db.transaction(fn)();
      return true;
    } catch (err) {
      this.logger.error({ err, userId }, `Failed to ${action}`);
      return false;
    }
  }

  getMode(userId: string): UserMode {
    const row = this.db
      .prepare("SELECT mode FROM users WHERE user_id = ?")
      .get(userId) as { mode: unknown } | undefined;
    if (row && isUserMode(row.mode)) return row.mode;
    this.touchUser(userId);
    return DEFAULT_MODE;
  }

  setMode(userId: string, mode: UserMode): boolean {
    return this.write("set mode", userId, () => this.touchUser(userId, mode));
  }

  appendTurn(userId: string, role: TurnRole, content: string): boolean {
    return this.write("append turn", userId, () => {
      this.touchUser(userId);
      this.db
        .prepare(
          "INSERT INTO chat_history (user_id, role, content, created_at) VALUES (?, ?, ?, ?)",
        )
        .run(userId, role, content, Date.now());
    });
  }

  getTurns(userId: string, limit: number): ConversationTurn[] {
    const rows = this.db
      .prepare(
        `SELECT role, content, created_at FROM chat_history
         WHERE user_id = ? ORDER BY id DESC LIMIT ?`,
      )
      .all(userId, limit) as TurnRow[];
    return rows.reverse().map((r) => ({
      role: r.role,
      content: r.content,
      timestamp: r.created_at,
    }));
  }

  clearTurns(userId: string): boolean {
    return this.write("clear turns", userId, () => {
      this.db.prepare("DELETE FROM chat_history WHERE user_id = ?").run(userId);
    });
  }
}
