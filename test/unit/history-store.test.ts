import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, existsSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { StateDB } from "../../src/store/db.js";
import { SqliteHistoryStore } from "../../src/store/history-store.js";
import { createSilentLogger } from "../../src/logging/logger.js";

describe("SqliteHistoryStore", () => {
  let dir: string;
  let db: StateDB;
  let store: SqliteHistoryStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "datawise-store-"));
    db = new StateDB(dir);
    store = new SqliteHistoryStore(db, createSilentLogger());
  });

  afterEach(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it("creates the database file in the state directory", () => {
    expect(existsSync(join(dir, "state.db"))).toBe(true);
    expect(db.isOpen()).toBe(true);
  });

  describe("modes", () => {
    it("starts unseen users in data mode", () => {
      expect(store.getMode("u1")).toBe("data");
    });

    it("stores mode switches per user", () => {
      expect(store.setMode("u1", "chat")).toBe(true);
      expect(store.getMode("u1")).toBe("chat");
      expect(store.getMode("u2")).toBe("data");
      expect(store.setMode("u1", "data")).toBe(true);
      expect(store.getMode("u1")).toBe("data");
    });

    it("keeps modes across reopening", () => {
      store.setMode("u1", "chat");
      db.close();
      db = new StateDB(dir);
      store = new SqliteHistoryStore(db, createSilentLogger());
      expect(store.getMode("u1")).toBe("chat");
    });
  });

  describe("turns", () => {
    it("returns the newest turns oldest first", () => {
      for (const [i, role] of (["user", "assistant", "user", "assistant", "user"] as const).entries()) {
        expect(store.appendTurn("u1", role, `m${i}`)).toBe(true);
      }
      const turns = store.getTurns("u1", 3);
      expect(turns.map((t) => [t.role, t.content])).toEqual([
        ["user", "m2"],
        ["assistant", "m3"],
        ["user", "m4"],
      ]);
      expect(typeof turns[0]?.timestamp).toBe("number");
    });

    it("keeps users apart and clears one user's history", () => {
      store.appendTurn("u1", "user", "mine");
      store.appendTurn("u2", "user", "theirs");
      expect(store.clearTurns("u1")).toBe(true);
      expect(store.getTurns("u1", 10)).toEqual([]);
      expect(store.getTurns("u2", 10).map((t) => t.content)).toEqual(["theirs"]);
    });

    it("appending does not change the user's mode", () => {
      store.setMode("u1", "chat");
      store.appendTurn("u1", "user", "hi");
      expect(store.getMode("u1")).toBe("chat");
    });
  });

  it("reports failed writes instead of throwing", () => {
    db.close();
    expect(store.setMode("u1", "chat")).toBe(false);
    expect(store.appendTurn("u1", "user", "hi")).toBe(false);
    expect(store.clearTurns("u1")).toBe(false);
  });
});
