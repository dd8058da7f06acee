import type { QueryResultRow } from "pg";
import { describe, expect, it } from "vitest";
import type { Db, Query, QueryResult } from "../src/db";
import { PersistenceError } from "../src/engine/errors";
import { PgAchievementSink, PgLeaderboard, PgMarketRepository, PgMigrationLog, PgSnapshotStore } from "../src/services/pgStores";
import { FallbackSnapshotStore, MemorySnapshotStore } from "../src/services/stores";

// Base factice: enregistre les requêtes, ne renvoie aucune ligne
class FakeDb implements Db {
  readonly statements: { sql: string; params?: unknown[] }[] = [];
  failure: Error | null = null;
  rowCount = 0;

  query = async <R extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<QueryResult<R>> => {
    if (this.failure) throw this.failure;
    this.statements.push({ sql: sql.replace(/\s+/g, " ").trim(), params });
    return { rows: [], rowCount: this.rowCount };
  };

  async transaction<T>(fn: (query: Query) => Promise<T>): Promise<T> {
    this.statements.push({ sql: "BEGIN" });
    const result = await fn(this.query);
    this.statements.push({ sql: "COMMIT" });
    return result;
  }

  async ping() {
    return this.failure === null;
  }

  async close() {
    this.statements.length = 0;
  }
}

describe("postgres stores", () => {
  it("locks the account before a read-modify-write", async () => {
    const db = new FakeDb();
    const store = new PgSnapshotStore(db, "web");

    const result = await store.update("alice", (current) => ({ snapshot: { cash: 5 }, result: current }));

    expect(result).toBe(null);
    expect(db.statements.map((s) => s.sql.split(" ").slice(0, 2).join(" "))).toEqual([
      "BEGIN",
      "SELECT pg_advisory_xact_lock(hashtext($1))",
      "SELECT snapshot",
      "INSERT INTO",
      "COMMIT",
    ]);
    expect(db.statements[1]?.params).toEqual(["web:alice"]);
    expect(db.statements[3]?.params).toEqual(["web", "alice", JSON.stringify({ cash: 5 })]);
  });

  it("turns driver failures into persistence errors", async () => {
    const db = new FakeDb();
    db.failure = new Error("ECONNREFUSED");
    const store = new PgSnapshotStore(db, "web");

    await expect(store.load("alice")).rejects.toBeInstanceOf(PersistenceError);
    await expect(store.list()).rejects.toThrow("Base de données indisponible (list): ECONNREFUSED");
  });

  it("falls back to local saves when the database is down", async () => {
    const db = new FakeDb();
    db.failure = new Error("ECONNREFUSED");
    const local = new MemorySnapshotStore("local");
    const store = new FallbackSnapshotStore(new PgSnapshotStore(db, "web"), local);

    await store.save("alice", { cash: 7 });
    expect(await local.load("alice")).toEqual({ cash: 7 });
    expect(store.name).toBe("pg:web+local");
  });

  it("lets errors from the updater through without falling back", async () => {
    const db = new FakeDb();
    const local = new MemorySnapshotStore("local");
    const store = new FallbackSnapshotStore(new PgSnapshotStore(db, "web"), local);
    let calls = 0;
    const bug = new TypeError("position introuvable");

    const run = store.update("alice", () => {
      calls += 1;
      throw bug;
    });

    await expect(run).rejects.toBe(bug);
    expect(calls).toBe(1);
    expect(await local.list()).toEqual([]);
  });

  it("fails loudly when a migration upsert returns nothing", async () => {
    const log = new PgMigrationLog(new FakeDb());
    await expect(
      log.record({ platform: "desktop", accountId: "a" }, { platform: "web", accountId: "a" }, "2026-01-01T00:00:00.000Z", 3),
    ).rejects.toThrow("Migration non enregistrée");
  });

  it("inserts all ticks in one statement", async () => {
    const db = new FakeDb();
    const repository = new PgMarketRepository(db);
    await repository.appendTicks([]);
    await repository.appendTicks([
      { symbol: "TECHNO", price: 101, day: 1, at: "2026-01-01T00:00:00.000Z" },
      { symbol: "BTC", price: 990_000, day: 1, at: "2026-01-01T00:00:00.000Z" },
    ]);
    expect(db.statements).toHaveLength(1);
    expect(db.statements[0]?.sql).toBe("INSERT INTO market_ticks (symbol, price, day, at) VALUES ($1, $2, $3, $4), ($5, $6, $7, $8)");
  });

  it("counts an achievement only on its first unlock", async () => {
    const db = new FakeDb();
    const sink = new PgAchievementSink(db, "web");
    const at = "2026-01-01T00:00:00.000Z";

    await sink.publish("alice", { type: "day:completed", at, day: 1, netWorth: 1_000 });
    expect(db.statements).toHaveLength(0);

    await sink.publish("alice", { type: "achievement:unlocked", at, key: "rich", name: "Cap", category: "patrimoine", points: 10, rarity: "common" });
    expect(db.statements.map((s) => s.sql.slice(0, 31))).toEqual(["BEGIN", "INSERT INTO achievement_unlocks", "COMMIT"]);

    db.rowCount = 1;
    await sink.publish("bob", { type: "achievement:unlocked", at, key: "rich", name: "Cap", category: "patrimoine", points: 10, rarity: "common" });
    expect(db.statements.slice(3).map((s) => s.sql.slice(0, 29))).toEqual([
      "BEGIN",
      "INSERT INTO achievement_unloc",
      "INSERT INTO achievement_stats",
      "COMMIT",
    ]);
  });

  it("upserts one leaderboard row per account", async () => {
    const db = new FakeDb();
    const board = new PgLeaderboard(db, "web");

    await board.record({ accountId: "alice", netWorth: 1_500, day: 3, updatedAt: "2026-01-01T00:00:00.000Z" });
    expect(await board.top(5)).toEqual([]);
    await board.top(1, "alice");

    expect(db.statements[0]?.sql.startsWith("INSERT INTO leaderboard")).toBe(true);
    expect(db.statements[0]?.params).toEqual(["web", "alice", 1_500, 3, "2026-01-01T00:00:00.000Z"]);
    expect(db.statements[1]?.params).toEqual(["web", null, 5]);
    expect(db.statements[2]?.params).toEqual(["web", "alice", 1]);

    db.failure = new Error("ECONNREFUSED");
    await expect(board.top(5)).rejects.toBeInstanceOf(PersistenceError);
  });
});
