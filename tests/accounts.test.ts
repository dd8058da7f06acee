import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PersistenceError } from "../src/engine/errors";
import { MemoryEventSink, type EngineEventSink } from "../src/engine/events";
import { createRng } from "../src/engine/rng";
import { AccountService } from "../src/services/accounts";
import { MarketService, MemoryMarketRepository } from "../src/services/market";
import { FileSnapshotStore, MemorySnapshotStore, type SnapshotStore, type Updater } from "../src/services/stores";

const NOW = new Date("2026-05-04T08:00:00.000Z");

function service(options: { store?: SnapshotStore; market?: MarketService; sinks?: EngineEventSink[] } = {}) {
  const store = options.store ?? new MemorySnapshotStore();
  const accounts = new AccountService({
    store,
    rng: createRng(1),
    market: options.market,
    sinks: options.sinks,
    now: () => NOW,
  });
  return { store, accounts };
}

class FlakyStore extends MemorySnapshotStore {
  override update<T>(accountId: string, fn: Updater<T>): Promise<T> {
    if (accountId === "broken") return Promise.reject(new PersistenceError("disque plein"));
    return super.update(accountId, fn);
  }
}

describe("account service", () => {
  it("creates an account on first use", async () => {
    const { accounts, store } = service();
    const view = await accounts.open("alice");
    expect(view).toMatchObject({ id: "alice", day: 0, cash: 1_000, netWorth: 1_000, loanLimit: 5_000 });
    expect(await store.list()).toEqual(["alice"]);
  });

  it("does not lose updates under concurrent orders", async () => {
    const { accounts } = service();
    await accounts.open("alice");

    const results = await Promise.all(
      Array.from({ length: 15 }, () => accounts.trade("alice", { symbol: "TECHNO", quantity: 1, action: "buy" })),
    );

    expect(results.filter((r) => r.ok)).toHaveLength(10);
    expect(results.filter((r) => !r.ok).map((r) => (r.ok ? "" : r.message))).toEqual(Array(5).fill("Cash insuffisant"));
    const view = await accounts.get("alice");
    expect(view.cash).toBe(0);
    expect(view.positions).toEqual([
      { symbol: "TECHNO", quantity: 10, avgCost: 100, price: 100, marketValue: 1_000, gain: 0 },
    ]);
  });

  it("keeps distinct accounts independent", async () => {
    const { accounts } = service();
    await Promise.all(
      ["alice", "bob", "alice", "bob", "alice", "bob"].map((id) =>
        accounts.trade(id, { symbol: "MINES", quantity: 2, action: "buy" }),
      ),
    );
    for (const id of ["alice", "bob"]) {
      const view = await accounts.get(id);
      expect(view.cash).toBe(640);
      expect(view.positions[0]?.quantity).toBe(6);
    }
  });

  it("publishes trade and unlock events", async () => {
    const sink = new MemoryEventSink();
    const { accounts } = service({ sinks: [sink] });

    const result = await accounts.trade("alice", { symbol: "TECHNO", quantity: 1, action: "buy" });

    expect(result).toMatchObject({ ok: true, unlocked: [{ key: "first_stock" }] });
    expect(sink.received).toEqual([
      { accountId: "alice", event: { type: "trade", at: NOW.toISOString(), action: "buy", symbol: "TECHNO", quantity: 1, price: 100 } },
      {
        accountId: "alice",
        event: {
          type: "achievement:unlocked",
          at: NOW.toISOString(),
          key: "first_stock",
          name: "Premier placement",
          category: "actions",
          points: 10,
          rarity: "common",
        },
      },
    ]);
  });

  it("completes the order when a sink fails", async () => {
    const failing: EngineEventSink = {
      name: "failing",
      publish: () => Promise.reject(new Error("offline")),
    };
    const { accounts } = service({ sinks: [failing] });
    const result = await accounts.trade("alice", { symbol: "TECHNO", quantity: 1, action: "buy" });
    expect(result.ok).toBe(true);
    expect((await accounts.get("alice")).cash).toBe(900);
  });

  it("trades and advances at the shared market prices", async () => {
    const market = new MarketService({ repository: new MemoryMarketRepository(), rng: createRng(5) });
    const { accounts } = service({ market });
    const { prices } = await market.tick(NOW);

    const result = await accounts.trade("alice", { symbol: "LOGIC", quantity: 1, action: "buy" });
    expect(result.ok && result.price).toBe(prices.LOGIC);

    const report = await accounts.advanceDay("alice");
    expect(report.day).toBe(1);
    expect(report.prices.LOGIC).toBe(prices.LOGIC);
    expect(report.prices.BTC).toBe(prices.BTC);
  });

  it("advances every account and reports failures", async () => {
    const store = new FlakyStore();
    const { accounts } = service({ store });
    await accounts.open("alice");
    await accounts.open("bob");
    await store.save("broken", { cash: 1 });

    expect(await accounts.advanceAll()).toEqual({ processed: 2, failed: ["broken"] });
    expect((await accounts.get("alice")).day).toBe(1);
    expect((await accounts.get("bob")).day).toBe(1);
  });

  it("runs bank, mining and DRIP operations", async () => {
    const { accounts } = service();
    expect(await accounts.bank("alice", "deposit", 100)).toMatchObject({ ok: true, account: { cash: 900, savings: 100 } });
    expect(await accounts.bank("alice", "withdraw", 0)).toMatchObject({ ok: false, error: "InvalidAmount" });
    expect(await accounts.buyMiner("alice", 1)).toMatchObject({ ok: true, account: { cash: 400, hashrate: 1 } });
    expect(await accounts.sellMined("alice", 1)).toMatchObject({ ok: false, error: "InsufficientHoldings" });
    expect(await accounts.setDrip("alice", "TECHNO", true)).toMatchObject({ ok: true, account: { drip: ["TECHNO"] } });
    expect(await accounts.setDrip("alice", "NOPE", true)).toEqual({ ok: false, error: "UnknownAsset", message: "Actif inconnu: NOPE" });
  });

  it("imports and exports snapshots", async () => {
    const { accounts } = service();
    const view = await accounts.importSnapshot("alice", { cash: 42, "account.id": "someone-else" });
    expect(view).toMatchObject({ id: "alice", cash: 42 });

    const snapshot = await accounts.exportSnapshot("alice");
    expect(snapshot).toMatchObject({ "account.id": "alice", cash: 42 });
  });

  it("summarizes achievements", async () => {
    const { accounts } = service();
    await accounts.importSnapshot("alice", { cash: 10_000 });
    await accounts.bank("alice", "deposit", 1);
    const summary = await accounts.achievements("alice");
    expect(summary).toMatchObject({ unlocked: 1, points: 10 });
  });

  it("rejects unknown accounts", async () => {
    const { accounts } = service();
    await expect(accounts.get("ghost")).rejects.toMatchObject({ kind: "NotFound" });
    await expect(accounts.exportSnapshot("ghost")).rejects.toMatchObject({ kind: "NotFound" });
  });
});

describe("account service on local saves", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "bq-accounts-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("keeps accounts with look-alike ids apart", async () => {
    const { accounts } = service({ store: new FileSnapshotStore(dir) });
    await accounts.open("bob.x");
    await accounts.open("bob_x");

    const result = await accounts.trade("bob.x", { symbol: "TECHNO", quantity: 5, action: "buy" });

    expect(result.ok).toBe(true);
    expect((await accounts.get("bob.x")).cash).toBe(500);
    const other = await accounts.get("bob_x");
    expect(other.cash).toBe(1_000);
    expect(other.positions).toEqual([]);
  });

  it("advances the other accounts when one save is corrupt", async () => {
    const { accounts } = service({ store: new FileSnapshotStore(dir) });
    await accounts.open("alice");
    await fs.writeFile(path.join(dir, "save_zed.json"), "{oops", "utf8");

    expect(await accounts.advanceAll()).toEqual({ processed: 1, failed: ["zed"] });
    expect((await accounts.get("alice")).day).toBe(1);
  });
});
