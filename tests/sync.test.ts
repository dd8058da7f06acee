import { describe, expect, it } from "vitest";
import { check } from "../src/engine/achievements";
import { createGame } from "../src/engine/assets";
import { bankOperation } from "../src/engine/bank";
import { runDay } from "../src/engine/day";
import { setDrip } from "../src/engine/dividends";
import { EngineError } from "../src/engine/errors";
import { executeBuy, executeSell } from "../src/engine/ledger";
import { createRng } from "../src/engine/rng";
import { exportSnapshot, flattenGame, importSnapshot } from "../src/engine/sync";
import type { GameState } from "../src/engine/types";

const NOW = new Date("2026-03-01T09:30:00.000Z");

function playedGame(): GameState {
  const game = createGame("alice");
  game.account.cash = 50_000;
  executeBuy(game, "TECHNO", 40);
  executeBuy(game, "FPRIM", 10);
  executeSell(game, "TECHNO", 5);
  bankOperation(game, "deposit", 2_000);
  setDrip(game, "TECHNO", true);
  game.account.meta.nickname = "Ali";
  const rng = createRng(11);
  for (let i = 0; i < 35; i++) runDay(game, { rng, now: NOW });
  check(game, undefined, NOW);
  return game;
}

describe("state synchronizer", () => {
  it("restores an equivalent game from its export", () => {
    const game = playedGame();
    expect(game.account.stats.dividendsReceived).toBeGreaterThan(0);
    expect(importSnapshot(exportSnapshot(game))).toEqual(game);
  });

  it("survives a JSON transport", () => {
    const game = createGame("bob");
    executeBuy(game, "LOGIC", 3);
    setDrip(game, "LOGIC", true);
    const wire = JSON.parse(JSON.stringify(exportSnapshot(game)));
    expect(importSnapshot(wire)).toEqual(game);
  });

  it("flattens to primitive keys", () => {
    const game = createGame("carol");
    executeBuy(game, "TECHNO", 2);
    const { snapshot } = flattenGame(game);

    expect(snapshot).toMatchObject({
      "account.id": "carol",
      cash: 800,
      "position.TECHNO.quantity": 2,
      "position.TECHNO.avgCost": 100,
      "asset.TECHNO.price": 100,
      "asset.TECHNO.nextDividendDay": 30,
      "asset.TECHNO.drip": false,
      "asset.TECHNO.history.0": 100,
      "asset.FTECH.base.TECHNO": 100,
      "tx.0.description": "Achat 2 TECHNO @ 100.00",
      "tx.0.amount": -200,
      "stat.tradeCount": 1,
      "stat.rebirths": 0,
    });
    for (const value of Object.values(snapshot)) expect(typeof value).not.toBe("object");
  });

  it("drops what cannot be represented", () => {
    const game = createGame("dan");
    game.account.meta = { nickname: "Dan", callback: () => 1, nested: { a: 1 }, ratio: Number.NaN, empty: null };

    const { snapshot, dropped } = flattenGame(game);
    expect(dropped).toEqual(["meta.callback", "meta.nested", "meta.ratio"]);
    expect(snapshot["meta.nickname"]).toBe("Dan");
    expect(snapshot["meta.empty"]).toBe(null);
    expect(exportSnapshot(game)).toEqual(snapshot);
  });

  it("fills missing keys with defaults", () => {
    const game = importSnapshot({ cash: 500 });
    const fresh = createGame("local");
    fresh.account.cash = 500;
    expect(game).toEqual(fresh);
  });

  it("ignores unknown keys and unknown assets", () => {
    const game = importSnapshot({
      cash: 10,
      futureField: "x",
      "position.NOPE.quantity": 5,
      "asset.NOPE.price": 3,
      "achievement.rich": "2026-01-01T00:00:00.000Z",
    });
    expect(game.account.cash).toBe(10);
    expect(game.account.positions).toEqual({});
    expect(game.assets.NOPE).toBeUndefined();
    expect(game.account.achievements).toEqual({ rich: "2026-01-01T00:00:00.000Z" });
  });

  it("falls back to defaults on mistyped values", () => {
    const game = importSnapshot({ cash: "beaucoup", loan: null, "asset.TECHNO.drip": "yes", "asset.TECHNO.price": -4 });
    expect(game.account.cash).toBe(1_000);
    expect(game.account.loan).toBe(0);
    expect(game.assets.TECHNO?.drip).toBe(false);
    expect(game.assets.TECHNO?.price).toBe(100);
  });

  it("prices a position without cost at the asset price", () => {
    const game = importSnapshot({ "position.MINES.quantity": 4, "asset.MINES.price": 62 });
    expect(game.account.positions.MINES).toEqual({ quantity: 4, avgCost: 62 });
    expect(game.assets.MINES?.history).toEqual([62]);
  });

  it("keeps only complete transactions, in order", () => {
    const game = importSnapshot({
      "tx.1.description": "Retrait",
      "tx.1.amount": 20,
      "tx.0.day": 3,
      "tx.0.description": "Dépôt",
      "tx.0.amount": -20,
      "tx.2.description": "Sans montant",
    });
    expect(game.account.transactions).toEqual([
      { day: 3, description: "Dépôt", amount: -20 },
      { day: 0, description: "Retrait", amount: 20 },
    ]);
  });

  it("lets the caller override the account id", () => {
    const game = importSnapshot({ "account.id": "alice" }, { accountId: "alice-web" });
    expect(game.account.id).toBe("alice-web");
  });

  it("rejects a payload that is not a record", () => {
    expect(() => importSnapshot("nope")).toThrow(EngineError);
    expect(() => importSnapshot([1, 2])).toThrow("Sauvegarde illisible");
  });
});
