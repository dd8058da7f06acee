import { describe, expect, it } from "vitest";
import { createGame } from "../src/engine/assets";
import { executeBuy, executeSell, netWorth, portfolioValue, unrealizedGainLoss, validateOrder } from "../src/engine/ledger";
import type { GameState } from "../src/engine/types";

function richGame(cash = 10_000): GameState {
  const game = createGame("test");
  game.account.cash = cash;
  return game;
}

describe("ledger", () => {
  it("averages the cost over successive buys", () => {
    const game = richGame();
    executeBuy(game, "TECHNO", 10, 100);
    const second = executeBuy(game, "TECHNO", 10, 120);

    expect(second.ok).toBe(true);
    expect(game.account.positions.TECHNO).toEqual({ quantity: 20, avgCost: 110 });
    expect(game.account.cash).toBe(7_800);
  });

  it("keeps the average cost on a partial sale", () => {
    const game = richGame();
    executeBuy(game, "TECHNO", 10, 100);
    executeBuy(game, "TECHNO", 10, 120);
    const sale = executeSell(game, "TECHNO", 5, 130);

    expect(sale).toMatchObject({ ok: true, amount: 650, position: { quantity: 15, avgCost: 110 } });
    expect(game.account.cash).toBe(8_450);
    expect(game.account.stats.bestSaleGain).toBe(100);
    expect(game.account.stats.tradeCount).toBe(3);
  });

  it("debits exactly quantity times price", () => {
    const game = richGame(500);
    const before = game.account.cash;
    executeBuy(game, "FERME", 3, 33.33);
    expect(game.account.cash).toBe(before - 3 * 33.33);
  });

  it("drops the position when everything is sold", () => {
    const game = richGame();
    executeBuy(game, "MINES", 4, 60);
    const sale = executeSell(game, "MINES", 4, 50);

    expect(sale.ok && sale.position).toBe(null);
    expect(game.account.positions.MINES).toBeUndefined();
    expect(game.account.cash).toBe(10_000 - 240 + 200);
  });

  it("uses the current asset price when none is given", () => {
    const game = richGame();
    const result = executeBuy(game, "ASSEMB", 2);
    expect(result).toMatchObject({ ok: true, price: 80, amount: -160, description: "Achat de 2 ASSEMB à 80.00 $" });
  });

  it("logs each trade in the account journal", () => {
    const game = richGame();
    executeBuy(game, "TECHNO", 2, 100);
    executeSell(game, "TECHNO", 1, 105);
    expect(game.account.transactions).toEqual([
      { day: 0, description: "Achat 2 TECHNO @ 100.00", amount: -200 },
      { day: 0, description: "Vente 1 TECHNO @ 105.00", amount: 105 },
    ]);
  });

  it.each([
    ["zero quantity", { symbol: "TECHNO", quantity: 0, price: 100, action: "buy" as const }, "InvalidQuantity"],
    ["NaN quantity", { symbol: "TECHNO", quantity: Number.NaN, price: 100, action: "buy" as const }, "InvalidQuantity"],
    ["unknown asset", { symbol: "NOPE", quantity: 1, price: 100, action: "buy" as const }, "UnknownAsset"],
    ["zero price", { symbol: "TECHNO", quantity: 1, price: 0, action: "buy" as const }, "InvalidPrice"],
    ["too expensive", { symbol: "TECHNO", quantity: 11, price: 100, action: "buy" as const }, "InsufficientFunds"],
    ["nothing held", { symbol: "TECHNO", quantity: 1, price: 100, action: "sell" as const }, "InsufficientHoldings"],
  ])("rejects %s", (_label, order, error) => {
    const game = createGame("test");
    const check = validateOrder(game.assets, game.account, order);
    expect(check).toMatchObject({ ok: false, error });
  });

  it("leaves the account untouched on a rejected order", () => {
    const game = richGame(1_000);
    executeBuy(game, "TECHNO", 5, 100);
    const snapshot = structuredClone(game.account);

    const buy = executeBuy(game, "LOGIC", 100, 120);
    const sell = executeSell(game, "TECHNO", 6, 100);

    expect(buy).toEqual({ ok: false, error: "InsufficientFunds", message: "Cash insuffisant" });
    expect(sell).toEqual({ ok: false, error: "InsufficientHoldings", message: "Position insuffisante" });
    expect(game.account).toEqual(snapshot);
  });

  it("values the portfolio and net worth at current prices", () => {
    const game = createGame("test");
    executeBuy(game, "TECHNO", 5);
    expect(portfolioValue(game.account, game.assets)).toBe(500);
    expect(netWorth(game.account, game.assets)).toBe(1_000);

    game.account.loan = 200;
    expect(netWorth(game.account, game.assets)).toBe(800);

    game.account.savings = 50;
    game.account.minedBalance = 0.5;
    // BTC à 1 000 000
    expect(netWorth(game.account, game.assets)).toBe(500_850);
  });

  it("reports unrealized gains per line", () => {
    const game = createGame("test");
    executeBuy(game, "TECHNO", 5);
    const techno = game.assets.TECHNO;
    if (!techno) throw new Error("TECHNO manquant");
    techno.price = 110;

    const { lines, total } = unrealizedGainLoss(game.account, game.assets);
    expect(lines).toEqual([
      { symbol: "TECHNO", quantity: 5, avgCost: 100, price: 110, marketValue: 550, costBasis: 500, gain: 50 },
    ]);
    expect(total).toBe(50);
  });
});
