import { describe, expect, it } from "vitest";
import { createRng } from "../src/engine/rng";
import { MarketService, MemoryMarketRepository, type MarketRepository, type MarketTick } from "../src/services/market";

const AT = "2026-04-01T00:00:00.000Z";

function ticks(symbol: string, count: number): MarketTick[] {
  return Array.from({ length: count }, (_, i) => ({ symbol, price: i + 1, day: i + 1, at: AT }));
}

describe("market service", () => {
  it("persists one tick per asset and day", async () => {
    const repository = new MemoryMarketRepository();
    const market = new MarketService({ repository, rng: createRng(8) });

    const first = await market.tick(new Date(AT));
    await market.tick(new Date(AT));

    expect(first.day).toBe(1);
    expect(market.day).toBe(2);
    const latest = await repository.latest();
    expect(latest).toHaveLength(13);
    expect(latest.every((t) => t.day === 2)).toBe(true);
    expect(await market.history("TECHNO")).toEqual((await repository.history("TECHNO", 10)).map((t) => t.price));
  });

  it("keeps its prices when persistence fails", async () => {
    const failing: MarketRepository = {
      appendTicks: () => Promise.reject(new Error("db down")),
      latest: () => Promise.resolve([]),
      history: () => Promise.resolve([]),
      cleanup: () => Promise.resolve(0),
    };
    const market = new MarketService({ repository: failing, rng: createRng(8) });
    const { prices } = await market.tick();
    expect(market.latestPrices()).toEqual(prices);
    expect(await market.history("TECHNO")).toEqual([100, prices.TECHNO]);
  });

  it("restores the latest persisted prices", async () => {
    const repository = new MemoryMarketRepository();
    await repository.appendTicks([
      { symbol: "TECHNO", price: 111, day: 40, at: AT },
      { symbol: "GONE", price: 5, day: 41, at: AT },
    ]);
    const market = new MarketService({ repository, rng: createRng(8) });

    expect(await market.restore()).toBe(2);
    expect(market.latestPrices().TECHNO).toBe(111);
    expect(market.day).toBe(40);
  });

  it("thins old ticks but keeps the recent ones", async () => {
    const repository = new MemoryMarketRepository();
    await repository.appendTicks(ticks("TECHNO", 350));

    // 250 anciens, 1 sur 100 conservé
    expect(await repository.cleanup()).toBe(247);
    const kept = await repository.history("TECHNO", 1_000);
    expect(kept).toHaveLength(103);
    expect(kept.slice(0, 3).map((t) => t.price)).toEqual([50, 150, 250]);
    expect(kept.at(-1)?.price).toBe(350);
  });

  it("lists assets and rejects unknown histories", async () => {
    const market = new MarketService({ repository: new MemoryMarketRepository(), rng: createRng(8) });
    expect(market.listAssets().map((a) => a.symbol)).toContain("FSERV");
    await expect(market.history("NOPE")).rejects.toMatchObject({ kind: "NotFound" });
  });
});
