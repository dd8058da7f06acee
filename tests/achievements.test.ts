import { describe, expect, it, vi } from "vitest";
import {
  AchievementRegistry,
  check,
  DEFAULT_ACHIEVEMENTS,
  summarize,
  type AchievementDefinition,
  type AchievementPredicate,
} from "../src/engine/achievements";
import { createGame } from "../src/engine/assets";
import { dispatchEvents, MemoryEventSink, type EngineEventSink } from "../src/engine/events";

const NOW = new Date("2026-01-15T12:00:00.000Z");

function definition(key: string, predicate: AchievementPredicate, prerequisites: string[] = []): AchievementDefinition {
  return { key, name: key, description: key, category: "test", points: 5, rarity: "common", prerequisites, predicate };
}

describe("achievement evaluator", () => {
  it("unlocks at the threshold, not a cent before", () => {
    const game = createGame("test");
    game.account.cash = 9_999.99;
    expect(check(game, undefined, NOW)).toEqual([]);

    game.account.cash = 10_000;
    const unlocked = check(game, undefined, NOW);
    expect(unlocked.map((a) => a.key)).toEqual(["rich"]);
    expect(unlocked[0]).toMatchObject({ points: 10, category: "patrimoine", unlockedAt: "2026-01-15T12:00:00.000Z" });
  });

  it("never relocks or restamps an achievement", () => {
    const game = createGame("test");
    game.account.cash = 10_000;
    check(game, undefined, NOW);

    game.account.cash = 0;
    expect(check(game, undefined, new Date("2026-02-01T00:00:00.000Z"))).toEqual([]);
    expect(game.account.achievements.rich).toBe("2026-01-15T12:00:00.000Z");
  });

  it("skips predicates of achievements already unlocked", () => {
    const predicate = vi.fn(() => true);
    const registry = new AchievementRegistry([definition("always", predicate)]);
    const game = createGame("test");

    expect(check(game, registry, NOW)).toHaveLength(1);
    expect(check(game, registry, NOW)).toHaveLength(0);
    expect(predicate).toHaveBeenCalledTimes(1);
  });

  it("treats a throwing predicate as unsatisfied", () => {
    const registry = new AchievementRegistry([
      definition("broken", () => {
        throw new Error("boom");
      }),
      definition("fine", () => true),
    ]);
    const game = createGame("test");

    expect(check(game, registry, NOW).map((a) => a.key)).toEqual(["fine"]);
    expect(game.account.achievements.broken).toBeUndefined();
  });

  it("does not enforce prerequisites", () => {
    const registry = new AchievementRegistry([definition("child", () => true, ["missing"])]);
    expect(check(createGame("test"), registry, NOW).map((a) => a.key)).toEqual(["child"]);

    const game = createGame("test");
    game.account.cash = 100_000;
    expect(check(game, undefined, NOW).map((a) => a.key)).toEqual(["rich", "wealthy"]);
  });

  it("refuses duplicate keys", () => {
    const registry = new AchievementRegistry([definition("dup", () => false)]);
    expect(() => registry.register(definition("dup", () => true))).toThrow("Succès déjà enregistré: dup");
    expect(registry.size).toBe(1);
  });

  it("ships unique keys in the default catalogue", () => {
    const keys = DEFAULT_ACHIEVEMENTS.map((a) => a.key);
    expect(new Set(keys).size).toBe(keys.length);
    expect(keys).toHaveLength(26);
  });

  it("sees positions, mining and stats through the context", () => {
    const game = createGame("test");
    game.account.positions.TECHNO = { quantity: 1, avgCost: 100 };
    game.account.positions.MINES = { quantity: 1, avgCost: 60 };
    game.account.positions.RESTO = { quantity: 1, avgCost: 65 };
    game.account.positions.FTECH = { quantity: 1, avgCost: 100 };
    game.account.hashrate = 1;
    game.account.stats.loansRepaid = 1;

    const keys = check(game, undefined, NOW).map((a) => a.key);
    expect(keys).toEqual(["first_stock", "all_sectors", "miner", "fund_first", "payoff_loan"]);
  });

  it("summarizes points and completion", () => {
    const game = createGame("test");
    game.account.cash = 10_000;
    check(game, undefined, NOW);

    const summary = summarize(game.account);
    expect(summary).toMatchObject({ total: 26, unlocked: 1, points: 10, completionRate: 3.8 });
    expect(summary.categories.patrimoine).toEqual({ total: 6, unlocked: 1 });
    expect(summary.achievements.find((a) => a.key === "rich")?.unlockedAt).toBe("2026-01-15T12:00:00.000Z");
    expect(summary.achievements.find((a) => a.key === "wealthy")?.unlockedAt).toBe(null);
  });

  it("keeps the unlock when an event sink fails", async () => {
    const game = createGame("test");
    game.account.cash = 10_000;
    const unlocked = check(game, undefined, NOW);

    const failing: EngineEventSink = {
      name: "failing",
      publish: () => {
        throw new Error("offline");
      },
    };
    const memory = new MemoryEventSink();
    await dispatchEvents([failing, memory], "test", [
      { type: "achievement:unlocked", at: NOW.toISOString(), key: "rich", name: "Cap", category: "patrimoine", points: 10, rarity: "common" },
    ]);

    expect(unlocked).toHaveLength(1);
    expect(game.account.achievements.rich).toBe("2026-01-15T12:00:00.000Z");
    expect(memory.received.map((r) => r.event.type)).toEqual(["achievement:unlocked"]);
  });
});
