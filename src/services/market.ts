import { createAssetBook } from "../engine/assets";
import { errorMessage, EngineError } from "../engine/errors";
import { advanceMarket, lastReturn } from "../engine/priceModel";
import type { Rng } from "../engine/rng";
import type { AssetBook, AssetCategory, AssetDefinition, Prices } from "../engine/types";
import { marketLogger } from "../logger";
import { DEFAULT_HISTORY_CAP } from "../shared/constants";
import { KeyedMutex } from "./keyedMutex";

export interface MarketTick {
  symbol: string;
  price: number;
  day: number;
  at: string;
}

export interface MarketRepository {
  appendTicks(ticks: readonly MarketTick[]): Promise<void>;
  /** Dernier tick par symbole. */
  latest(): Promise<MarketTick[]>;
  /** Ordre chronologique, au plus `limit` points. */
  history(symbol: string, limit: number): Promise<MarketTick[]>;
  /** Garde les `keepRecent` derniers ticks + 1 sur `sampleEvery` des anciens. */
  cleanup(keepRecent?: number, sampleEvery?: number): Promise<number>;
}

export class MemoryMarketRepository implements MarketRepository {
  private readonly ticks = new Map<string, MarketTick[]>();

  async appendTicks(ticks: readonly MarketTick[]) {
    for (const t of ticks) {
      const list = this.ticks.get(t.symbol) ?? [];
      list.push({ ...t });
      this.ticks.set(t.symbol, list);
    }
  }

  async latest() {
    const out: MarketTick[] = [];
    for (const list of this.ticks.values()) {
      const last = list[list.length - 1];
      if (last) out.push({ ...last });
    }
    return out;
  }

  async history(symbol: string, limit: number) {
    return (this.ticks.get(symbol) ?? []).slice(-limit).map((t) => ({ ...t }));
  }

  async cleanup(keepRecent = 100, sampleEvery = 100) {
    let deleted = 0;
    for (const [symbol, list] of this.ticks) {
      if (list.length <= keepRecent) continue;
      // plus récents d'abord, comme la version SQL
      const desc = [...list].reverse();
      const kept = [...desc.slice(0, keepRecent), ...desc.slice(keepRecent).filter((_, i) => i % sampleEvery === 0)];
      deleted += list.length - kept.length;
      this.ticks.set(symbol, kept.reverse());
    }
    return deleted;
  }
}

export interface MarketOverview {
  day: number;
  categories: Record<string, { count: number; averagePrice: number }>;
  gainers: { symbol: string; change: number }[];
  losers: { symbol: string; change: number }[];
}

export interface MarketServiceOptions {
  repository: MarketRepository;
  rng: Rng;
  historyCap?: number;
  universe?: readonly AssetDefinition[];
}

/** Marché partagé par tous les comptes du serveur. */
export class MarketService {
  private readonly book: AssetBook;
  private readonly repository: MarketRepository;
  private readonly rng: Rng;
  private readonly historyCap: number;
  private readonly mutex = new KeyedMutex();
  private currentDay = 0;

  constructor(options: MarketServiceOptions) {
    this.book = createAssetBook(options.universe);
    this.repository = options.repository;
    this.rng = options.rng;
    this.historyCap = options.historyCap ?? DEFAULT_HISTORY_CAP;
  }

  get day() {
    return this.currentDay;
  }

  /** Reprend les derniers prix persistés (redémarrage). */
  async restore(): Promise<number> {
    const ticks = await this.repository.latest();
    return this.mutex.run("market", () => {
      for (const t of ticks) {
        const asset = this.book[t.symbol];
        if (!asset || !(t.price > 0)) continue;
        asset.price = t.price;
        asset.history = [t.price];
        this.currentDay = Math.max(this.currentDay, t.day);
      }
      return ticks.length;
    });
  }

  tick(now: Date = new Date()): Promise<{ day: number; prices: Prices }> {
    return this.mutex.run("market", async () => {
      const prices = advanceMarket(this.book, this.rng, this.historyCap);
      this.currentDay += 1;
      const day = this.currentDay;
      const at = now.toISOString();
      const ticks = Object.entries(prices).map(([symbol, price]) => ({ symbol, price, day, at }));
      try {
        await this.repository.appendTicks(ticks);
      } catch (err) {
        // Les prix restent valides en mémoire; seul l'historique persistant a un trou
        marketLogger.warn({ day, err: errorMessage(err) }, "ticks non persistés");
      }
      return { day, prices };
    });
  }

  latestPrices(): Prices {
    const prices: Prices = {};
    for (const asset of Object.values(this.book)) prices[asset.symbol] = asset.price;
    return prices;
  }

  listAssets() {
    return Object.values(this.book).map((a) => ({
      symbol: a.symbol,
      name: a.name,
      category: a.category,
      price: a.price,
      change: lastReturn(a),
      dividendPerShare: a.dividendPerShare,
    }));
  }

  async history(symbol: string, limit: number = this.historyCap): Promise<number[]> {
    const asset = this.book[symbol];
    if (!asset) throw new EngineError("NotFound", `Actif inconnu: ${symbol}`);
    const ticks = await this.repository.history(symbol, limit);
    return ticks.length > 1 ? ticks.map((t) => t.price) : asset.history.slice(-limit);
  }

  overview(top = 3): MarketOverview {
    const sums = new Map<AssetCategory, { count: number; total: number }>();
    for (const a of Object.values(this.book)) {
      const s = sums.get(a.category) ?? { count: 0, total: 0 };
      s.count += 1;
      s.total += a.price;
      sums.set(a.category, s);
    }
    const categories: MarketOverview["categories"] = {};
    for (const [category, s] of sums) {
      categories[category] = { count: s.count, averagePrice: Number((s.total / s.count).toFixed(2)) };
    }
    const changes = Object.values(this.book)
      .map((a) => ({ symbol: a.symbol, change: Number(lastReturn(a).toFixed(4)) }))
      .sort((a, b) => b.change - a.change);
    return {
      day: this.currentDay,
      categories,
      gainers: changes.filter((c) => c.change > 0).slice(0, top),
      losers: changes.filter((c) => c.change < 0).reverse().slice(0, top),
    };
  }

  cleanup() {
    return this.repository.cleanup();
  }
}
