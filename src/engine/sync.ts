import { z } from "zod";
import { syncLogger } from "../logger";
import { createGame } from "./assets";
import { EngineError } from "./errors";
import type { AssetDefinition, GameState, Position, Transaction } from "./types";

export type SnapshotValue = string | number | boolean | null;

/** Sauvegarde à plat, sans version: clé -> primitive. */
export type Snapshot = Record<string, SnapshotValue>;

const ACCOUNT_NUMBERS = [
  "cash",
  "savings",
  "loan",
  "loanInterestRate",
  "depositInterestRate",
  "day",
  "hashrate",
  "minedBalance",
] as const;

const STAT_KEYS = ["tradeCount", "bestSaleGain", "dividendsReceived", "dripShares", "loansRepaid", "rebirths"] as const;

class SnapshotWriter {
  readonly snapshot: Snapshot = {};
  readonly dropped: string[] = [];

  put(key: string, value: unknown) {
    if (value === null || typeof value === "string" || typeof value === "boolean") {
      this.snapshot[key] = value;
    } else if (typeof value === "number" && Number.isFinite(value)) {
      this.snapshot[key] = value;
    } else {
      this.dropped.push(key);
    }
  }
}

export function flattenGame(game: GameState): { snapshot: Snapshot; dropped: string[] } {
  const { account, assets } = game;
  const w = new SnapshotWriter();
  w.put("account.id", account.id);
  for (const key of ACCOUNT_NUMBERS) w.put(key, account[key]);
  for (const key of STAT_KEYS) w.put(`stat.${key}`, account.stats[key]);

  for (const [symbol, position] of Object.entries(account.positions)) {
    w.put(`position.${symbol}.quantity`, position.quantity);
    w.put(`position.${symbol}.avgCost`, position.avgCost);
  }

  for (const asset of Object.values(assets)) {
    const prefix = `asset.${asset.symbol}`;
    w.put(`${prefix}.price`, asset.price);
    w.put(`${prefix}.nextDividendDay`, asset.nextDividendDay);
    w.put(`${prefix}.drip`, asset.drip);
    asset.history.forEach((price, i) => w.put(`${prefix}.history.${i}`, price));
    for (const [component, base] of Object.entries(asset.basePrices ?? {})) {
      w.put(`${prefix}.base.${component}`, base);
    }
  }

  account.transactions.forEach((tx, i) => {
    w.put(`tx.${i}.day`, tx.day);
    w.put(`tx.${i}.description`, tx.description);
    w.put(`tx.${i}.amount`, tx.amount);
  });

  for (const [key, unlockedAt] of Object.entries(account.achievements)) w.put(`achievement.${key}`, unlockedAt);
  for (const [key, value] of Object.entries(account.meta)) w.put(`meta.${key}`, value);

  return { snapshot: w.snapshot, dropped: w.dropped };
}

/** Les champs non représentables sont écartés avec un avertissement. */
export function exportSnapshot(game: GameState): Snapshot {
  const { snapshot, dropped } = flattenGame(game);
  if (dropped.length > 0) {
    syncLogger.warn({ accountId: game.account.id, dropped }, "champs non sérialisables ignorés");
  }
  return snapshot;
}

/** Forme stricte d'une sauvegarde relue d'un stockage. */
export const snapshotRecordSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

const snapshotSchema = z.record(z.unknown());
const finite = z.number().finite();
const text = z.string();
const flag = z.boolean();

export interface ImportOptions {
  accountId?: string;
  universe?: readonly AssetDefinition[];
}

/**
 * Réhydrate une partie: les clés absentes prennent la valeur par défaut,
 * les clés inconnues (ou d'un actif inconnu) sont ignorées.
 */
export function importSnapshot(raw: unknown, options: ImportOptions = {}): GameState {
  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) throw new EngineError("ValidationError", "Sauvegarde illisible");
  const snap = parsed.data;

  const num = (key: string, fallback: number) => {
    const r = finite.safeParse(snap[key]);
    return r.success ? r.data : fallback;
  };

  const storedId = text.safeParse(snap["account.id"]);
  const accountId = options.accountId ?? (storedId.success ? storedId.data : "local");
  const game = createGame(accountId, options.universe);
  const { account, assets } = game;

  for (const key of ACCOUNT_NUMBERS) account[key] = num(key, account[key]);
  for (const key of STAT_KEYS) account.stats[key] = num(`stat.${key}`, account.stats[key]);

  const positions: Record<string, Partial<Position>> = {};
  const histories: Record<string, Map<number, number>> = {};
  const transactions = new Map<number, Partial<Transaction>>();

  for (const [key, value] of Object.entries(snap)) {
    let m = /^position\.(.+)\.(quantity|avgCost)$/.exec(key);
    if (m) {
      const [, symbol = "", field] = m;
      const n = finite.safeParse(value);
      if (!n.success) continue;
      const entry = positions[symbol] ?? (positions[symbol] = {});
      if (field === "quantity") entry.quantity = n.data;
      else entry.avgCost = n.data;
      continue;
    }

    m = /^asset\.([^.]+)\.(price|nextDividendDay|drip|history\.(\d+)|base\.(.+))$/.exec(key);
    if (m) {
      const [, symbol = "", field = "", index, component] = m;
      const asset = assets[symbol];
      if (!asset) continue;
      if (field === "drip") {
        const b = flag.safeParse(value);
        if (b.success) asset.drip = b.data;
        continue;
      }
      const n = finite.safeParse(value);
      if (!n.success) continue;
      if (field === "price" && n.data > 0) asset.price = n.data;
      else if (field === "nextDividendDay") asset.nextDividendDay = n.data;
      else if (index !== undefined) (histories[symbol] ?? (histories[symbol] = new Map())).set(Number(index), n.data);
      else if (component !== undefined && asset.basePrices && n.data > 0) asset.basePrices[component] = n.data;
      continue;
    }

    m = /^tx\.(\d+)\.(day|description|amount)$/.exec(key);
    if (m) {
      const [, index = "0", field] = m;
      const entry = transactions.get(Number(index)) ?? {};
      if (field === "description") {
        const s = text.safeParse(value);
        if (s.success) entry.description = s.data;
      } else {
        const n = finite.safeParse(value);
        if (n.success) entry[field === "day" ? "day" : "amount"] = n.data;
      }
      transactions.set(Number(index), entry);
      continue;
    }

    if (key.startsWith("achievement.")) {
      const s = text.safeParse(value);
      if (s.success) account.achievements[key.slice("achievement.".length)] = s.data;
      continue;
    }

    if (key.startsWith("meta.")) {
      if (value === null || typeof value === "string" || typeof value === "boolean" || typeof value === "number") {
        account.meta[key.slice("meta.".length)] = value;
      }
    }
  }

  for (const [symbol, p] of Object.entries(positions)) {
    const asset = assets[symbol];
    if (!asset || p.quantity === undefined || p.quantity <= 0) continue;
    account.positions[symbol] = { quantity: p.quantity, avgCost: p.avgCost ?? asset.price };
  }

  for (const asset of Object.values(assets)) {
    const points = histories[asset.symbol];
    asset.history = points
      ? [...points.entries()].sort((a, b) => a[0] - b[0]).map(([, price]) => price)
      : [asset.price];
  }

  account.transactions = [...transactions.entries()]
    .sort((a, b) => a[0] - b[0])
    .flatMap(([, tx]) =>
      tx.description !== undefined && tx.amount !== undefined
        ? [{ day: tx.day ?? 0, description: tx.description, amount: tx.amount }]
        : [],
    );

  return game;
}
