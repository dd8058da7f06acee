import { achievementLogger } from "../logger";
import { MINED_ASSET } from "../shared/constants";
import { errorMessage } from "./errors";
import type { EngineEvent } from "./events";
import { netWorth, portfolioValue } from "./ledger";
import type { Account, AssetBook, AssetCategory, DeepReadonly, GameState } from "./types";

export type Rarity = "common" | "rare" | "epic" | "legendary";

export interface AchievementContext {
  account: DeepReadonly<Account>;
  assets: DeepReadonly<AssetBook>;
  netWorth: number;
  portfolioValue: number;
}

export type AchievementPredicate = (ctx: AchievementContext) => boolean;

export interface AchievementDefinition {
  key: string;
  name: string;
  description: string;
  category: string;
  points: number;
  rarity: Rarity;
  // Déclarés mais non vérifiés à l'évaluation
  prerequisites: readonly string[];
  predicate: AchievementPredicate;
}

export interface UnlockedAchievement {
  key: string;
  name: string;
  description: string;
  category: string;
  points: number;
  rarity: Rarity;
  unlockedAt: string;
}

export class AchievementRegistry {
  private readonly entries = new Map<string, AchievementDefinition>();

  constructor(definitions: readonly AchievementDefinition[] = []) {
    for (const def of definitions) this.register(def);
  }

  register(def: AchievementDefinition): this {
    if (this.entries.has(def.key)) throw new Error(`Succès déjà enregistré: ${def.key}`);
    this.entries.set(def.key, def);
    return this;
  }

  get(key: string): AchievementDefinition | undefined {
    return this.entries.get(key);
  }

  list(): AchievementDefinition[] {
    return [...this.entries.values()];
  }

  get size() {
    return this.entries.size;
  }
}

const EQUITIES: readonly AssetCategory[] = ["tech", "primaire", "services"];

function heldIn(ctx: AchievementContext, categories: readonly AssetCategory[]) {
  return Object.entries(ctx.account.positions).filter(([symbol, p]) => {
    const asset = ctx.assets[symbol];
    return p.quantity > 0 && asset !== undefined && categories.includes(asset.category);
  });
}

function equityValue(ctx: AchievementContext) {
  return heldIn(ctx, EQUITIES).reduce((sum, [symbol, p]) => sum + p.quantity * (ctx.assets[symbol]?.price ?? 0), 0);
}

function cryptoUnits(ctx: AchievementContext) {
  return (ctx.account.positions[MINED_ASSET]?.quantity ?? 0) + ctx.account.minedBalance;
}

function def(
  key: string,
  name: string,
  description: string,
  category: string,
  points: number,
  rarity: Rarity,
  predicate: AchievementPredicate,
  prerequisites: readonly string[] = [],
): AchievementDefinition {
  return { key, name, description, category, points, rarity, prerequisites, predicate };
}

export const DEFAULT_ACHIEVEMENTS: readonly AchievementDefinition[] = [
  // Actions
  def("first_stock", "Premier placement", "Acheter une première action", "actions", 10, "common", (c) => heldIn(c, EQUITIES).length > 0),
  def("stock_portfolio_5", "Portefeuille élargi", "Détenir 5 actions différentes", "actions", 25, "common", (c) => heldIn(c, EQUITIES).length >= 5, ["first_stock"]),
  def("all_sectors", "Tous secteurs", "Détenir une action de chaque secteur", "actions", 30, "rare", (c) => {
    const sectors = new Set(heldIn(c, EQUITIES).map(([symbol]) => c.assets[symbol]?.category));
    return EQUITIES.every((cat) => sectors.has(cat));
  }, ["first_stock"]),
  def("stock_millionaire", "Millionnaire boursier", "Actions d'une valeur de 1 000 000 $", "actions", 100, "rare", (c) => equityValue(c) >= 1_000_000),

  // Crypto
  def("btc_first", "Premier bitcoin", "Détenir du bitcoin (acheté ou miné)", "crypto", 15, "common", (c) => cryptoUnits(c) > 0),
  def("btc_whale", "Baleine", "Bitcoin d'une valeur de 100 000 $", "crypto", 75, "epic", (c) => cryptoUnits(c) * (c.assets[MINED_ASSET]?.price ?? 0) >= 100_000, ["btc_first"]),
  def("miner", "Mineur", "Acheter une première machine de minage", "crypto", 15, "common", (c) => c.account.hashrate > 0),

  // Fonds
  def("fund_first", "Premier fonds", "Acheter une part de fonds", "fonds", 10, "common", (c) => heldIn(c, ["fonds"]).length > 0),
  def("fund_diversified", "Diversifié", "Détenir tous les fonds sectoriels", "fonds", 40, "rare", (c) => {
    const funds = Object.values(c.assets).filter((a) => a.category === "fonds");
    return funds.length > 0 && funds.every((a) => (c.account.positions[a.symbol]?.quantity ?? 0) > 0);
  }, ["fund_first"]),

  // Patrimoine
  def("rich", "Cap des 10 000", "Valeur nette de 10 000 $", "patrimoine", 10, "common", (c) => c.netWorth >= 10_000),
  def("wealthy", "Aisé", "Valeur nette de 100 000 $", "patrimoine", 30, "common", (c) => c.netWorth >= 100_000, ["rich"]),
  def("millionaire", "Millionnaire", "Valeur nette de 1 000 000 $", "patrimoine", 100, "rare", (c) => c.netWorth >= 1_000_000, ["wealthy"]),
  def("multimillionaire", "Multimillionnaire", "Valeur nette de 10 000 000 $", "patrimoine", 200, "epic", (c) => c.netWorth >= 10_000_000, ["millionaire"]),
  def("billionaire", "Magnat", "Valeur nette de 100 000 000 $", "patrimoine", 500, "legendary", (c) => c.netWorth >= 100_000_000, ["multimillionaire"]),
  def("saver", "Épargnant", "10 000 $ en épargne", "patrimoine", 20, "common", (c) => c.account.savings >= 10_000),

  // Banque
  def("payoff_loan", "Dette soldée", "Rembourser entièrement un emprunt", "banque", 25, "common", (c) => c.account.stats.loansRepaid >= 1),
  def("debt_free", "Libre de dettes", "Rembourser trois emprunts et n'en avoir aucun", "banque", 50, "rare", (c) => c.account.stats.loansRepaid >= 3 && c.account.loan === 0, ["payoff_loan"]),

  // Dividendes
  def("first_dividend", "Premier dividende", "Recevoir un dividende", "dividendes", 10, "common", (c) => c.account.stats.dividendsReceived > 0),
  def("dividend_collector", "Rentier", "Recevoir 10 000 $ de dividendes", "dividendes", 60, "rare", (c) => c.account.stats.dividendsReceived >= 10_000, ["first_dividend"]),
  def("drip_investor", "Réinvestisseur", "Réinvestir un dividende en actions", "dividendes", 20, "common", (c) => c.account.stats.dripShares >= 1, ["first_dividend"]),

  // Progression
  def("survivor", "Survivant", "Atteindre le jour 100", "progression", 25, "common", (c) => c.account.day >= 100),
  def("veteran", "Vétéran", "Atteindre le jour 365", "progression", 75, "rare", (c) => c.account.day >= 365, ["survivor"]),
  def("decade", "Décennie", "Atteindre le jour 3 650", "progression", 250, "legendary", (c) => c.account.day >= 3650, ["veteran"]),

  // Trading
  def("active_trader", "Actif", "Effectuer 100 transactions", "trading", 30, "common", (c) => c.account.stats.tradeCount >= 100),
  def("trading_master", "Maître du marché", "Effectuer 1 000 transactions", "trading", 75, "epic", (c) => c.account.stats.tradeCount >= 1000, ["active_trader"]),
  def("jackpot", "Gros lot", "Gagner 100 000 $ sur une seule vente", "trading", 100, "epic", (c) => c.account.stats.bestSaleGain >= 100_000),
];

export const defaultRegistry = new AchievementRegistry(DEFAULT_ACHIEVEMENTS);

export function buildContext(game: GameState): AchievementContext {
  return {
    account: game.account,
    assets: game.assets,
    netWorth: netWorth(game.account, game.assets),
    portfolioValue: portfolioValue(game.account, game.assets),
  };
}

/**
 * Évalue les succès non encore débloqués. Un succès débloqué ne l'est qu'une
 * fois; un prédicat qui lève est journalisé et compte comme non satisfait.
 */
export function check(game: GameState, registry: AchievementRegistry = defaultRegistry, now: Date = new Date()): UnlockedAchievement[] {
  const ctx = buildContext(game);
  const unlocked: UnlockedAchievement[] = [];
  const unlockedAt = now.toISOString();
  for (const achievement of registry.list()) {
    if (game.account.achievements[achievement.key] !== undefined) continue;
    let satisfied = false;
    try {
      satisfied = achievement.predicate(ctx) === true;
    } catch (err) {
      achievementLogger.warn({ key: achievement.key, kind: "PredicateError", err: errorMessage(err) }, "prédicat en échec");
    }
    if (!satisfied) continue;
    game.account.achievements[achievement.key] = unlockedAt;
    unlocked.push({
      key: achievement.key,
      name: achievement.name,
      description: achievement.description,
      category: achievement.category,
      points: achievement.points,
      rarity: achievement.rarity,
      unlockedAt,
    });
  }
  return unlocked;
}

export function unlockEvents(unlocked: readonly UnlockedAchievement[]): EngineEvent[] {
  return unlocked.map((a): EngineEvent => ({
    type: "achievement:unlocked",
    at: a.unlockedAt,
    key: a.key,
    name: a.name,
    category: a.category,
    points: a.points,
    rarity: a.rarity,
  }));
}

export interface AchievementSummary {
  total: number;
  unlocked: number;
  completionRate: number;
  points: number;
  categories: Record<string, { total: number; unlocked: number }>;
  rarities: Record<string, number>;
  achievements: (Omit<AchievementDefinition, "predicate"> & { unlockedAt: string | null })[];
}

export function summarize(account: Account, registry: AchievementRegistry = defaultRegistry): AchievementSummary {
  const summary: AchievementSummary = { total: registry.size, unlocked: 0, completionRate: 0, points: 0, categories: {}, rarities: {}, achievements: [] };
  for (const { predicate: _predicate, ...meta } of registry.list()) {
    const unlockedAt = account.achievements[meta.key] ?? null;
    const category = summary.categories[meta.category] ?? (summary.categories[meta.category] = { total: 0, unlocked: 0 });
    category.total += 1;
    summary.rarities[meta.rarity] = (summary.rarities[meta.rarity] ?? 0) + 1;
    if (unlockedAt !== null) {
      summary.unlocked += 1;
      summary.points += meta.points;
      category.unlocked += 1;
    }
    summary.achievements.push({ ...meta, unlockedAt });
  }
  summary.completionRate = summary.total > 0 ? Number(((summary.unlocked / summary.total) * 100).toFixed(1)) : 0;
  return summary;
}
