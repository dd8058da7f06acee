import { DEFAULT_HISTORY_CAP } from "../shared/constants";
import { check, defaultRegistry, unlockEvents, type AchievementRegistry, type UnlockedAchievement } from "./achievements";
import { accrueDaily, isBankrupt, rebirth, type AccrualReport } from "./bank";
import { processDay, type DividendPayout } from "./dividends";
import type { EngineEvent } from "./events";
import { netWorth } from "./ledger";
import { advanceMarket, applyPrices } from "./priceModel";
import type { Rng } from "./rng";
import type { GameState, Prices } from "./types";

export interface DayOptions {
  rng: Rng;
  // Prix du marché partagé; sinon le modèle local fait avancer les prix
  prices?: Prices;
  historyCap?: number;
  registry?: AchievementRegistry;
  now?: Date;
}

export interface DayReport {
  day: number;
  prices: Prices;
  accrual: AccrualReport;
  dividends: DividendPayout[];
  unlocked: UnlockedAchievement[];
  reborn: boolean;
  netWorth: number;
  events: EngineEvent[];
}

/** Une journée complète: prix, compteur, intérêts, dividendes, faillite, succès. */
export function runDay(game: GameState, options: DayOptions): DayReport {
  const historyCap = options.historyCap ?? DEFAULT_HISTORY_CAP;
  const now = options.now ?? new Date();
  const prices = options.prices
    ? applyPrices(game.assets, options.prices, options.rng, historyCap)
    : advanceMarket(game.assets, options.rng, historyCap);

  game.account.day += 1;
  const day = game.account.day;
  const accrual = accrueDaily(game.account);
  const dividends = processDay(game, day);
  const reborn = isBankrupt(game.account);
  if (reborn) rebirth(game.account);
  const unlocked = check(game, options.registry ?? defaultRegistry, now);
  const worth = netWorth(game.account, game.assets);

  const at = now.toISOString();
  const events: EngineEvent[] = dividends.map((d): EngineEvent => ({
    type: "dividend:paid",
    at,
    symbol: d.symbol,
    day: d.day,
    amount: d.amount,
    reinvestedShares: d.reinvestedShares,
  }));
  if (reborn) events.push({ type: "account:reborn", at, day, rebirths: game.account.stats.rebirths });
  events.push(...unlockEvents(unlocked), { type: "day:completed", at, day, netWorth: worth });
  return { day, prices, accrual, dividends, unlocked, reborn, netWorth: worth, events };
}
