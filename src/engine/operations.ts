import { check, unlockEvents, type AchievementRegistry, type UnlockedAchievement } from "./achievements";
import { bankOperation, buyMiner, loanLimit, sellMined, type BankAction, type BankResult } from "./bank";
import { setDrip } from "./dividends";
import type { EngineEvent } from "./events";
import { executeBuy, executeSell, netWorth, portfolioValue, unrealizedGainLoss, type TradeAction, type TradeResult } from "./ledger";
import type { GameState } from "./types";

export interface AccountView {
  id: string;
  day: number;
  cash: number;
  savings: number;
  loan: number;
  loanLimit: number;
  hashrate: number;
  minedBalance: number;
  portfolioValue: number;
  netWorth: number;
  unrealizedGain: number;
  positions: { symbol: string; quantity: number; avgCost: number; price: number; marketValue: number; gain: number }[];
  drip: string[];
  achievements: number;
  rebirths: number;
  transactions: { day: number; description: string; amount: number }[];
}

export type OperationResult<R> =
  | (R & { ok: true; unlocked: UnlockedAchievement[]; account: AccountView })
  | { ok: false; error: string; message: string };

/** Résultat d'une opération joueur, avant persistance et diffusion. */
export interface Applied<R> {
  result: OperationResult<R>;
  changed: boolean;
  events: EngineEvent[];
}

export interface OperationContext {
  registry: AchievementRegistry;
  now: Date;
}

export type TradeOutcome = Omit<Extract<TradeResult, { ok: true }>, "ok">;
export type BankOutcome = Omit<Extract<BankResult, { ok: true }>, "ok">;
export type DripOutcome = { symbol: string; enabled: boolean };

const RECENT_TRANSACTIONS = 50;

export function viewOf(game: GameState): AccountView {
  const { account, assets } = game;
  const unrealized = unrealizedGainLoss(account, assets);
  return {
    id: account.id,
    day: account.day,
    cash: account.cash,
    savings: account.savings,
    loan: account.loan,
    loanLimit: loanLimit(game),
    hashrate: account.hashrate,
    minedBalance: account.minedBalance,
    portfolioValue: portfolioValue(account, assets),
    netWorth: netWorth(account, assets),
    unrealizedGain: unrealized.total,
    positions: unrealized.lines.map((l) => ({
      symbol: l.symbol,
      quantity: l.quantity,
      avgCost: l.avgCost,
      price: l.price,
      marketValue: l.marketValue,
      gain: l.gain,
    })),
    drip: Object.values(assets).filter((a) => a.drip).map((a) => a.symbol),
    achievements: Object.keys(account.achievements).length,
    rebirths: account.stats.rebirths,
    transactions: account.transactions.slice(-RECENT_TRANSACTIONS),
  };
}

function rejected<R>(result: { error: string; message: string }): Applied<R> {
  return { result: { ok: false, error: result.error, message: result.message }, changed: false, events: [] };
}

// Après toute opération acceptée: évaluation des succès, puis vue du compte
function settle<R extends object>(game: GameState, outcome: R, ctx: OperationContext, events: EngineEvent[] = []): Applied<R> {
  const unlocked = check(game, ctx.registry, ctx.now);
  const result: OperationResult<R> = { ...outcome, ok: true, unlocked, account: viewOf(game) };
  return {
    result,
    changed: true,
    events: [...events, ...unlockEvents(unlocked)],
  };
}

export function applyTrade(
  game: GameState,
  order: { symbol: string; quantity: number; action: TradeAction },
  ctx: OperationContext,
): Applied<TradeOutcome> {
  const result = order.action === "buy"
    ? executeBuy(game, order.symbol, order.quantity)
    : executeSell(game, order.symbol, order.quantity);
  if (!result.ok) return rejected<TradeOutcome>(result);
  const { ok: _ok, ...outcome } = result;
  const trade: EngineEvent = {
    type: "trade",
    at: ctx.now.toISOString(),
    action: result.action,
    symbol: result.symbol,
    quantity: result.quantity,
    price: result.price,
  };
  return settle(game, outcome, ctx, [trade]);
}

function applyBankResult(game: GameState, result: BankResult, ctx: OperationContext): Applied<BankOutcome> {
  if (!result.ok) return rejected<BankOutcome>(result);
  const { ok: _ok, ...outcome } = result;
  return settle(game, outcome, ctx);
}

export function applyBank(game: GameState, action: BankAction, amount: number, ctx: OperationContext) {
  return applyBankResult(game, bankOperation(game, action, amount), ctx);
}

export function applyBuyMiner(game: GameState, kh: number, ctx: OperationContext) {
  return applyBankResult(game, buyMiner(game.account, kh), ctx);
}

export function applySellMined(game: GameState, amount: number, ctx: OperationContext) {
  return applyBankResult(game, sellMined(game, amount), ctx);
}

export function applyDrip(game: GameState, symbol: string, enabled: boolean, ctx: OperationContext): Applied<DripOutcome> {
  if (!setDrip(game, symbol, enabled)) {
    return rejected<DripOutcome>({ error: "UnknownAsset", message: `Actif inconnu: ${symbol}` });
  }
  return settle(game, { symbol, enabled }, ctx);
}
