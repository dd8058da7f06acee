import { MINED_ASSET } from "../shared/constants";
import type { Account, Asset, AssetBook, GameState, Position } from "./types";

export type TradeAction = "buy" | "sell";

export type OrderErrorKind =
  | "InvalidQuantity"
  | "InvalidPrice"
  | "UnknownAsset"
  | "InsufficientFunds"
  | "InsufficientHoldings";

export interface Order {
  symbol: string;
  quantity: number;
  price: number;
  action: TradeAction;
}

export type OrderCheck =
  | { ok: true; asset: Asset }
  | { ok: false; error: OrderErrorKind; message: string };

export type TradeResult =
  | {
      ok: true;
      action: TradeAction;
      symbol: string;
      quantity: number;
      price: number;
      // signé: négatif pour un achat
      amount: number;
      position: Position | null;
      description: string;
    }
  | { ok: false; error: OrderErrorKind; message: string };

const fmt = (n: number) => n.toFixed(2);

function reject(error: OrderErrorKind, message: string): { ok: false; error: OrderErrorKind; message: string } {
  return { ok: false, error, message };
}

export function validateOrder(assets: AssetBook, account: Account, order: Order): OrderCheck {
  if (!Number.isFinite(order.quantity) || order.quantity <= 0) return reject("InvalidQuantity", "Quantité invalide");
  const asset = assets[order.symbol];
  if (!asset) return reject("UnknownAsset", `Actif inconnu: ${order.symbol}`);
  if (!Number.isFinite(order.price) || order.price <= 0) return reject("InvalidPrice", "Prix invalide");
  if (order.action === "buy") {
    if (order.quantity * order.price > account.cash) return reject("InsufficientFunds", "Cash insuffisant");
  } else {
    const position = account.positions[order.symbol];
    if (!position || order.quantity > position.quantity) return reject("InsufficientHoldings", "Position insuffisante");
  }
  return { ok: true, asset };
}

export function logTransaction(account: Account, description: string, amount: number, day: number = account.day) {
  account.transactions.push({ day, description, amount });
}

/**
 * Chemin d'achat interne, sans contrôle de cash: utilisé après validation
 * et par le réinvestissement des dividendes (debitCash: false).
 */
export function applyBuy(
  account: Account,
  symbol: string,
  quantity: number,
  price: number,
  opts: { debitCash?: boolean; description?: string; day?: number } = {},
): Position {
  const cost = quantity * price;
  if (opts.debitCash ?? true) account.cash -= cost;
  const existing = account.positions[symbol];
  const newQuantity = (existing?.quantity ?? 0) + quantity;
  const newAvgCost = existing ? (existing.quantity * existing.avgCost + cost) / newQuantity : price;
  const position: Position = { quantity: newQuantity, avgCost: newAvgCost };
  account.positions[symbol] = position;
  logTransaction(account, opts.description ?? `Achat ${quantity} ${symbol} @ ${fmt(price)}`, -cost, opts.day);
  return position;
}

export function executeBuy(game: GameState, symbol: string, quantity: number, price?: number): TradeResult {
  const { account, assets } = game;
  const unitPrice = price ?? assets[symbol]?.price ?? Number.NaN;
  const check = validateOrder(assets, account, { symbol, quantity, price: unitPrice, action: "buy" });
  if (!check.ok) return check;
  const position = applyBuy(account, symbol, quantity, unitPrice);
  account.stats.tradeCount += 1;
  return {
    ok: true,
    action: "buy",
    symbol,
    quantity,
    price: unitPrice,
    amount: -(quantity * unitPrice),
    position: { ...position },
    description: `Achat de ${quantity} ${symbol} à ${fmt(unitPrice)} $`,
  };
}

export function executeSell(game: GameState, symbol: string, quantity: number, price?: number): TradeResult {
  const { account, assets } = game;
  const unitPrice = price ?? assets[symbol]?.price ?? Number.NaN;
  const check = validateOrder(assets, account, { symbol, quantity, price: unitPrice, action: "sell" });
  if (!check.ok) return check;
  const position = account.positions[symbol];
  if (!position) return reject("InsufficientHoldings", "Position insuffisante");

  const proceeds = quantity * unitPrice;
  const remaining = position.quantity - quantity;
  account.cash += proceeds;
  // Coût moyen inchangé sur le reliquat
  if (remaining <= 0) {
    delete account.positions[symbol];
  } else {
    position.quantity = remaining;
  }
  account.stats.tradeCount += 1;
  account.stats.bestSaleGain = Math.max(account.stats.bestSaleGain, (unitPrice - position.avgCost) * quantity);
  logTransaction(account, `Vente ${quantity} ${symbol} @ ${fmt(unitPrice)}`, proceeds);
  return {
    ok: true,
    action: "sell",
    symbol,
    quantity,
    price: unitPrice,
    amount: proceeds,
    position: remaining <= 0 ? null : { ...position },
    description: `Vente de ${quantity} ${symbol} à ${fmt(unitPrice)} $`,
  };
}

export function portfolioValue(account: Account, assets: AssetBook): number {
  let total = 0;
  for (const [symbol, position] of Object.entries(account.positions)) {
    const asset = assets[symbol];
    if (asset) total += position.quantity * asset.price;
  }
  return total;
}

export function minedValue(account: Account, assets: AssetBook): number {
  return account.minedBalance * (assets[MINED_ASSET]?.price ?? 0);
}

// Épargne et minage comptent comme des actifs; sans eux: cash + portefeuille - emprunt
export function netWorth(account: Account, assets: AssetBook): number {
  return account.cash + account.savings + portfolioValue(account, assets) + minedValue(account, assets) - account.loan;
}

export interface UnrealizedLine {
  symbol: string;
  quantity: number;
  avgCost: number;
  price: number;
  marketValue: number;
  costBasis: number;
  gain: number;
}

export function unrealizedGainLoss(account: Account, assets: AssetBook): { lines: UnrealizedLine[]; total: number } {
  const lines: UnrealizedLine[] = [];
  for (const [symbol, position] of Object.entries(account.positions)) {
    const asset = assets[symbol];
    if (!asset) continue;
    const marketValue = position.quantity * asset.price;
    const costBasis = position.quantity * position.avgCost;
    lines.push({
      symbol,
      quantity: position.quantity,
      avgCost: position.avgCost,
      price: asset.price,
      marketValue,
      costBasis,
      gain: marketValue - costBasis,
    });
  }
  return { lines, total: lines.reduce((sum, l) => sum + l.gain, 0) };
}
