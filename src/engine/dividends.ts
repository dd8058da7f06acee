import { dividendLogger } from "../logger";
import { EngineError, errorMessage } from "./errors";
import { applyBuy, logTransaction } from "./ledger";
import type { Account, Asset, GameState } from "./types";

export interface DividendPayout {
  symbol: string;
  day: number;
  amount: number;
  reinvestedShares: number;
  reinvestedCost: number;
  cashCredited: number;
}

function assertSchedulable(asset: Asset) {
  if (!Number.isInteger(asset.dividendInterval) || asset.dividendInterval <= 0) {
    throw new EngineError("ValidationError", `Intervalle de dividende invalide: ${asset.dividendInterval}`);
  }
  if (!Number.isFinite(asset.dividendPerShare) || asset.dividendPerShare < 0) {
    throw new EngineError("ValidationError", `Dividende par action invalide: ${asset.dividendPerShare}`);
  }
  if (!Number.isFinite(asset.nextDividendDay)) {
    throw new EngineError("ValidationError", `Prochain dividende invalide: ${asset.nextDividendDay}`);
  }
}

function payAsset(account: Account, asset: Asset, currentDay: number): DividendPayout | null {
  assertSchedulable(asset);
  if (currentDay < asset.nextDividendDay) return null;

  const position = account.positions[asset.symbol];
  const dividend = position && asset.dividendPerShare > 0 ? position.quantity * asset.dividendPerShare : 0;
  let reinvestedShares = 0;
  let reinvestedCost = 0;
  let cashCredited = 0;

  if (dividend > 0) {
    logTransaction(account, `Dividende ${asset.symbol}`, dividend, currentDay);
    if (asset.drip && asset.price > 0) {
      reinvestedShares = Math.floor(dividend / asset.price);
      if (reinvestedShares > 0) {
        reinvestedCost = reinvestedShares * asset.price;
        applyBuy(account, asset.symbol, reinvestedShares, asset.price, {
          debitCash: false,
          day: currentDay,
          description: `DRIP ${reinvestedShares} ${asset.symbol} @ ${asset.price.toFixed(2)}`,
        });
      }
      cashCredited = dividend - reinvestedCost;
    } else {
      cashCredited = dividend;
    }
    account.cash += cashCredited;
    account.stats.dividendsReceived += dividend;
    account.stats.dripShares += reinvestedShares;
  }

  // Avance d'un seul intervalle, même sans versement; pas de rattrapage
  asset.nextDividendDay = currentDay + asset.dividendInterval;
  if (dividend <= 0) return null;
  return { symbol: asset.symbol, day: currentDay, amount: dividend, reinvestedShares, reinvestedCost, cashCredited };
}

/**
 * Versements du jour, actif par actif. Un actif mal configuré est journalisé
 * puis ignoré; les autres sont traités normalement.
 */
export function processDay(game: GameState, currentDay: number = game.account.day): DividendPayout[] {
  const payouts: DividendPayout[] = [];
  for (const asset of Object.values(game.assets)) {
    try {
      const payout = payAsset(game.account, asset, currentDay);
      if (payout) payouts.push(payout);
    } catch (err) {
      dividendLogger.warn({ symbol: asset.symbol, day: currentDay, err: errorMessage(err) }, "dividende ignoré");
    }
  }
  return payouts;
}

export function setDrip(game: GameState, symbol: string, enabled: boolean): boolean {
  const asset = game.assets[symbol];
  if (!asset) return false;
  asset.drip = enabled;
  return true;
}
