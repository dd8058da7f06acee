import {
  ASSET_UNIVERSE,
  DEPOSIT_INTEREST_RATE,
  DIVIDEND_INTERVAL_DAYS,
  INITIAL_CASH,
  LOAN_INTEREST_RATE,
} from "../shared/constants";
import type { Account, Asset, AssetBook, AssetDefinition, GameState } from "./types";

export function createAsset(def: AssetDefinition): Asset {
  const interval = def.dividendInterval ?? DIVIDEND_INTERVAL_DAYS;
  return {
    symbol: def.symbol,
    name: def.name,
    category: def.category,
    price: def.initialPrice,
    floor: def.floor,
    volatility: def.volatility,
    history: [def.initialPrice],
    dividendPerShare: def.dividendPerShare,
    dividendInterval: interval,
    nextDividendDay: def.firstDividendDay ?? interval,
    drip: false,
  };
}

/**
 * Construit le carnet d'actifs. Les fonds capturent le prix de leurs
 * composantes à la création: c'est la base de calcul de leur valeur liquidative.
 */
export function createAssetBook(universe: readonly AssetDefinition[] = ASSET_UNIVERSE): AssetBook {
  const book: AssetBook = {};
  for (const def of universe) book[def.symbol] = createAsset(def);
  for (const asset of Object.values(book)) {
    if (asset.volatility.kind !== "basket") continue;
    const basePrices: Record<string, number> = {};
    for (const component of Object.keys(asset.volatility.weights)) {
      const c = book[component];
      if (c) basePrices[component] = c.price;
    }
    asset.basePrices = basePrices;
  }
  return book;
}

export function createAccount(id: string): Account {
  return {
    id,
    cash: INITIAL_CASH,
    savings: 0,
    loan: 0,
    loanInterestRate: LOAN_INTEREST_RATE,
    depositInterestRate: DEPOSIT_INTEREST_RATE,
    positions: {},
    transactions: [],
    day: 0,
    hashrate: 0,
    minedBalance: 0,
    stats: { tradeCount: 0, bestSaleGain: 0, dividendsReceived: 0, dripShares: 0, loansRepaid: 0, rebirths: 0 },
    achievements: {},
    meta: {},
  };
}

export function createGame(accountId: string, universe?: readonly AssetDefinition[]): GameState {
  return { account: createAccount(accountId), assets: createAssetBook(universe) };
}
