import { DEFAULT_HISTORY_CAP, MIN_PRICE } from "../shared/constants";
import { randn, type Rng } from "./rng";
import type { Asset, AssetBook, Prices, VolatilityProfile } from "./types";

export function roundPrice(value: number): number {
  return Number(value.toFixed(2));
}

export function pushHistory(asset: Asset, price: number, cap: number = DEFAULT_HISTORY_CAP) {
  asset.history.push(price);
  const excess = asset.history.length - Math.max(1, cap);
  if (excess > 0) asset.history.splice(0, excess);
}

/** ε tiré selon le profil; un fonds ne bouge que via ses composantes. */
export function drawPerturbation(profile: VolatilityProfile, rng: Rng): number {
  switch (profile.kind) {
    case "gaussian":
      return randn(rng) * profile.sigma;
    case "uniform":
      return (rng() * 2 - 1) * profile.band;
    case "basket":
      return 0;
  }
}

export function nextPrice(asset: Pick<Asset, "price" | "floor">, epsilon: number): number {
  const candidate = roundPrice(asset.price * (1 + epsilon));
  return Math.max(asset.floor ?? MIN_PRICE, candidate);
}

export function advance(asset: Asset, rng: Rng, historyCap?: number): number {
  const price = nextPrice(asset, drawPerturbation(asset.volatility, rng));
  asset.price = price;
  pushHistory(asset, price, historyCap);
  return price;
}

/**
 * Valeur liquidative: 100 * Σ w·(p / base), normalisée par Σ w.
 * Une base absente ou nulle est recapturée au prix courant.
 */
export function fundNav(fund: Asset, assets: AssetBook): number {
  if (fund.volatility.kind !== "basket") return fund.price;
  const bases = fund.basePrices ?? (fund.basePrices = {});
  let total = 0;
  let weightSum = 0;
  for (const [symbol, weight] of Object.entries(fund.volatility.weights)) {
    const component = assets[symbol];
    if (!component || weight <= 0) continue;
    const base = bases[symbol];
    if (base === undefined || !(base > 0)) bases[symbol] = component.price;
    total += weight * (component.price / (bases[symbol] ?? component.price));
    weightSum += weight;
  }
  if (weightSum <= 0) return fund.price;
  return Math.max(fund.floor ?? MIN_PRICE, roundPrice((100 * total) / weightSum));
}

export function recomputeFundNav(fund: Asset, assets: AssetBook, historyCap?: number): number {
  const nav = fundNav(fund, assets);
  fund.price = nav;
  pushHistory(fund, nav, historyCap);
  return nav;
}

/** Avance tout le marché d'un jour: actifs simples puis fonds. */
export function advanceMarket(assets: AssetBook, rng: Rng, historyCap?: number): Prices {
  const prices: Prices = {};
  const funds: Asset[] = [];
  for (const asset of Object.values(assets)) {
    if (asset.volatility.kind === "basket") {
      funds.push(asset);
      continue;
    }
    prices[asset.symbol] = advance(asset, rng, historyCap);
  }
  for (const fund of funds) prices[fund.symbol] = recomputeFundNav(fund, assets, historyCap);
  return prices;
}

/**
 * Applique des prix calculés ailleurs (marché partagé). Les symboles absents
 * avancent localement; les fonds sont toujours recalculés ensuite.
 */
export function applyPrices(assets: AssetBook, prices: Prices, rng: Rng, historyCap?: number): Prices {
  const applied: Prices = {};
  const funds: Asset[] = [];
  for (const asset of Object.values(assets)) {
    if (asset.volatility.kind === "basket") {
      funds.push(asset);
      continue;
    }
    const external = prices[asset.symbol];
    if (external !== undefined && Number.isFinite(external) && external > 0) {
      const price = Math.max(asset.floor ?? MIN_PRICE, roundPrice(external));
      asset.price = price;
      pushHistory(asset, price, historyCap);
      applied[asset.symbol] = price;
    } else {
      applied[asset.symbol] = advance(asset, rng, historyCap);
    }
  }
  for (const fund of funds) applied[fund.symbol] = recomputeFundNav(fund, assets, historyCap);
  return applied;
}

export function lastReturn(asset: Asset): number {
  const n = asset.history.length;
  if (n < 2) return 0;
  const prev = asset.history[n - 2];
  const last = asset.history[n - 1];
  if (prev === undefined || last === undefined || prev <= 0) return 0;
  return (last - prev) / prev;
}
