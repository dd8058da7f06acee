import type { AssetDefinition } from "../engine/types";

export const INITIAL_CASH = 1_000; // 1 000 $

// Taux journaliers (1 tick = 1 jour de jeu)
export const DEPOSIT_INTEREST_RATE = 0.01;
export const LOAN_INTEREST_RATE = 0.005;

// Plafond d'emprunt: 5x les actifs (hors emprunt)
export const LOAN_LIMIT_MULTIPLIER = 5;

// Actions "classiques": marche aléatoire uniforme dans ±1 %
export const STANDARD_BAND = 0.01;

// Crypto: gaussienne, plancher pour ne jamais tomber à zéro
export const BTC_SIGMA = 0.03;
export const BTC_FLOOR = 10_000;

// Minage: BTC produit par kh de puissance et par jour
export const MINED_PER_HASHRATE = 0.001;
export const MINER_PRICE_PER_KH = 500;
export const MINED_ASSET = "BTC";

export const DIVIDEND_INTERVAL_DAYS = 30;
export const DEFAULT_HISTORY_CAP = 250;
export const MIN_PRICE = 0.01;

// Ordre important: les fonds sont recalculés après leurs composantes
export const ASSET_UNIVERSE: readonly AssetDefinition[] = [
  { symbol: "TECHNO", name: "Technopuce", category: "tech", initialPrice: 100, volatility: { kind: "uniform", band: STANDARD_BAND }, dividendPerShare: 1 },
  { symbol: "ASSEMB", name: "Assemblage Nord", category: "tech", initialPrice: 80, volatility: { kind: "uniform", band: STANDARD_BAND }, dividendPerShare: 1 },
  { symbol: "LOGIC", name: "Logicrée", category: "tech", initialPrice: 120, volatility: { kind: "uniform", band: STANDARD_BAND }, dividendPerShare: 1 },
  { symbol: "MINES", name: "Mines du Bouclier", category: "primaire", initialPrice: 60, volatility: { kind: "uniform", band: STANDARD_BAND }, dividendPerShare: 2 },
  { symbol: "FERME", name: "Fermes Unies", category: "primaire", initialPrice: 50, volatility: { kind: "uniform", band: STANDARD_BAND }, dividendPerShare: 1.5 },
  { symbol: "FORET", name: "Forestière Boréale", category: "primaire", initialPrice: 55, volatility: { kind: "uniform", band: STANDARD_BAND }, dividendPerShare: 1.2 },
  { symbol: "DETAIL", name: "Détail Plus", category: "services", initialPrice: 70, volatility: { kind: "uniform", band: STANDARD_BAND }, dividendPerShare: 1 },
  { symbol: "RESTO", name: "Groupe Resto", category: "services", initialPrice: 65, volatility: { kind: "uniform", band: STANDARD_BAND }, dividendPerShare: 0.8 },
  { symbol: "VOYAGE", name: "Voyages Horizon", category: "services", initialPrice: 75, volatility: { kind: "uniform", band: STANDARD_BAND }, dividendPerShare: 0.9 },
  { symbol: "BTC", name: "Bitcoin", category: "crypto", initialPrice: 1_000_000, floor: BTC_FLOOR, volatility: { kind: "gaussian", sigma: BTC_SIGMA }, dividendPerShare: 0 },
  { symbol: "FTECH", name: "Fonds Techno", category: "fonds", initialPrice: 100, volatility: { kind: "basket", weights: { TECHNO: 0.5, ASSEMB: 0.3, LOGIC: 0.2 } }, dividendPerShare: 0 },
  { symbol: "FPRIM", name: "Fonds Primaire", category: "fonds", initialPrice: 100, volatility: { kind: "basket", weights: { MINES: 0.34, FERME: 0.33, FORET: 0.33 } }, dividendPerShare: 0 },
  { symbol: "FSERV", name: "Fonds Services", category: "fonds", initialPrice: 100, volatility: { kind: "basket", weights: { DETAIL: 0.34, RESTO: 0.33, VOYAGE: 0.33 } }, dividendPerShare: 0 },
];
