export type AssetCategory = "tech" | "primaire" | "services" | "crypto" | "fonds";

export type VolatilityProfile =
  | { kind: "uniform"; band: number }
  | { kind: "gaussian"; sigma: number }
  // Fonds: la valeur liquidative suit un panier pondéré, pas de tirage propre
  | { kind: "basket"; weights: Record<string, number> };

export interface AssetDefinition {
  symbol: string;
  name: string;
  category: AssetCategory;
  initialPrice: number;
  floor?: number;
  volatility: VolatilityProfile;
  dividendPerShare: number;
  dividendInterval?: number;
  firstDividendDay?: number;
}

export interface Asset {
  symbol: string;
  name: string;
  category: AssetCategory;
  price: number;
  floor?: number;
  volatility: VolatilityProfile;
  history: number[];
  dividendPerShare: number;
  dividendInterval: number;
  nextDividendDay: number;
  drip: boolean;
  // Prix de référence des composantes (fonds uniquement)
  basePrices?: Record<string, number>;
}

export type AssetBook = Record<string, Asset>;

export interface Position {
  quantity: number;
  avgCost: number;
}

export interface Transaction {
  day: number;
  description: string;
  amount: number;
}

export interface AccountStats {
  tradeCount: number;
  bestSaleGain: number;
  dividendsReceived: number;
  dripShares: number;
  loansRepaid: number;
  // faillites suivies d'un nouveau départ
  rebirths: number;
}

export type AccountMetaValue = string | number | boolean | null;

export interface Account {
  id: string;
  cash: number;
  savings: number;
  loan: number;
  loanInterestRate: number;
  depositInterestRate: number;
  positions: Record<string, Position>;
  transactions: Transaction[];
  day: number;
  hashrate: number;
  minedBalance: number;
  stats: AccountStats;
  // clé de succès -> date ISO de déblocage
  achievements: Record<string, string>;
  // Métadonnées libres (pseudo, plateforme d'origine...)
  meta: Record<string, unknown>;
}

export interface GameState {
  account: Account;
  assets: AssetBook;
}

export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type Prices = Record<string, number>;
