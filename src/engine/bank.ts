import {
  DEPOSIT_INTEREST_RATE,
  INITIAL_CASH,
  LOAN_INTEREST_RATE,
  LOAN_LIMIT_MULTIPLIER,
  MINED_ASSET,
  MINED_PER_HASHRATE,
  MINER_PRICE_PER_KH,
} from "../shared/constants";
import { logTransaction, minedValue, portfolioValue } from "./ledger";
import type { Account, GameState } from "./types";

export type BankErrorKind = "InvalidAmount" | "InsufficientFunds" | "InsufficientHoldings" | "LoanLimit" | "NoLoan";

export type BankResult =
  | { ok: true; amount: number; description: string }
  | { ok: false; error: BankErrorKind; message: string };

export type BankAction = "deposit" | "withdraw" | "loan" | "repay";

const fmt = (n: number) => n.toFixed(2);

function fail(error: BankErrorKind, message: string): BankResult {
  return { ok: false, error, message };
}

const validAmount = (amount: number) => Number.isFinite(amount) && amount > 0;

export function deposit(account: Account, amount: number): BankResult {
  if (!validAmount(amount)) return fail("InvalidAmount", "Montant invalide");
  if (amount > account.cash) return fail("InsufficientFunds", "Cash insuffisant");
  account.cash -= amount;
  account.savings += amount;
  logTransaction(account, "Dépôt épargne", -amount);
  return { ok: true, amount, description: `Dépôt de ${fmt(amount)} $ en épargne` };
}

/** Un montant supérieur au solde retire toute l'épargne. */
export function withdraw(account: Account, amount: number): BankResult {
  if (!validAmount(amount)) return fail("InvalidAmount", "Montant invalide");
  if (account.savings <= 0) return fail("InsufficientFunds", "Épargne vide");
  const actual = Math.min(amount, account.savings);
  account.savings -= actual;
  account.cash += actual;
  logTransaction(account, "Retrait épargne", actual);
  return { ok: true, amount: actual, description: `Retrait de ${fmt(actual)} $ de l'épargne` };
}

export function loanLimit(game: GameState): number {
  const { account, assets } = game;
  const assetsTotal = account.cash + account.savings + portfolioValue(account, assets) + minedValue(account, assets);
  return Math.max(0, assetsTotal * LOAN_LIMIT_MULTIPLIER);
}

export function takeLoan(game: GameState, amount: number): BankResult {
  const { account } = game;
  if (!validAmount(amount)) return fail("InvalidAmount", "Montant invalide");
  const limit = loanLimit(game);
  if (account.loan + amount > limit) {
    return fail("LoanLimit", `Plafond d'emprunt atteint (max ${fmt(Math.max(0, limit - account.loan))} $)`);
  }
  account.loan += amount;
  account.cash += amount;
  logTransaction(account, "Emprunt", amount);
  return { ok: true, amount, description: `Emprunt de ${fmt(amount)} $` };
}

/** 0 ou un montant ≥ solde dû rembourse la totalité. */
export function repayLoan(account: Account, amount: number): BankResult {
  if (!Number.isFinite(amount) || amount < 0) return fail("InvalidAmount", "Montant invalide");
  if (account.loan <= 0) return fail("NoLoan", "Aucun emprunt en cours");
  const full = amount === 0 || amount >= account.loan;
  const payment = full ? account.loan : amount;
  if (payment > account.cash) return fail("InsufficientFunds", "Cash insuffisant");
  account.cash -= payment;
  if (full) {
    account.loan = 0;
    account.stats.loansRepaid += 1;
  } else {
    account.loan -= payment;
  }
  logTransaction(account, full ? "Remboursement total" : "Remboursement partiel", -payment);
  return { ok: true, amount: payment, description: `Remboursement de ${fmt(payment)} $` };
}

export function buyMiner(account: Account, kh: number): BankResult {
  if (!validAmount(kh)) return fail("InvalidAmount", "Puissance invalide");
  const cost = kh * MINER_PRICE_PER_KH;
  if (cost > account.cash) return fail("InsufficientFunds", "Cash insuffisant");
  account.cash -= cost;
  account.hashrate += kh;
  logTransaction(account, `Achat mineur ${kh} kh`, -cost);
  return { ok: true, amount: cost, description: `Mineur de ${kh} kh acheté pour ${fmt(cost)} $` };
}

export function sellMined(game: GameState, amount: number): BankResult {
  const { account, assets } = game;
  if (!validAmount(amount)) return fail("InvalidAmount", "Montant invalide");
  if (amount > account.minedBalance) return fail("InsufficientHoldings", `${MINED_ASSET} miné insuffisant`);
  const price = assets[MINED_ASSET]?.price ?? 0;
  const proceeds = amount * price;
  account.minedBalance -= amount;
  account.cash += proceeds;
  logTransaction(account, `Vente ${MINED_ASSET} miné`, proceeds);
  return { ok: true, amount: proceeds, description: `Vente de ${amount} ${MINED_ASSET} miné pour ${fmt(proceeds)} $` };
}

export function bankOperation(game: GameState, action: BankAction, amount: number): BankResult {
  switch (action) {
    case "deposit":
      return deposit(game.account, amount);
    case "withdraw":
      return withdraw(game.account, amount);
    case "loan":
      return takeLoan(game, amount);
    case "repay":
      return repayLoan(game.account, amount);
  }
}

export interface AccrualReport {
  depositInterest: number;
  loanInterest: number;
  capitalized: number;
  mined: number;
}

/**
 * Fin de journée: intérêts d'épargne, intérêts d'emprunt (cash, puis épargne,
 * le reste est capitalisé), production de minage.
 */
export function accrueDaily(account: Account): AccrualReport {
  const depositInterest = account.savings * account.depositInterestRate;
  if (depositInterest > 0) {
    account.savings += depositInterest;
    logTransaction(account, "Intérêts épargne", depositInterest);
  }

  const loanInterest = account.loan * account.loanInterestRate;
  let capitalized = 0;
  if (loanInterest > 0) {
    const fromCash = Math.min(Math.max(account.cash, 0), loanInterest);
    account.cash -= fromCash;
    const fromSavings = Math.min(account.savings, loanInterest - fromCash);
    account.savings -= fromSavings;
    capitalized = loanInterest - fromCash - fromSavings;
    account.loan += capitalized;
    logTransaction(account, "Intérêts emprunt", -loanInterest);
  }

  const mined = account.hashrate * MINED_PER_HASHRATE;
  account.minedBalance += mined;
  return { depositInterest, loanInterest, capitalized, mined };
}

/** Faillite: plus de cash ni d'épargne, et un emprunt en cours. */
export function isBankrupt(account: Account): boolean {
  return account.cash <= 0 && account.savings <= 0 && account.loan > 0;
}

/**
 * Nouveau départ après faillite. Les soldes, positions et mineurs repartent à
 * zéro; le jour, les succès, les statistiques et le journal sont conservés.
 */
export function rebirth(account: Account) {
  account.cash = INITIAL_CASH;
  account.savings = 0;
  account.loan = 0;
  account.loanInterestRate = LOAN_INTEREST_RATE;
  account.depositInterestRate = DEPOSIT_INTEREST_RATE;
  account.positions = {};
  account.hashrate = 0;
  account.minedBalance = 0;
  account.stats.rebirths += 1;
  logTransaction(account, `Faillite: nouveau départ (${account.stats.rebirths})`, INITIAL_CASH);
}
