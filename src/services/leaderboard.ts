import { PersistenceError } from "../engine/errors";
import type { EngineEvent, EngineEventSink } from "../engine/events";
import { storeLogger } from "../logger";

export interface LeaderboardEntry {
  accountId: string;
  netWorth: number;
  day: number;
  updatedAt: string;
}

export interface Leaderboard {
  readonly name: string;
  /** Remplace la ligne du compte: une seule entrée, la plus récente, par compte. */
  record(entry: LeaderboardEntry): Promise<void>;
  /** Classement par valeur nette décroissante, puis par nombre de jours croissant. */
  top(limit: number, accountId?: string): Promise<LeaderboardEntry[]>;
}

export const LEADERBOARD_SIZE = 100;

export function compareEntries(a: LeaderboardEntry, b: LeaderboardEntry) {
  return b.netWorth - a.netWorth || a.day - b.day || (a.accountId < b.accountId ? -1 : a.accountId > b.accountId ? 1 : 0);
}

export class MemoryLeaderboard implements Leaderboard {
  readonly name: string;
  private readonly entries = new Map<string, LeaderboardEntry>();

  constructor(name = "memory") {
    this.name = name;
  }

  async record(entry: LeaderboardEntry) {
    this.entries.set(entry.accountId, { ...entry });
  }

  async top(limit: number = LEADERBOARD_SIZE, accountId?: string) {
    const rows = [...this.entries.values()].filter((e) => accountId === undefined || e.accountId === accountId);
    return rows.sort(compareEntries).slice(0, limit).map((e) => ({ ...e }));
  }
}

/** Classement distant avec repli local silencieux, comme les sauvegardes. */
export class FallbackLeaderboard implements Leaderboard {
  readonly name: string;

  constructor(private readonly primary: Leaderboard, private readonly fallback: Leaderboard) {
    this.name = `${primary.name}+${fallback.name}`;
  }

  private async attempt<T>(op: string, run: (board: Leaderboard) => Promise<T>): Promise<T> {
    try {
      return await run(this.primary);
    } catch (err) {
      if (!(err instanceof PersistenceError)) throw err;
      storeLogger.warn({ op, primary: this.primary.name, fallback: this.fallback.name, err: err.message }, "classement distant indisponible, repli local");
      return run(this.fallback);
    }
  }

  record(entry: LeaderboardEntry) {
    return this.attempt("record", (b) => b.record(entry));
  }

  top(limit: number = LEADERBOARD_SIZE, accountId?: string) {
    return this.attempt("top", (b) => b.top(limit, accountId));
  }
}

/** Publie la valeur nette de fin de journée de chaque compte. */
export class LeaderboardSink implements EngineEventSink {
  readonly name = "leaderboard";

  constructor(private readonly board: Leaderboard) {}

  async publish(accountId: string, event: EngineEvent) {
    if (event.type !== "day:completed") return;
    await this.board.record({ accountId, netWorth: event.netWorth, day: event.day, updatedAt: event.at });
  }
}
