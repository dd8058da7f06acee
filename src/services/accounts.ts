import { defaultRegistry, summarize, type AchievementRegistry } from "../engine/achievements";
import { createGame } from "../engine/assets";
import type { BankAction } from "../engine/bank";
import { runDay, type DayReport } from "../engine/day";
import { EngineError, errorMessage } from "../engine/errors";
import { dispatchEvents, type EngineEvent, type EngineEventSink } from "../engine/events";
import type { TradeAction } from "../engine/ledger";
import {
  applyBank,
  applyBuyMiner,
  applyDrip,
  applySellMined,
  applyTrade,
  viewOf,
  type AccountView,
  type Applied,
  type OperationContext,
} from "../engine/operations";
import type { Rng } from "../engine/rng";
import { exportSnapshot, importSnapshot, type Snapshot } from "../engine/sync";
import type { AssetDefinition, GameState } from "../engine/types";
import { engineLogger } from "../logger";
import { DEFAULT_HISTORY_CAP } from "../shared/constants";
import type { MarketService } from "./market";
import type { SnapshotStore } from "./stores";

export interface AccountServiceOptions {
  store: SnapshotStore;
  rng: Rng;
  // Marché partagé du serveur; sans lui chaque compte fait avancer ses prix
  market?: MarketService;
  historyCap?: number;
  registry?: AchievementRegistry;
  sinks?: readonly EngineEventSink[];
  universe?: readonly AssetDefinition[];
  now?: () => Date;
}

interface Mutation<T> {
  result: T;
  changed: boolean;
  events: EngineEvent[];
}

/**
 * Comptes du serveur. Chaque mutation est une lecture-modification-écriture
 * sérialisée par le stockage; des comptes distincts avancent en parallèle.
 */
export class AccountService {
  private readonly store: SnapshotStore;
  private readonly rng: Rng;
  private readonly market?: MarketService;
  private readonly historyCap: number;
  private readonly registry: AchievementRegistry;
  private readonly sinks: readonly EngineEventSink[];
  private readonly universe?: readonly AssetDefinition[];
  private readonly now: () => Date;

  constructor(options: AccountServiceOptions) {
    this.store = options.store;
    this.rng = options.rng;
    this.market = options.market;
    this.historyCap = options.historyCap ?? DEFAULT_HISTORY_CAP;
    this.registry = options.registry ?? defaultRegistry;
    this.sinks = options.sinks ?? [];
    this.universe = options.universe;
    this.now = options.now ?? (() => new Date());
  }

  private hydrate(accountId: string, snapshot: Snapshot | null): GameState {
    const game = snapshot
      ? importSnapshot(snapshot, { accountId, universe: this.universe })
      : createGame(accountId, this.universe);
    // Les ordres s'exécutent au prix du marché partagé
    if (this.market) {
      for (const [symbol, price] of Object.entries(this.market.latestPrices())) {
        const asset = game.assets[symbol];
        if (asset) asset.price = price;
      }
    }
    return game;
  }

  private async mutate<T>(accountId: string, fn: (game: GameState) => Mutation<T>): Promise<T> {
    const outcome = await this.store.update(accountId, (current) => {
      const game = this.hydrate(accountId, current);
      const mutation = fn(game);
      return {
        snapshot: mutation.changed || !current ? exportSnapshot(game) : undefined,
        result: mutation,
      };
    });
    await dispatchEvents(this.sinks, accountId, outcome.events);
    return outcome.result;
  }

  private context(): OperationContext {
    return { registry: this.registry, now: this.now() };
  }

  private operate<R>(accountId: string, fn: (game: GameState, ctx: OperationContext) => Applied<R>) {
    return this.mutate(accountId, (game) => fn(game, this.context()));
  }

  /** Crée le compte à la première utilisation. */
  open(accountId: string): Promise<AccountView> {
    return this.mutate(accountId, (game) => ({ result: viewOf(game), changed: false, events: [] }));
  }

  async get(accountId: string): Promise<AccountView> {
    const snapshot = await this.store.load(accountId);
    if (!snapshot) throw new EngineError("NotFound", `Compte introuvable: ${accountId}`);
    return viewOf(this.hydrate(accountId, snapshot));
  }

  async game(accountId: string): Promise<GameState> {
    const snapshot = await this.store.load(accountId);
    if (!snapshot) throw new EngineError("NotFound", `Compte introuvable: ${accountId}`);
    return this.hydrate(accountId, snapshot);
  }

  trade(accountId: string, order: { symbol: string; quantity: number; action: TradeAction }) {
    return this.operate(accountId, (game, ctx) => applyTrade(game, order, ctx));
  }

  bank(accountId: string, action: BankAction, amount: number) {
    return this.operate(accountId, (game, ctx) => applyBank(game, action, amount, ctx));
  }

  buyMiner(accountId: string, kh: number) {
    return this.operate(accountId, (game, ctx) => applyBuyMiner(game, kh, ctx));
  }

  sellMined(accountId: string, amount: number) {
    return this.operate(accountId, (game, ctx) => applySellMined(game, amount, ctx));
  }

  setDrip(accountId: string, symbol: string, enabled: boolean) {
    return this.operate(accountId, (game, ctx) => applyDrip(game, symbol, enabled, ctx));
  }

  /** Une journée pour ce compte, aux prix du marché partagé s'il existe. */
  advanceDay(accountId: string): Promise<DayReport> {
    const prices = this.market?.latestPrices();
    return this.mutate(accountId, (game) => {
      const report = runDay(game, { rng: this.rng, prices, historyCap: this.historyCap, registry: this.registry, now: this.now() });
      return { result: report, changed: true, events: report.events };
    });
  }

  /** Tous les comptes en parallèle; un compte en échec n'arrête pas les autres. */
  async advanceAll(): Promise<{ processed: number; failed: string[] }> {
    const ids = await this.store.list();
    const results = await Promise.allSettled(ids.map((id) => this.advanceDay(id)));
    const failed: string[] = [];
    results.forEach((r, i) => {
      if (r.status === "rejected") {
        const id = ids[i] ?? "?";
        failed.push(id);
        engineLogger.error({ accountId: id, err: errorMessage(r.reason) }, "journée non traitée");
      }
    });
    return { processed: ids.length - failed.length, failed };
  }

  async achievements(accountId: string) {
    const game = await this.game(accountId);
    return summarize(game.account, this.registry);
  }

  async exportSnapshot(accountId: string): Promise<Snapshot> {
    const snapshot = await this.store.load(accountId);
    if (!snapshot) throw new EngineError("NotFound", `Compte introuvable: ${accountId}`);
    return snapshot;
  }

  /** Remplace l'état du compte par une sauvegarde (import tolérant). */
  async importSnapshot(accountId: string, raw: unknown): Promise<AccountView> {
    const game = importSnapshot(raw, { accountId, universe: this.universe });
    const snapshot = exportSnapshot(game);
    return this.store.update(accountId, () => ({ snapshot, result: viewOf(this.hydrate(accountId, snapshot)) }));
  }
}
