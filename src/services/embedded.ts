import { z } from "zod";
import { defaultRegistry, type AchievementRegistry } from "../engine/achievements";
import { createGame } from "../engine/assets";
import type { BankAction } from "../engine/bank";
import { runDay, type DayReport } from "../engine/day";
import { errorMessage } from "../engine/errors";
import { dispatchEvents, type EngineEventSink } from "../engine/events";
import {
  applyBank,
  applyBuyMiner,
  applyDrip,
  applySellMined,
  applyTrade,
  type Applied,
  type OperationContext,
  type OperationResult,
} from "../engine/operations";
import type { Rng } from "../engine/rng";
import { exportSnapshot, importSnapshot } from "../engine/sync";
import type { GameState, Prices } from "../engine/types";
import { engineLogger } from "../logger";
import { DEFAULT_HISTORY_CAP } from "../shared/constants";
import { KeyedMutex } from "./keyedMutex";
import type { SnapshotStore } from "./stores";

/** Source de prix distante (serveur); optionnelle en mode embarqué. */
export interface PriceFeed {
  fetchPrices(): Promise<Prices>;
}

const latestSchema = z.object({ prices: z.record(z.number()) });

export class HttpPriceFeed implements PriceFeed {
  constructor(private readonly baseUrl: string, private readonly timeoutMs = 3_000) {}

  async fetchPrices(): Promise<Prices> {
    const res = await fetch(`${this.baseUrl.replace(/\/$/, "")}/api/markets/latest`, {
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) throw new Error(`HTTP ${res.status}`);
    return latestSchema.parse(await res.json()).prices;
  }
}

export interface EmbeddedGameOptions {
  accountId: string;
  store: SnapshotStore;
  rng: Rng;
  feed?: PriceFeed;
  intervalMs?: number;
  historyCap?: number;
  registry?: AchievementRegistry;
  sinks?: readonly EngineEventSink[];
  onDay?: (report: DayReport) => void;
  now?: () => Date;
}

/**
 * Forme embarquée, mono-joueur: une minuterie, une journée terminée et
 * sauvegardée avant la suivante. Les ordres du joueur passent par le même verrou
 * et par les mêmes opérations que le serveur.
 */
export class EmbeddedGame {
  private game: GameState | null = null;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private readonly lock = new KeyedMutex();

  constructor(private readonly options: EmbeddedGameOptions) {}

  get state(): GameState {
    if (!this.game) throw new Error("Partie non chargée");
    return this.game;
  }

  async load(): Promise<GameState> {
    const snapshot = await this.options.store.load(this.options.accountId);
    this.game = snapshot
      ? importSnapshot(snapshot, { accountId: this.options.accountId })
      : createGame(this.options.accountId);
    return this.game;
  }

  private async prices(): Promise<Prices | undefined> {
    if (!this.options.feed) return undefined;
    try {
      return await this.options.feed.fetchPrices();
    } catch (err) {
      // Hors ligne: le modèle local prend le relais
      engineLogger.warn({ err: errorMessage(err) }, "prix distants indisponibles, simulation locale");
      return undefined;
    }
  }

  /** Une journée complète, persistée. */
  step(): Promise<DayReport> {
    return this.lock.run("game", async () => {
      const game = this.game ?? (await this.load());
      const report = runDay(game, {
        rng: this.options.rng,
        prices: await this.prices(),
        historyCap: this.options.historyCap ?? DEFAULT_HISTORY_CAP,
        registry: this.options.registry ?? defaultRegistry,
        now: this.now(),
      });
      await this.options.store.save(game.account.id, exportSnapshot(game));
      await dispatchEvents(this.options.sinks ?? [], game.account.id, report.events);
      this.options.onDay?.(report);
      return report;
    });
  }

  private now() {
    return this.options.now?.() ?? new Date();
  }

  private operate<R>(fn: (game: GameState, ctx: OperationContext) => Applied<R>): Promise<OperationResult<R>> {
    return this.lock.run("game", async () => {
      const game = this.game ?? (await this.load());
      const applied = fn(game, { registry: this.options.registry ?? defaultRegistry, now: this.now() });
      if (applied.changed) await this.options.store.save(game.account.id, exportSnapshot(game));
      await dispatchEvents(this.options.sinks ?? [], game.account.id, applied.events);
      return applied.result;
    });
  }

  buy(symbol: string, quantity: number) {
    return this.operate((game, ctx) => applyTrade(game, { symbol, quantity, action: "buy" }, ctx));
  }

  sell(symbol: string, quantity: number) {
    return this.operate((game, ctx) => applyTrade(game, { symbol, quantity, action: "sell" }, ctx));
  }

  bank(action: BankAction, amount: number) {
    return this.operate((game, ctx) => applyBank(game, action, amount, ctx));
  }

  buyMiner(kh: number) {
    return this.operate((game, ctx) => applyBuyMiner(game, kh, ctx));
  }

  sellMined(amount: number) {
    return this.operate((game, ctx) => applySellMined(game, amount, ctx));
  }

  setDrip(symbol: string, enabled: boolean) {
    return this.operate((game, ctx) => applyDrip(game, symbol, enabled, ctx));
  }

  start() {
    if (this.running) return;
    this.running = true;
    this.schedule();
  }

  stop() {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  // setTimeout en chaîne: la journée suivante n'est armée qu'après la précédente
  private schedule() {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      void this.step()
        .catch((err: unknown) => engineLogger.error({ err: errorMessage(err) }, "journée embarquée en échec"))
        .finally(() => this.schedule());
    }, this.options.intervalMs ?? 1_000);
  }
}
