import cron from "node-cron";
import { promises as fs } from "fs";
import path from "path";
import { buildApp } from "./app";
import { createDb, type Db } from "./db";
import { errorMessage } from "./engine/errors";
import type { EngineEventSink } from "./engine/events";
import { createRng } from "./engine/rng";
import { env } from "./env";
import { logger } from "./logger";
import { AccountService } from "./services/accounts";
import { FallbackLeaderboard, LeaderboardSink, MemoryLeaderboard, type Leaderboard } from "./services/leaderboard";
import { MarketService, MemoryMarketRepository, type MarketRepository } from "./services/market";
import { MemoryMigrationLog, migrate, type AccountRef, type MigrationLog } from "./services/migration";
import { PgAchievementSink, PgLeaderboard, PgMarketRepository, PgMigrationLog, PgSnapshotStore } from "./services/pgStores";
import { FallbackSnapshotStore, FileSnapshotStore, type SnapshotStore } from "./services/stores";
import { setupSocket } from "./socket";

// Plateformes connues des migrations: le serveur ("web") et les sauvegardes locales ("desktop")
const WEB = "web";
const DESKTOP = "desktop";

async function applySchema(db: Db) {
  const sql = await fs.readFile(path.resolve(process.cwd(), "db/schema.sql"), "utf8");
  await db.query(sql);
  logger.info("[boot] schéma appliqué");
}

async function bootstrap() {
  const db = env.DATABASE_URL ? createDb(env.DATABASE_URL) : null;
  if (db && env.MIGRATE_ON_BOOT) {
    try {
      await applySchema(db);
    } catch (err) {
      logger.error({ err: errorMessage(err) }, "[boot] application du schéma en échec");
    }
  }

  const localStore = new FileSnapshotStore(path.resolve(process.cwd(), env.SAVE_DIR), DESKTOP);
  const webStore: SnapshotStore = db ? new FallbackSnapshotStore(new PgSnapshotStore(db, WEB), localStore) : localStore;
  const repository: MarketRepository = db ? new PgMarketRepository(db) : new MemoryMarketRepository();
  const migrations: MigrationLog = db ? new PgMigrationLog(db) : new MemoryMigrationLog();
  const leaderboard: Leaderboard = db
    ? new FallbackLeaderboard(new PgLeaderboard(db, WEB), new MemoryLeaderboard("local"))
    : new MemoryLeaderboard("local");
  const rng = createRng(env.RNG_SEED);

  const market = new MarketService({ repository, rng, historyCap: env.HISTORY_CAP });
  try {
    const restored = await market.restore();
    logger.info({ restored, day: market.day }, "[boot] prix du marché repris");
  } catch (err) {
    logger.warn({ err: errorMessage(err) }, "[boot] prix du marché non repris, départ aux prix initiaux");
  }

  const sinks: EngineEventSink[] = [new LeaderboardSink(leaderboard)];
  const accounts = new AccountService({ store: webStore, market, rng, historyCap: env.HISTORY_CAP, sinks });
  const stores = (platform: string) => (platform === WEB ? webStore : platform === DESKTOP ? localStore : undefined);

  const app = await buildApp({
    accounts,
    market,
    migrate: (source: AccountRef, target: AccountRef) => migrate(source, target, { stores, audit: migrations }),
    migrations,
    leaderboard,
    ping: db ? () => db.ping() : undefined,
    docs: true,
  });

  const { sink } = setupSocket(app.server);
  sinks.push(sink);
  if (db) sinks.push(new PgAchievementSink(db, WEB));

  // Journée de jeu: marché partagé, puis tous les comptes en parallèle
  let ticking = false;
  cron.schedule(env.DAY_TICK_CRON, async () => {
    if (ticking) {
      app.log.warn("[cron] journée précédente encore en cours, tick ignoré");
      return;
    }
    ticking = true;
    try {
      const { day } = await market.tick();
      const { processed, failed } = await accounts.advanceAll();
      app.log.info({ day, processed, failed: failed.length }, "[cron] journée terminée");
    } catch (err) {
      app.log.error({ err: errorMessage(err) }, "[cron] journée en échec");
    } finally {
      ticking = false;
    }
  }, { timezone: env.TIMEZONE });

  // Nettoyage des ticks: garder les 100 derniers + 1 sur 100
  cron.schedule("0 4 * * *", async () => {
    try {
      const deleted = await market.cleanup();
      app.log.info({ deleted }, "[cron] ticks nettoyés");
    } catch (err) {
      app.log.error({ err: errorMessage(err) }, "[cron] nettoyage des ticks en échec");
    }
  }, { timezone: env.TIMEZONE });

  await app.listen({ port: env.PORT, host: "0.0.0.0" });
  app.log.info({ store: webStore.name }, `Server listening on ${env.PORT}`);
}

bootstrap().catch((err: unknown) => {
  logger.fatal({ err: errorMessage(err) }, "[boot] démarrage impossible");
  process.exit(1);
});
