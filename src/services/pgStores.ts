import type { Db } from "../db";
import { EngineError, errorMessage, PersistenceError } from "../engine/errors";
import type { EngineEvent, EngineEventSink } from "../engine/events";
import { snapshotRecordSchema, type Snapshot } from "../engine/sync";
import { LEADERBOARD_SIZE, type Leaderboard, type LeaderboardEntry } from "./leaderboard";
import type { MarketRepository, MarketTick } from "./market";
import type { AccountRef, MigrationLog, MigrationRecord } from "./migration";
import type { SnapshotStore, UpdateOutcome, Updater } from "./stores";

function wrap(op: string, err: unknown): Error {
  if (err instanceof EngineError) return err;
  return new PersistenceError(`Base de données indisponible (${op}): ${errorMessage(err)}`, err);
}

// Erreur levée par la fonction de mise à jour elle-même, pas par le pilote
class UpdaterFailure {
  constructor(readonly error: unknown) {}
}

function parseSnapshot(raw: unknown): Snapshot {
  const parsed = snapshotRecordSchema.safeParse(raw);
  if (!parsed.success) throw new PersistenceError("Sauvegarde corrompue en base");
  return parsed.data;
}

/** Table `game_saves`: une ligne par (plateforme, compte). */
export class PgSnapshotStore implements SnapshotStore {
  readonly name: string;

  constructor(private readonly db: Db, private readonly platform: string) {
    this.name = `pg:${platform}`;
  }

  async load(accountId: string) {
    try {
      const { rows } = await this.db.query<{ snapshot: unknown }>(
        `SELECT snapshot FROM game_saves WHERE platform = $1 AND account_id = $2`,
        [this.platform, accountId],
      );
      const row = rows[0];
      return row ? parseSnapshot(row.snapshot) : null;
    } catch (err) {
      throw wrap("load", err);
    }
  }

  async save(accountId: string, snapshot: Snapshot) {
    try {
      await this.db.query(
        `INSERT INTO game_saves (platform, account_id, snapshot, updated_at)
         VALUES ($1, $2, $3::jsonb, now())
         ON CONFLICT (platform, account_id) DO UPDATE SET snapshot = EXCLUDED.snapshot, updated_at = now()`,
        [this.platform, accountId, JSON.stringify(snapshot)],
      );
    } catch (err) {
      throw wrap("save", err);
    }
  }

  /**
   * Verrou consultatif de transaction sur le compte: couvre aussi la première
   * écriture, quand aucune ligne n'existe encore pour FOR UPDATE.
   */
  async update<T>(accountId: string, fn: Updater<T>): Promise<T> {
    try {
      return await this.db.transaction(async (q) => {
        await q(`SELECT pg_advisory_xact_lock(hashtext($1))`, [`${this.platform}:${accountId}`]);
        const { rows } = await q<{ snapshot: unknown }>(
          `SELECT snapshot FROM game_saves WHERE platform = $1 AND account_id = $2 FOR UPDATE`,
          [this.platform, accountId],
        );
        const row = rows[0];
        const current = row ? parseSnapshot(row.snapshot) : null;
        let outcome: UpdateOutcome<T>;
        try {
          outcome = await fn(current);
        } catch (err) {
          throw new UpdaterFailure(err);
        }
        if (outcome.snapshot) {
          await q(
            `INSERT INTO game_saves (platform, account_id, snapshot, updated_at)
             VALUES ($1, $2, $3::jsonb, now())
             ON CONFLICT (platform, account_id) DO UPDATE SET snapshot = EXCLUDED.snapshot, updated_at = now()`,
            [this.platform, accountId, JSON.stringify(outcome.snapshot)],
          );
        }
        return outcome.result;
      });
    } catch (err) {
      // ROLLBACK déjà fait; l'erreur métier remonte telle quelle, sans repli
      if (err instanceof UpdaterFailure) throw err.error;
      throw wrap("update", err);
    }
  }

  async list() {
    try {
      const { rows } = await this.db.query<{ account_id: string }>(
        `SELECT account_id FROM game_saves WHERE platform = $1 ORDER BY account_id`,
        [this.platform],
      );
      return rows.map((r) => r.account_id);
    } catch (err) {
      throw wrap("list", err);
    }
  }
}

type MigrationRow = {
  source_platform: string;
  source_account: string;
  target_platform: string;
  target_account: string;
  field_count: number;
  runs: number;
  migrated_at: Date;
};

const toRecord = (r: MigrationRow): MigrationRecord => ({
  source: { platform: r.source_platform, accountId: r.source_account },
  target: { platform: r.target_platform, accountId: r.target_account },
  fieldCount: r.field_count,
  runs: r.runs,
  migratedAt: new Date(r.migrated_at).toISOString(),
});

/** Journal `save_migrations`, unique par couple source/cible. */
export class PgMigrationLog implements MigrationLog {
  constructor(private readonly db: Db) {}

  async record(source: AccountRef, target: AccountRef, migratedAt: string, fieldCount: number) {
    try {
      const { rows } = await this.db.query<MigrationRow>(
        `INSERT INTO save_migrations (source_platform, source_account, target_platform, target_account, field_count, runs, migrated_at)
         VALUES ($1, $2, $3, $4, $5, 1, $6)
         ON CONFLICT (source_platform, source_account, target_platform, target_account)
         DO UPDATE SET field_count = EXCLUDED.field_count, migrated_at = EXCLUDED.migrated_at, runs = save_migrations.runs + 1
         RETURNING source_platform, source_account, target_platform, target_account, field_count, runs, migrated_at`,
        [source.platform, source.accountId, target.platform, target.accountId, fieldCount, migratedAt],
      );
      const row = rows[0];
      if (!row) throw new PersistenceError("Migration non enregistrée");
      return toRecord(row);
    } catch (err) {
      throw wrap("migration", err);
    }
  }

  async list() {
    try {
      const { rows } = await this.db.query<MigrationRow>(
        `SELECT source_platform, source_account, target_platform, target_account, field_count, runs, migrated_at
         FROM save_migrations ORDER BY migrated_at DESC`,
      );
      return rows.map(toRecord);
    } catch (err) {
      throw wrap("migrations", err);
    }
  }
}

type TickRow = {
  symbol: string;
  price: number;
  day: number;
  at: Date;
};

const toTick = (r: TickRow): MarketTick => ({
  symbol: r.symbol,
  price: Number(r.price),
  day: Number(r.day),
  at: new Date(r.at).toISOString(),
});

export class PgMarketRepository implements MarketRepository {
  constructor(private readonly db: Db) {}

  async appendTicks(ticks: readonly MarketTick[]) {
    if (ticks.length === 0) return;
    const values: unknown[] = [];
    const placeholders = ticks.map((t, i) => {
      values.push(t.symbol, t.price, t.day, t.at);
      const o = i * 4;
      return `($${o + 1}, $${o + 2}, $${o + 3}, $${o + 4})`;
    });
    try {
      await this.db.query(`INSERT INTO market_ticks (symbol, price, day, at) VALUES ${placeholders.join(", ")}`, values);
    } catch (err) {
      throw wrap("ticks", err);
    }
  }

  async latest() {
    try {
      // Dernier tick par symbole en une requête
      const { rows } = await this.db.query<TickRow>(
        `SELECT DISTINCT ON (symbol) symbol, price, day, at
         FROM market_ticks
         ORDER BY symbol, at DESC, id DESC`,
      );
      return rows.map(toTick);
    } catch (err) {
      throw wrap("latest", err);
    }
  }

  async history(symbol: string, limit: number) {
    try {
      const { rows } = await this.db.query<TickRow>(
        `SELECT symbol, price, day, at FROM market_ticks
         WHERE symbol = $1 ORDER BY at DESC, id DESC LIMIT $2`,
        [symbol, limit],
      );
      return rows.map(toTick).reverse();
    } catch (err) {
      throw wrap("history", err);
    }
  }

  async cleanup(keepRecent = 100, sampleEvery = 100) {
    try {
      const { rowCount } = await this.db.query(
        `WITH ranked AS (
           SELECT id, row_number() OVER (PARTITION BY symbol ORDER BY at DESC, id DESC) - 1 AS rn
           FROM market_ticks
         )
         DELETE FROM market_ticks t USING ranked r
         WHERE t.id = r.id AND r.rn >= $1 AND (r.rn - $1) % $2 <> 0`,
        [keepRecent, sampleEvery],
      );
      return rowCount;
    } catch (err) {
      throw wrap("cleanup", err);
    }
  }
}

/** Enregistre les déblocages (`achievement_unlocks`) et le compteur global (`achievement_stats`). */
export class PgAchievementSink implements EngineEventSink {
  readonly name = "pg-achievements";

  constructor(private readonly db: Db, private readonly platform: string) {}

  async publish(accountId: string, event: EngineEvent) {
    if (event.type !== "achievement:unlocked") return;
    await this.db.transaction(async (q) => {
      const inserted = await q(
        `INSERT INTO achievement_unlocks (account_id, achievement_key, platform, unlocked_at)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (account_id, achievement_key) DO NOTHING`,
        [accountId, event.key, this.platform, event.at],
      );
      if (inserted.rowCount === 0) return;
      await q(
        `INSERT INTO achievement_stats (achievement_key, unlock_count, last_unlocked_at)
         VALUES ($1, 1, $2)
         ON CONFLICT (achievement_key) DO UPDATE
         SET unlock_count = achievement_stats.unlock_count + 1, last_unlocked_at = EXCLUDED.last_unlocked_at`,
        [event.key, event.at],
      );
    });
  }
}

type LeaderboardRow = {
  account_id: string;
  net_worth: number;
  day: number;
  updated_at: Date;
};

const toEntry = (r: LeaderboardRow): LeaderboardEntry => ({
  accountId: r.account_id,
  netWorth: Number(r.net_worth),
  day: Number(r.day),
  updatedAt: new Date(r.updated_at).toISOString(),
});

/** Table `leaderboard`: dernière valeur nette connue par compte. */
export class PgLeaderboard implements Leaderboard {
  readonly name = "pg-leaderboard";

  constructor(private readonly db: Db, private readonly platform: string) {}

  async record(entry: LeaderboardEntry) {
    try {
      await this.db.query(
        `INSERT INTO leaderboard (platform, account_id, net_worth, day, updated_at)
         VALUES ($1, $2, $3, $4, $5)
         ON CONFLICT (platform, account_id) DO UPDATE
         SET net_worth = EXCLUDED.net_worth, day = EXCLUDED.day, updated_at = EXCLUDED.updated_at`,
        [this.platform, entry.accountId, entry.netWorth, entry.day, entry.updatedAt],
      );
    } catch (err) {
      throw wrap("leaderboard", err);
    }
  }

  async top(limit: number = LEADERBOARD_SIZE, accountId?: string) {
    try {
      const { rows } = await this.db.query<LeaderboardRow>(
        `SELECT account_id, net_worth, day, updated_at FROM leaderboard
         WHERE platform = $1 AND ($2::text IS NULL OR account_id = $2)
         ORDER BY net_worth DESC, day ASC, account_id ASC
         LIMIT $3`,
        [this.platform, accountId ?? null, limit],
      );
      return rows.map(toEntry);
    } catch (err) {
      throw wrap("leaderboard", err);
    }
  }
}
