import { EngineError } from "../engine/errors";
import { exportSnapshot, importSnapshot } from "../engine/sync";
import { syncLogger } from "../logger";
import type { SnapshotStore } from "./stores";

export interface AccountRef {
  platform: string;
  accountId: string;
}

export interface MigrationRecord {
  source: AccountRef;
  target: AccountRef;
  migratedAt: string;
  fieldCount: number;
  // nombre de passages pour ce couple source/cible
  runs: number;
}

export interface MigrationLog {
  /** Upsert sur le couple source/cible. */
  record(source: AccountRef, target: AccountRef, migratedAt: string, fieldCount: number): Promise<MigrationRecord>;
  list(): Promise<MigrationRecord[]>;
}

const refKey = (ref: AccountRef) => `${ref.platform}:${ref.accountId}`;

export class MemoryMigrationLog implements MigrationLog {
  private readonly records = new Map<string, MigrationRecord>();

  async record(source: AccountRef, target: AccountRef, migratedAt: string, fieldCount: number) {
    const key = `${refKey(source)}->${refKey(target)}`;
    const previous = this.records.get(key);
    const record: MigrationRecord = { source, target, migratedAt, fieldCount, runs: (previous?.runs ?? 0) + 1 };
    this.records.set(key, record);
    return record;
  }

  async list() {
    return [...this.records.values()];
  }
}

export interface MigrationDeps {
  stores: (platform: string) => SnapshotStore | undefined;
  audit: MigrationLog;
  now?: () => Date;
}

function storeFor(deps: MigrationDeps, ref: AccountRef) {
  const store = deps.stores(ref.platform);
  if (!store) throw new EngineError("NotFound", `Plateforme inconnue: ${ref.platform}`);
  return store;
}

/**
 * Copie un compte d'un stockage à l'autre (export puis import) et trace la
 * migration. Rejouer la même migration écrase la cible et le journal.
 */
export async function migrate(source: AccountRef, target: AccountRef, deps: MigrationDeps): Promise<MigrationRecord> {
  const from = storeFor(deps, source);
  const to = storeFor(deps, target);
  const snapshot = await from.load(source.accountId);
  if (!snapshot) throw new EngineError("NotFound", `Compte introuvable: ${refKey(source)}`);

  const game = importSnapshot(snapshot, { accountId: target.accountId });
  game.account.meta.migratedFrom = refKey(source);
  const migrated = exportSnapshot(game);
  await to.save(target.accountId, migrated);

  const migratedAt = (deps.now ?? (() => new Date()))().toISOString();
  const record = await deps.audit.record(source, target, migratedAt, Object.keys(migrated).length);
  syncLogger.info({ source: refKey(source), target: refKey(target), runs: record.runs }, "migration effectuée");
  return record;
}
