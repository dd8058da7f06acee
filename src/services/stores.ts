import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import { errorMessage, PersistenceError } from "../engine/errors";
import { snapshotRecordSchema, type Snapshot } from "../engine/sync";
import { storeLogger } from "../logger";
import { KeyedMutex } from "./keyedMutex";

/** Résultat d'une lecture-modification-écriture; sans `snapshot`, rien n'est écrit. */
export interface UpdateOutcome<T> {
  snapshot?: Snapshot;
  result: T;
}

export type Updater<T> = (current: Snapshot | null) => Promise<UpdateOutcome<T>> | UpdateOutcome<T>;

export interface SnapshotStore {
  readonly name: string;
  load(accountId: string): Promise<Snapshot | null>;
  save(accountId: string, snapshot: Snapshot): Promise<void>;
  /** Lecture-modification-écriture sérialisée pour un même compte. */
  update<T>(accountId: string, fn: Updater<T>): Promise<T>;
  list(): Promise<string[]>;
}

export class MemorySnapshotStore implements SnapshotStore {
  readonly name: string;
  private readonly rows = new Map<string, Snapshot>();
  private readonly mutex = new KeyedMutex();

  constructor(name = "memory") {
    this.name = name;
  }

  async load(accountId: string) {
    const row = this.rows.get(accountId);
    return row ? { ...row } : null;
  }

  async save(accountId: string, snapshot: Snapshot) {
    await this.mutex.run(accountId, () => {
      this.rows.set(accountId, { ...snapshot });
    });
  }

  update<T>(accountId: string, fn: Updater<T>): Promise<T> {
    return this.mutex.run(accountId, async () => {
      const row = this.rows.get(accountId);
      const outcome = await fn(row ? { ...row } : null);
      if (outcome.snapshot) this.rows.set(accountId, { ...outcome.snapshot });
      return outcome.result;
    });
  }

  async list() {
    return [...this.rows.keys()].sort();
  }
}

const saveFileSchema = z.object({
  accountId: z.string(),
  savedAt: z.string(),
  snapshot: snapshotRecordSchema,
});

export function encodeAccountId(accountId: string) {
  return encodeURIComponent(accountId).replace(/[!'()*~]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

export function decodeAccountId(encoded: string): string | null {
  try {
    const id = decodeURIComponent(encoded);
    return encodeAccountId(id) === encoded ? id : null;
  } catch {
    return null;
  }
}

/** Sauvegardes locales: un fichier JSON par compte. */
export class FileSnapshotStore implements SnapshotStore {
  readonly name: string;
  private readonly mutex = new KeyedMutex();

  constructor(private readonly dir: string, name = "file") {
    this.name = name;
  }

  // Encodage bijectif: deux identifiants distincts ne partagent jamais un fichier
  private fileFor(accountId: string) {
    return path.join(this.dir, `save_${encodeAccountId(accountId)}.json`);
  }

  private async read(file: string): Promise<z.infer<typeof saveFileSchema> | null> {
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
      throw new PersistenceError(`Lecture impossible: ${path.basename(file)}`, err);
    }
    try {
      return saveFileSchema.parse(JSON.parse(raw));
    } catch (err) {
      throw new PersistenceError(`Sauvegarde corrompue: ${path.basename(file)} (${errorMessage(err)})`, err);
    }
  }

  private async write(accountId: string, snapshot: Snapshot) {
    const file = this.fileFor(accountId);
    const tmp = `${file}.tmp`;
    try {
      await fs.mkdir(this.dir, { recursive: true });
      const body = JSON.stringify({ accountId, savedAt: new Date().toISOString(), snapshot }, null, 2);
      await fs.writeFile(tmp, body, "utf8");
      await fs.rename(tmp, file);
    } catch (err) {
      throw new PersistenceError(`Écriture impossible: ${path.basename(file)}`, err);
    }
  }

  private async readAccount(accountId: string) {
    const file = this.fileFor(accountId);
    const saved = await this.read(file);
    if (saved && saved.accountId !== accountId) {
      throw new PersistenceError(`Sauvegarde d'un autre compte: ${path.basename(file)} (${saved.accountId})`);
    }
    return saved;
  }

  async load(accountId: string) {
    const saved = await this.readAccount(accountId);
    return saved ? saved.snapshot : null;
  }

  save(accountId: string, snapshot: Snapshot) {
    return this.mutex.run(accountId, () => this.write(accountId, snapshot));
  }

  update<T>(accountId: string, fn: Updater<T>): Promise<T> {
    return this.mutex.run(accountId, async () => {
      const saved = await this.readAccount(accountId);
      const outcome = await fn(saved ? saved.snapshot : null);
      if (outcome.snapshot) await this.write(accountId, outcome.snapshot);
      return outcome.result;
    });
  }

  async list() {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw new PersistenceError("Dossier de sauvegardes illisible", err);
    }
    // Identifiant tiré du nom: une sauvegarde illisible n'empêche pas de lister les autres
    const ids: string[] = [];
    for (const name of names) {
      const match = /^save_(.+)\.json$/.exec(name);
      if (!match?.[1]) continue;
      const id = decodeAccountId(match[1]);
      if (id === null) {
        storeLogger.warn({ file: name }, "nom de sauvegarde invalide, ignoré");
        continue;
      }
      ids.push(id);
    }
    return ids.sort();
  }
}

/**
 * Stockage principal avec repli local: une PersistenceError bascule
 * l'opération sur le repli, avec un avertissement.
 */
export class FallbackSnapshotStore implements SnapshotStore {
  readonly name: string;

  constructor(private readonly primary: SnapshotStore, private readonly fallback: SnapshotStore) {
    this.name = `${primary.name}+${fallback.name}`;
  }

  private async attempt<T>(op: string, accountId: string | null, run: (store: SnapshotStore) => Promise<T>): Promise<T> {
    try {
      return await run(this.primary);
    } catch (err) {
      if (!(err instanceof PersistenceError)) throw err;
      storeLogger.warn({ op, accountId, primary: this.primary.name, fallback: this.fallback.name, err: err.message }, "stockage principal indisponible, repli local");
      return run(this.fallback);
    }
  }

  load(accountId: string) {
    return this.attempt("load", accountId, (s) => s.load(accountId));
  }

  save(accountId: string, snapshot: Snapshot) {
    return this.attempt("save", accountId, (s) => s.save(accountId, snapshot));
  }

  update<T>(accountId: string, fn: Updater<T>) {
    return this.attempt("update", accountId, (s) => s.update(accountId, fn));
  }

  list() {
    return this.attempt("list", null, (s) => s.list());
  }
}
