import { Pool, type PoolClient, type QueryResultRow } from "pg";
import { storeLogger } from "./logger";

export interface QueryResult<R> {
  rows: R[];
  rowCount: number;
}

export type Query = <R extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]) => Promise<QueryResult<R>>;

export interface Db {
  query: Query;
  /** BEGIN / COMMIT, ROLLBACK sur toute erreur. */
  transaction<T>(fn: (query: Query) => Promise<T>): Promise<T>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

function queryOn(client: Pool | PoolClient): Query {
  return async <R extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]) => {
    const result = await client.query<R>(sql, params);
    return { rows: result.rows, rowCount: result.rowCount ?? 0 };
  };
}

export function createDb(connectionString: string): Db {
  const pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });
  pool.on("error", (err) => storeLogger.error({ err }, "pg: erreur sur une connexion inactive"));

  return {
    query: queryOn(pool),

    async transaction<T>(fn: (query: Query) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      try {
        await client.query("BEGIN");
        const result = await fn(queryOn(client));
        await client.query("COMMIT");
        return result;
      } catch (err) {
        await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
          storeLogger.error({ err: rollbackErr }, "pg: ROLLBACK en échec");
        });
        throw err;
      } finally {
        client.release();
      }
    },

    async ping() {
      try {
        await pool.query("SELECT 1");
        return true;
      } catch (err) {
        storeLogger.warn({ err }, "pg: base injoignable");
        return false;
      }
    },

    close: () => pool.end(),
  };
}
