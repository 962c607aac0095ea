import { readFile } from "node:fs/promises";
import { Pool, type QueryResult, type QueryResultRow } from "pg";
import { describeError, type Logger } from "../observability/logger.js";

/** The slice of `pg` the repositories use; `Pool` satisfies it. */
export interface SqlClient {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<QueryResult<R>>;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlClient & { release(): void }>;
}

export function createPostgresPool(): Pool {
  return new Pool({
    host: process.env.PGHOST ?? "127.0.0.1",
    port: Number(process.env.PGPORT ?? 5432),
    user: process.env.PGUSER ?? "app",
    password: process.env.PGPASSWORD,
    database: process.env.PGDATABASE ?? "relay_chat",
    max: Number(process.env.PG_MAX_POOL ?? 10),
    idleTimeoutMillis: Number(process.env.PG_IDLE_TIMEOUT_MS ?? 30000),
  });
}

export async function applyMigrations(pool: SqlClient): Promise<void> {
  const migration = await readFile(
    new URL("../../sql/001_init.sql", import.meta.url),
    "utf8",
  );
  await pool.query(migration);
}

/**
 * Runs `work` inside BEGIN/COMMIT, rolling back on any error. A failed
 * ROLLBACK is logged; the caller still sees the error that aborted `work`.
 */
export async function withTransaction<T>(
  pool: SqlPool,
  work: (client: SqlClient) => Promise<T>,
  logger?: Logger,
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await work(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackError) {
      logger?.error("rollback failed", describeError(rollbackError));
    }
    throw error;
  } finally {
    client.release();
  }
}
