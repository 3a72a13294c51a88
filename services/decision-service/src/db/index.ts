import { Pool } from "pg";
import { config } from "../config";
import type { ServiceConfig } from "../config";
import { logger } from "../logger";

export type QueryResultLike = {
  rows: unknown[];
  rowCount: number | null;
};

export type Queryable = {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
};

let pool: Pool | null = null;

export function getDb(settings: ServiceConfig = config): Queryable | null {
  if (!settings.db.enabled || settings.useInMemoryStore) {
    return null;
  }
  if (!pool) {
    pool = new Pool({
      host: settings.db.host,
      port: settings.db.port,
      user: settings.db.user,
      password: settings.db.password,
      database: settings.db.database
    });
  }
  const active = pool;
  return {
    query: (text, values) => active.query(text, values)
  };
}

export async function migrate(settings: ServiceConfig = config): Promise<void> {
  const db = getDb(settings);
  if (!db) {
    logger.warn("DB not configured; decision runs are kept in memory");
    return;
  }
  await db.query(
    "CREATE TABLE IF NOT EXISTS decision_runs (thread_id TEXT PRIMARY KEY, session_id TEXT NOT NULL, status TEXT NOT NULL, record JSONB NOT NULL, transitions JSONB NOT NULL, created_at TIMESTAMPTZ NOT NULL, updated_at TIMESTAMPTZ NOT NULL)"
  );
  await db.query("CREATE INDEX IF NOT EXISTS decision_runs_session_idx ON decision_runs (session_id)");
  await db.query(
    "CREATE TABLE IF NOT EXISTS decision_sessions (session_id TEXT PRIMARY KEY, active_thread_id TEXT, updated_at TIMESTAMPTZ DEFAULT NOW())"
  );
  await db.query(
    "CREATE TABLE IF NOT EXISTS decision_history (id BIGSERIAL PRIMARY KEY, session_id TEXT NOT NULL, thread_id TEXT NOT NULL UNIQUE, record JSONB NOT NULL, recorded_at TIMESTAMPTZ NOT NULL)"
  );
  logger.info("Decision storage ready");
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
