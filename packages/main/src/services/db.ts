import { Pool } from 'pg';
import type { PoolClient, PoolConfig } from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import type { Settings } from '../../../shared/src';
import { loadConfig } from './config';
import { logger } from '../logger';
import { schema } from '../db/schema';

let pool: Pool | null = null;

export type AppDb = NodePgDatabase<typeof schema>;

function toPoolConfig(settings: Settings['db'], max: number, connectionTimeoutMillis: number): PoolConfig {
  const config: PoolConfig = {
    host: settings.host,
    port: settings.port,
    user: settings.user,
    database: settings.database,
    max,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis,
    ssl: settings.sslMode === 'disable' ? false : { rejectUnauthorized: settings.sslMode === 'verify-full' }
  };
  if (settings.password) {
    config.password = settings.password;
  }
  return config;
}

export function getPool(): Pool {
  if (pool) return pool;
  const created = new Pool(toPoolConfig(loadConfig().db, 10, 10000));
  created.on('error', (err: unknown) => logger.error({ err }, 'PG pool error'));
  pool = created;
  return created;
}

export async function resetPool() {
  if (!pool) return;
  const current = pool;
  pool = null;
  try {
    await current.end();
  } catch (err) {
    logger.warn({ err }, 'Failed to close PG pool');
  }
}

export async function testConnection(settings = loadConfig().db): Promise<{ ok: true } | { ok: false; error: string }> {
  const tmp = new Pool(toPoolConfig(settings, 1, 8000));
  try {
    const c = await tmp.connect();
    try {
      await c.query('SELECT 1');
    } finally {
      c.release();
    }
    await tmp.end();
    return { ok: true };
  } catch (e: unknown) {
    await tmp.end().catch((endErr: unknown) => logger.debug({ err: endErr }, 'Failed to close test pool'));
    const msg = e instanceof Error ? e.message : String(e);
    return { ok: false, error: msg };
  }
}

function shouldResetPoolForError(err: unknown): boolean {
  const msg = err instanceof Error ? err.message : String(err);
  const lowered = msg.toLowerCase();
  // Common transient connection issues worth a quick reset+retry
  return (
    lowered.includes('connection terminated unexpectedly') ||
    lowered.includes('connection terminated due to connection timeout') ||
    lowered.includes('terminating connection due to administrator command') ||
    lowered.includes('timeout') ||
    lowered.includes('econnreset') ||
    lowered.includes('econnrefused')
  );
}

export async function withClient<T>(fn: (c: PoolClient) => Promise<T>): Promise<T> {
  // Up to two attempts to handle transient connection failures
  for (let attempt = 1; ; attempt += 1) {
    try {
      const c = await getPool().connect();
      try {
        await c.query(`SET statement_timeout TO ${loadConfig().db.statementTimeoutMs}`);
        return await fn(c);
      } finally {
        c.release();
      }
    } catch (err) {
      if (attempt >= 2 || !shouldResetPoolForError(err)) {
        throw err;
      }
      logger.warn({ err, attempt }, 'PG connect failed; resetting pool and retrying');
      await resetPool();
      await new Promise((r) => setTimeout(r, 200));
    }
  }
}

export async function withDb<T>(fn: (db: AppDb) => Promise<T>): Promise<T> {
  return withClient(async (client) => fn(drizzle(client, { schema })));
}
