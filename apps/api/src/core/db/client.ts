import pg, { type Pool } from 'pg';
import type { Env } from '../config/env';

/**
 * Evita el warning de pg-connection-string:
 * - Si la URL trae sslmode/ssl lo quitamos del query
 * - El SSL se controla por config (ssl: {...})
 */
export function stripSslMode(cs: string) {
  try {
    const u = new URL(cs);
    u.searchParams.delete('sslmode');
    u.searchParams.delete('ssl');
    u.searchParams.delete('uselibpqcompat');
    return u.toString();
  } catch {
    return cs;
  }
}

export function createPool(env: Env): Pool {
  // En prod normalmente sí o sí SSL. Se puede forzar con DATABASE_SSL
  const useSSL = env.DATABASE_SSL ?? env.NODE_ENV === 'production';

  const pool = new pg.Pool({
    connectionString: stripSslMode(env.DATABASE_URL),
    max: env.DATABASE_POOL_MAX,
    ssl: useSSL ? { rejectUnauthorized: false } : undefined
  });

  // Un cliente idle que se cae (restart de Postgres) no debe tumbar el proceso
  pool.on('error', (err) => {
    console.error('📦 Idle client error', err);
  });

  return pool;
}

/** Lo mínimo de pg.PoolClient / pg.Pool que usa withTx. */
export interface TxClient {
  query(text: string, values?: unknown[]): Promise<unknown>;
  release(): void;
}

export interface TxPool {
  connect(): Promise<TxClient>;
}

/**
 * Helper transaccional:
 * - BEGIN
 * - fn(client)
 * - COMMIT / ROLLBACK
 * - release()
 */
export async function withTx<T>(
  pool: TxPool,
  fn: (client: TxClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (e) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      console.error('📦 Rollback failed', rollbackErr);
    }
    throw e;
  } finally {
    client.release();
  }
}

export async function connectDB(pool: Pool) {
  const client = await pool.connect();
  client.release();
  console.log('📦 Database connected');
}

export async function disconnectDB(pool: Pool) {
  await pool.end();
  console.log('📦 Database disconnected');
}
