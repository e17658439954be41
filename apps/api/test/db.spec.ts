import { describe, it, expect, vi, afterEach } from 'vitest';
import { createPool, withTx, type TxClient, type TxPool } from '../src/core/db/client';
import { ensureSchema } from '../src/core/db/schema';
import { envSchema } from '../src/core/config/env';

class RecordingClient implements TxClient {
  readonly queries: string[] = [];
  released = 0;

  constructor(private readonly failOn?: string) {}

  async query(text: string) {
    this.queries.push(text.trim());
    if (this.failOn && text.trim() === this.failOn) {
      throw new Error(`${this.failOn} failed`);
    }
    return { rows: [] };
  }

  release() {
    this.released += 1;
  }
}

class StubPool implements TxPool {
  constructor(readonly client: RecordingClient) {}

  async connect() {
    return this.client;
  }
}

describe('withTx', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('commits and releases on success', async () => {
    const pool = new StubPool(new RecordingClient());

    const result = await withTx(pool, async (client) => {
      await client.query('SELECT 1');
      return 42;
    });

    expect(result).toBe(42);
    expect(pool.client.queries).toEqual(['BEGIN', 'SELECT 1', 'COMMIT']);
    expect(pool.client.released).toBe(1);
  });

  it('rolls back, releases and rethrows on failure', async () => {
    const pool = new StubPool(new RecordingClient());
    const boom = new Error('boom');

    await expect(
      withTx(pool, async () => {
        throw boom;
      })
    ).rejects.toBe(boom);

    expect(pool.client.queries).toEqual(['BEGIN', 'ROLLBACK']);
    expect(pool.client.released).toBe(1);
  });

  it('keeps the original error when ROLLBACK itself fails', async () => {
    const logged = vi.spyOn(console, 'error').mockImplementation(() => {});
    const pool = new StubPool(new RecordingClient('ROLLBACK'));

    await expect(
      withTx(pool, async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(pool.client.released).toBe(1);
    expect(logged).toHaveBeenCalledTimes(1);
    expect(logged.mock.calls[0][0]).toBe('📦 Rollback failed');
  });
});

describe('ensureSchema', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('creates the events table inside a transaction', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const pool = new StubPool(new RecordingClient());

    await ensureSchema(pool);

    expect(pool.client.queries).toHaveLength(3);
    expect(pool.client.queries[0]).toBe('BEGIN');
    expect(pool.client.queries[1].startsWith('CREATE TABLE IF NOT EXISTS events')).toBe(true);
    expect(pool.client.queries[2]).toBe('COMMIT');
    expect(pool.client.released).toBe(1);
  });
});

describe('createPool', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs idle client errors instead of crashing', async () => {
    const logged = vi.spyOn(console, 'error').mockImplementation(() => {});
    const pool = createPool(
      envSchema.parse({
        DATABASE_URL: 'postgres://u:p@db.test:5432/flyerqr',
        JWT_SECRET: 'x'.repeat(32)
      })
    );
    const err = new Error('terminating connection due to administrator command');

    expect(pool.emit('error', err)).toBe(true);
    expect(logged).toHaveBeenCalledWith('📦 Idle client error', err);

    await pool.end();
  });
});
