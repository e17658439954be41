import { withTx, type TxPool } from './client';

const EVENTS_DDL = `
  CREATE TABLE IF NOT EXISTS events (
    id          text PRIMARY KEY,
    title       text NOT NULL,
    content     text NOT NULL,
    is_public   boolean NOT NULL DEFAULT true,
    view_count  integer NOT NULL DEFAULT 0,
    created_at  timestamptz NOT NULL DEFAULT now(),
    updated_at  timestamptz NOT NULL DEFAULT now()
  )
`;

export async function ensureSchema(pool: TxPool) {
  await withTx(pool, async (client) => {
    await client.query(EVENTS_DDL);
  });
  console.log('📦 Schema ready');
}
