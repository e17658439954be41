import { z } from 'zod';
import type { EventRecord } from '@flyerqr/types';

export interface NewEvent {
  id: string;
  title: string;
  content: string;
  isPublic: boolean;
}

export interface EventPatch {
  title?: string;
  content?: string;
  isPublic?: boolean;
}

export interface EventsRepository {
  insert(data: NewEvent): Promise<EventRecord>;
  findById(id: string): Promise<EventRecord | null>;
  update(id: string, patch: EventPatch): Promise<EventRecord | null>;
  deleteById(id: string): Promise<boolean>;
  /** Suma una vista solo si el evento existe y es público. */
  incrementViews(id: string): Promise<EventRecord | null>;
}

/** Lo mínimo que usamos de pg.Pool / pg.PoolClient. */
export interface Queryable {
  query(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

const COLUMNS =
  'id, title, content, is_public, view_count, created_at, updated_at';

const eventRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  content: z.string(),
  is_public: z.boolean(),
  view_count: z.coerce.number().int(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date()
});

export function rowToEvent(row: unknown): EventRecord {
  const r = eventRowSchema.parse(row);

  return {
    id: r.id,
    title: r.title,
    content: r.content,
    isPublic: r.is_public,
    viewCount: r.view_count,
    createdAt: r.created_at.toISOString(),
    updatedAt: r.updated_at.toISOString()
  };
}

function firstOrNull(rows: unknown[]) {
  return rows.length > 0 ? rowToEvent(rows[0]) : null;
}

export function createPgEventsRepository(db: Queryable): EventsRepository {
  return {
    async insert(data) {
      const r = await db.query(
        `
        INSERT INTO events (id, title, content, is_public)
        VALUES ($1, $2, $3, $4)
        RETURNING ${COLUMNS}
        `,
        [data.id, data.title, data.content, data.isPublic]
      );

      const created = firstOrNull(r.rows);
      if (!created) {
        throw new Error(`Insert of event ${data.id} returned no row`);
      }
      return created;
    },

    async findById(id) {
      const r = await db.query(
        `
        SELECT ${COLUMNS}
        FROM events
        WHERE id = $1
        LIMIT 1
        `,
        [id]
      );

      return firstOrNull(r.rows);
    },

    // Last write wins: un solo UPDATE, sin merge
    async update(id, patch) {
      const r = await db.query(
        `
        UPDATE events
        SET title = COALESCE($2, title),
            content = COALESCE($3, content),
            is_public = COALESCE($4, is_public),
            updated_at = now()
        WHERE id = $1
        RETURNING ${COLUMNS}
        `,
        [id, patch.title ?? null, patch.content ?? null, patch.isPublic ?? null]
      );

      return firstOrNull(r.rows);
    },

    async deleteById(id) {
      const r = await db.query(`DELETE FROM events WHERE id = $1`, [id]);
      return (r.rowCount ?? 0) > 0;
    },

    async incrementViews(id) {
      const r = await db.query(
        `
        UPDATE events
        SET view_count = view_count + 1
        WHERE id = $1 AND is_public = true
        RETURNING ${COLUMNS}
        `,
        [id]
      );

      return firstOrNull(r.rows);
    }
  };
}
