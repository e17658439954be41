import { z } from 'zod';

export const DEFAULT_TITLE = 'Untitled Event';
export const MAX_CONTENT_LENGTH = 50_000;

// 9 bytes aleatorios en base64url
export const eventIdSchema = z.string().regex(/^[A-Za-z0-9_-]{12}$/);

const titleSchema = z
  .string()
  .trim()
  .max(255, 'Title too long (max 255 chars)');

const contentSchema = z
  .string()
  .trim()
  .min(1, 'Content required')
  .max(MAX_CONTENT_LENGTH, `Content too long (max ${MAX_CONTENT_LENGTH} chars)`);

export const createEventSchema = z.object({
  title: titleSchema.optional(),
  content: contentSchema,
  isPublic: z.boolean().optional()
});

export const updateEventSchema = z
  .object({
    title: titleSchema.optional(),
    content: contentSchema.optional(),
    isPublic: z.boolean().optional()
  })
  .refine(
    (data) =>
      data.title !== undefined ||
      data.content !== undefined ||
      data.isPublic !== undefined,
    { message: 'Nothing to update' }
  );

export type CreateEventInput = z.infer<typeof createEventSchema>;
export type UpdateEventInput = z.infer<typeof updateEventSchema>;
