import crypto from 'node:crypto';
import type {
  CreateEventResponse,
  EventLinks,
  EventRecord,
  PublicEvent
} from '@flyerqr/types';
import { NotFoundError } from '../../core/errors/AppError';
import { signEditToken } from '../../core/auth/editToken';
import { encodeDataUrl } from '../../core/qr';
import { renderMarkdown } from '../../core/markdown';
import type { AppConfig } from '../../core/config/env';
import {
  DEFAULT_TITLE,
  eventIdSchema,
  type CreateEventInput,
  type UpdateEventInput
} from './events.schemas';
import type { EventPatch, EventsRepository } from './events.repository';

export function newEventId() {
  return crypto.randomBytes(9).toString('base64url');
}

/**
 * La URL del visitante sale solo del id, así el QR impreso nunca cambia
 * aunque el contenido se edite.
 */
export function buildEventLinks(publicBaseUrl: string, id: string): EventLinks {
  const page = `${publicBaseUrl}/e/${id}`;

  return {
    page,
    qrPng: `${page}/qr.png`,
    qrSvg: `${page}/qr.svg`
  };
}

export function toPublicEvent(event: EventRecord): PublicEvent {
  return {
    id: event.id,
    title: event.title,
    content: event.content,
    updatedAt: event.updatedAt
  };
}

function normalizeTitle(title: string | undefined) {
  return title?.trim() || DEFAULT_TITLE;
}

// Ids con formato inválido se tratan igual que ids inexistentes
function assertEventId(id: string) {
  if (!eventIdSchema.safeParse(id).success) {
    throw new NotFoundError();
  }
}

export interface EventsServiceDeps {
  repo: EventsRepository;
  config: Pick<AppConfig, 'jwtSecret' | 'publicBaseUrl'>;
}

export function createEventsService({ repo, config }: EventsServiceDeps) {
  async function getEvent(id: string): Promise<EventRecord> {
    assertEventId(id);

    const event = await repo.findById(id);

    if (!event) {
      throw new NotFoundError();
    }

    return event;
  }

  return {
    getEvent,

    links(id: string) {
      return buildEventLinks(config.publicBaseUrl, id);
    },

    async createEvent(payload: CreateEventInput): Promise<CreateEventResponse> {
      const event = await repo.insert({
        id: newEventId(),
        title: normalizeTitle(payload.title),
        content: payload.content,
        isPublic: payload.isPublic ?? true
      });

      const links = buildEventLinks(config.publicBaseUrl, event.id);

      // El QR se genera una sola vez, al crear
      const dataUrl = await encodeDataUrl(links.page);

      return {
        event,
        editToken: signEditToken(event.id, config.jwtSecret),
        links,
        qr: { url: links.page, dataUrl }
      };
    },

    async getPublicEvent(id: string): Promise<PublicEvent> {
      const event = await getEvent(id);

      if (!event.isPublic) {
        throw new NotFoundError();
      }

      return toPublicEvent(event);
    },

    async updateEvent(id: string, payload: UpdateEventInput) {
      assertEventId(id);

      const patch: EventPatch = {
        content: payload.content,
        isPublic: payload.isPublic
      };
      if (payload.title !== undefined) {
        patch.title = normalizeTitle(payload.title);
      }

      const updated = await repo.update(id, patch);

      if (!updated) {
        throw new NotFoundError();
      }

      return updated;
    },

    async deleteEvent(id: string) {
      assertEventId(id);

      const deleted = await repo.deleteById(id);

      if (!deleted) {
        throw new NotFoundError();
      }
    },

    /** Visita de un QR escaneado: cuenta la vista y devuelve lo último. */
    async recordView(id: string): Promise<PublicEvent> {
      assertEventId(id);

      const event = await repo.incrementViews(id);

      if (!event) {
        throw new NotFoundError();
      }

      return toPublicEvent(event);
    },

    async previewEvent(id: string) {
      const event = await getEvent(id);
      return { html: renderMarkdown(event.content) };
    }
  };
}

export type EventsService = ReturnType<typeof createEventsService>;
