import { Router, type NextFunction, type Request, type Response } from 'express';
import {
  requireEditToken,
  requireEventEditor
} from '../../core/middleware/editorMiddleware';
import { createEventsController } from './events.controller';
import type { EventsService } from './events.service';

// Siempre revalidar: el organizador puede haber editado hace un segundo
function noCacheHeaders(_req: Request, res: Response, next: NextFunction) {
  res.setHeader('Cache-Control', 'no-cache');
  next();
}

export function createEventsRouter(eventsService: EventsService, jwtSecret: string) {
  const controller = createEventsController(eventsService);
  const editor = [requireEditToken(jwtSecret), requireEventEditor()];

  const eventsRouter = Router();

  // Público: crear evento (sin login, devuelve el token de edición)
  // POST /api/events
  eventsRouter.post('/', controller.createEventHandler);

  // Público: detalle evento
  // GET /api/events/:id
  eventsRouter.get('/:id', noCacheHeaders, controller.getEventHandler);

  // Con token de edición
  // GET /api/events/:id/manage
  eventsRouter.get('/:id/manage', ...editor, controller.getManagedEventHandler);

  // GET /api/events/:id/preview
  eventsRouter.get('/:id/preview', ...editor, controller.previewEventHandler);

  // PUT /api/events/:id
  eventsRouter.put('/:id', ...editor, controller.updateEventHandler);

  // DELETE /api/events/:id
  eventsRouter.delete('/:id', ...editor, controller.deleteEventHandler);

  return eventsRouter;
}
