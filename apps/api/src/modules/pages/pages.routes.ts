import { Router, type NextFunction, type Request, type Response } from 'express';
import { NotFoundError } from '../../core/errors/AppError';
import type { EventsService } from '../events/events.service';
import { createPagesController } from './pages.controller';
import { renderNotFoundPage } from './pages.render';

// Los visitantes ven HTML, no JSON
function notFoundPage(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction
) {
  if (err instanceof NotFoundError) {
    return res.status(404).type('html').send(renderNotFoundPage());
  }

  next(err);
}

export function createPagesRouter(eventsService: EventsService) {
  const controller = createPagesController(eventsService);

  const pagesRouter = Router();

  // GET /e/:id/qr.png
  pagesRouter.get('/:id/qr.png', controller.qrPngHandler);

  // GET /e/:id/qr.svg
  pagesRouter.get('/:id/qr.svg', controller.qrSvgHandler);

  // GET /e/:id
  pagesRouter.get('/:id', controller.eventPageHandler);

  pagesRouter.use(notFoundPage);

  return pagesRouter;
}
