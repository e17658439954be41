import type { NextFunction, Request, Response } from 'express';
import type { EventsService } from '../events/events.service';
import { renderMarkdown } from '../../core/markdown';
import { encode, encodeSvg } from '../../core/qr';
import { renderEventPage } from './pages.render';

export function createPagesController(eventsService: EventsService) {
  // GET /e/:id -> lo que ve quien escanea el QR
  async function eventPageHandler(
    req: Request,
    res: Response,
    next: NextFunction
  ) {
    try {
      const event = await eventsService.recordView(req.params.id);
      const html = renderEventPage(event, renderMarkdown(event.content));

      res.setHeader('Cache-Control', 'no-cache');
      return res.status(200).type('html').send(html);
    } catch (err) {
      next(err);
    }
  }

  async function qrPngHandler(req: Request, res: Response, next: NextFunction) {
    try {
      const event = await eventsService.getPublicEvent(req.params.id);
      const png = await encode(eventsService.links(event.id).page);

      return res.status(200).type('png').send(png);
    } catch (err) {
      next(err);
    }
  }

  async function qrSvgHandler(req: Request, res: Response, next: NextFunction) {
    try {
      const event = await eventsService.getPublicEvent(req.params.id);
      const svg = await encodeSvg(eventsService.links(event.id).page);

      return res.status(200).type('image/svg+xml').send(svg);
    } catch (err) {
      next(err);
    }
  }

  return { eventPageHandler, qrPngHandler, qrSvgHandler };
}
