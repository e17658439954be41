import type { NextFunction, Request, Response } from 'express';
import { createEventSchema, updateEventSchema } from './events.schemas';
import type { EventsService } from './events.service';
import { AppError } from '../../core/errors/AppError';

export function createEventsController(eventsService: EventsService) {
  async function createEventHandler(
    req: Request,
    res: Response,
    next: NextFunction
  ) {
    try {
      const parsed = createEventSchema.safeParse(req.body);

      if (!parsed.success) {
        throw new AppError(400, 'Validation error', parsed.error.flatten());
      }

      const created = await eventsService.createEvent(parsed.data);

      return res.status(201).json(created);
    } catch (err) {
      next(err);
    }
  }

  async function getEventHandler(
    req: Request,
    res: Response,
    next: NextFunction
  ) {
    try {
      const { id } = req.params;
      const event = await eventsService.getPublicEvent(id);
      return res.status(200).json({ event });
    } catch (err) {
      next(err);
    }
  }

  async function getManagedEventHandler(
    req: Request,
    res: Response,
    next: NextFunction
  ) {
    try {
      const event = await eventsService.getEvent(req.params.id);
      return res.status(200).json({
        event,
        links: eventsService.links(event.id)
      });
    } catch (err) {
      next(err);
    }
  }

  async function updateEventHandler(
    req: Request,
    res: Response,
    next: NextFunction
  ) {
    try {
      const parsed = updateEventSchema.safeParse(req.body);

      if (!parsed.success) {
        throw new AppError(400, 'Validation error', parsed.error.flatten());
      }

      const event = await eventsService.updateEvent(req.params.id, parsed.data);

      return res.status(200).json({ event });
    } catch (err) {
      next(err);
    }
  }

  async function deleteEventHandler(
    req: Request,
    res: Response,
    next: NextFunction
  ) {
    try {
      await eventsService.deleteEvent(req.params.id);
      return res.status(204).send(); // sin body
    } catch (err) {
      next(err);
    }
  }

  async function previewEventHandler(
    req: Request,
    res: Response,
    next: NextFunction
  ) {
    try {
      const preview = await eventsService.previewEvent(req.params.id);
      return res.status(200).json(preview);
    } catch (err) {
      next(err);
    }
  }

  return {
    createEventHandler,
    getEventHandler,
    getManagedEventHandler,
    updateEventHandler,
    deleteEventHandler,
    previewEventHandler
  };
}
