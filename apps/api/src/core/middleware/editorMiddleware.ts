import type { NextFunction, Request, Response } from 'express';
import { AppError } from '../errors/AppError';
import { verifyEditToken } from '../auth/editToken';

export function requireEditToken(secret: string) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const header = req.headers['authorization'];

    if (!header || typeof header !== 'string') {
      throw new AppError(401, 'Missing Authorization header');
    }

    const [scheme, token] = header.split(' ');

    if (scheme !== 'Bearer' || !token) {
      throw new AppError(401, 'Invalid Authorization header format');
    }

    try {
      const payload = verifyEditToken(token, secret);

      req.editor = {
        eventId: payload.sub,
        tokenPayload: payload
      };
    } catch {
      throw new AppError(401, 'Invalid edit token');
    }

    next();
  };
}

// El token solo sirve para el evento con el que se emitió
export function requireEventEditor() {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!req.editor) {
      throw new AppError(401, 'Unauthorized');
    }

    if (req.editor.eventId !== req.params.id) {
      throw new AppError(403, 'Edit token does not belong to this event');
    }

    next();
  };
}
