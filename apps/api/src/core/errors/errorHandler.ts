import type { NextFunction, Request, Response } from 'express';
import type { ApiError } from '@flyerqr/types';
import { AppError } from './AppError';

// body-parser marca sus errores con `type` y `status`
function isBodyParseError(err: unknown): err is SyntaxError & { type: string } {
  return (
    err instanceof SyntaxError &&
    'type' in err &&
    err.type === 'entity.parse.failed'
  );
}

function isPayloadTooLarge(err: unknown) {
  return (
    err instanceof Error && 'type' in err && err.type === 'entity.too.large'
  );
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction
) {
  if (err instanceof AppError) {
    const body: ApiError = {
      error: err.message,
      details: err.details ?? null
    };
    return res.status(err.statusCode).json(body);
  }

  if (isBodyParseError(err)) {
    const body: ApiError = { error: 'Invalid JSON body', details: null };
    return res.status(400).json(body);
  }

  if (isPayloadTooLarge(err)) {
    const body: ApiError = { error: 'Payload too large', details: null };
    return res.status(413).json(body);
  }

  console.error('Unhandled error:', err);

  const body: ApiError = { error: 'Internal server error', details: null };
  return res.status(500).json(body);
}
