import type { Request, Response, NextFunction, RequestHandler } from 'express';
import morgan from 'morgan';
import { z } from 'zod';
import { ROLES } from '@shared/constants';
import type { ApiResponse, ErrorKind } from '@shared/types';
import { isCfpError, permissionDenied } from '@core/errors';
import { isOrganizer, type Actor } from '@core/identity';

export const requestLogger = morgan('dev');

// ---- Error mapping ----

export const HTTP_STATUS: Record<ErrorKind, number> = {
  ValidationError: 400,
  InvalidTransition: 409,
  PermissionDenied: 403,
  NotFound: 404,
  Conflict: 409,
  StateError: 409,
  StorageError: 500,
};

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  if (isCfpError(err)) {
    const status = HTTP_STATUS[err.kind];
    if (status >= 500) console.error('[ERROR]', err.code, err.message, err.cause ?? '');
    const body: ApiResponse = {
      success: false,
      error: err.message,
      code: err.code,
      details: err.details,
    };
    return res.status(status).json(body);
  }
  // body-parser reports malformed JSON with a 4xx status
  if ('status' in err && typeof err.status === 'number' && err.status < 500) {
    return res.status(err.status).json({ success: false, error: err.message, code: 'VALIDATION_ERROR' });
  }
  console.error('[ERROR]', err.message);
  res.status(500).json({ success: false, error: err.message, code: 'STORAGE_ERROR' });
}

/** Forwards a rejected handler promise to `errorHandler`. */
export function asyncHandler(
  fn: (req: Request, res: Response) => Promise<unknown>,
): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

// ---- Identity ----

const identitySchema = z.object({
  'x-user-id': z.string().uuid(),
  'x-user-role': z.enum(ROLES),
});

/** Reads the caller from the identity headers set by the upstream auth proxy. */
export function actorOf(req: Request): Actor {
  const parsed = identitySchema.safeParse(req.headers);
  if (!parsed.success) {
    throw permissionDenied('x-user-id (uuid) and x-user-role (speaker | organizer) headers are required');
  }
  return { userId: parsed.data['x-user-id'], role: parsed.data['x-user-role'] };
}

export function organizerOf(req: Request): Actor {
  const actor = actorOf(req);
  if (!isOrganizer(actor)) throw permissionDenied('Only organizers can do this');
  return actor;
}
