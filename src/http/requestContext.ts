import express from 'express';
// nanoid generates short, URL-safe ids for request correlation.
import { nanoid } from 'nanoid';
import type { ErrorContext } from '../errors/mapError';

export const REQUEST_ID_HEADER = 'x-request-id';

// Reuses the caller's request id when one is supplied, otherwise mints one, and echoes it back.
export function requestId(req: express.Request, res: express.Response, next: express.NextFunction): void {
  const supplied = req.header(REQUEST_ID_HEADER)?.trim();
  const id = supplied ? supplied : nanoid(16);
  res.locals.requestId = id;
  res.setHeader(REQUEST_ID_HEADER, id);
  next();
}

// Requested path (query string dropped) and request id recorded with every error log line.
export function errorContext(req: express.Request, res: express.Response): ErrorContext {
  const id: unknown = res.locals.requestId;
  return {
    path: req.originalUrl.split('?')[0],
    requestId: typeof id === 'string' ? id : undefined,
  };
}
