import express from 'express';
import { BusinessError, describeError } from '../errors/httpError';
import { respondWithError } from '../errors/respond';
import type { ErrorLog } from '../logger';
import { errorContext } from './requestContext';

const BODY_ERROR_MESSAGES: Record<string, string> = {
  'entity.parse.failed': 'malformed JSON body',
  'entity.too.large': 'request body too large',
  'entity.verify.failed': 'request body rejected',
  'charset.unsupported': 'unsupported body charset',
  'encoding.unsupported': 'unsupported content encoding',
};

/**
 * express.json() rejects bad bodies with errors carrying a `type` such as
 * `entity.too.large` and an exposable 4xx `status`. Those are the client's
 * fault, so they become business errors with a fixed message.
 */
function fromBodyParserError(err: unknown): BusinessError | undefined {
  if (!(err instanceof Error) || !('type' in err) || !('status' in err) || !('expose' in err)) return undefined;
  const { type, status, expose } = err;
  if (typeof type !== 'string' || typeof status !== 'number' || expose !== true) return undefined;
  if (!/^(entity|charset|encoding)\./.test(type)) return undefined;
  return new BusinessError(status, BODY_ERROR_MESSAGES[type] ?? 'invalid request body');
}

// Last middleware in the chain: anything passed to next(err) gets the same envelope as handler errors.
export function errorMiddleware(log: ErrorLog): express.ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    if (res.headersSent) {
      log.error({ err: describeError(err), ...errorContext(req, res) }, 'error after response was sent');
      if (!res.writableEnded) res.end();
      return;
    }
    const failure = respondWithError(fromBodyParserError(err) ?? err, req, res, log);
    if (failure) {
      log.error({ err: failure.message, ...errorContext(req, res) }, 'error response serialization failed');
      res.end();
    }
  };
}
