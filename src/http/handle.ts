import express from 'express';
import { describeError } from '../errors/httpError';
import { respondWithError } from '../errors/respond';
import type { ErrorLog } from '../logger';
import { errorContext } from './requestContext';

// A handler either writes its response and returns nothing, or returns (or throws) an error.
export type HandlerResult = Error | void;
export type ApiHandler = (req: express.Request, res: express.Response) => HandlerResult | Promise<HandlerResult>;

/**
 * Adapts a fallible handler to Express' `RequestHandler`.
 *
 * Whatever the handler returns or throws goes to `respondWithError` once. A
 * handler must not fail after it has started writing: Express cannot send a
 * second status line, so such errors are only logged and the response closed.
 */
export function handle(handler: ApiHandler, log: ErrorLog): express.RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .then(
        (result) => {
          if (result instanceof Error) fail(result, req, res, log);
        },
        (thrown: unknown) => fail(thrown, req, res, log)
      )
      .catch(next);
  };
}

function fail(error: unknown, req: express.Request, res: express.Response, log: ErrorLog): void {
  if (res.headersSent) {
    log.error({ err: describeError(error), ...errorContext(req, res) }, 'handler failed after response was sent');
    if (!res.writableEnded) res.end();
    return;
  }
  const failure = respondWithError(error, req, res, log);
  if (failure) {
    log.error({ err: failure.message, ...errorContext(req, res) }, 'error response serialization failed');
    res.end();
  }
}
