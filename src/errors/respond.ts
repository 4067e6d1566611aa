import express from 'express';
import { classify } from './classify';
import { mapError } from './mapError';
import { errorContext } from '../http/requestContext';
import { writeJson } from '../http/writeJson';
import type { ErrorLog } from '../logger';

/**
 * Sends the response for an error a handler produced and logs it when its kind
 * calls for it. Writes once and logs at most once.
 *
 * Returns the serialization error if the body could not be written; logging
 * that is up to the caller.
 */
export function respondWithError(
  value: unknown,
  req: express.Request,
  res: express.Response,
  log: ErrorLog
): Error | undefined {
  const mapped = mapError(classify(value), errorContext(req, res));
  const failure = writeJson(res, mapped.status, mapped.body);
  if (mapped.log) {
    log.error(mapped.log.fields, mapped.log.message);
  }
  return failure;
}
