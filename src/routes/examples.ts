// Express provides routing for the example endpoints.
import express from 'express';
import { BusinessError, InfrastructureError } from '../errors/httpError';
import { handle } from '../http/handle';
import { writeJson } from '../http/writeJson';
import type { ErrorLog } from '../logger';

/**
 * Example endpoints, one per outcome the error layer distinguishes:
 *   GET /hello            success, the handler writes its own response
 *   GET /validationerror  business error, echoed to the client
 *   GET /dberror          infrastructure error, masked and logged
 *   GET /cacheerror       infrastructure error, masked and logged
 */
export function createExamplesRouter(log: ErrorLog): express.Router {
  const router = express.Router();

  router.get(
    '/hello',
    handle((_req, res) => writeJson(res, 200, { message: 'Hello, World!' }), log)
  );

  router.get(
    '/validationerror',
    handle(
      () =>
        new BusinessError(422, {
          username: 'username is required',
          email: 'email is invalid',
        }),
      log
    )
  );

  router.get(
    '/dberror',
    handle(() => new InfrastructureError('Database', 'failed to connect to database'), log)
  );

  router.get(
    '/cacheerror',
    handle(() => new InfrastructureError('Cache', 'failed to connect to Redis'), log)
  );

  return router;
}
