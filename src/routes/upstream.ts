// Express provides routing for the upstream probe.
import express from 'express';
import { guardDependency } from '../errors/dependency';
import { InfrastructureError } from '../errors/httpError';
import { handle } from '../http/handle';
import { writeJson } from '../http/writeJson';
import type { ErrorLog } from '../logger';
import type { UpstreamClient } from '../upstream/upstreamClient';

const SERVICE_NAME = 'Upstream';

// GET /upstream/status reports the upstream service's health; any failure is a 503.
export function createUpstreamRouter(upstream: UpstreamClient | undefined, log: ErrorLog): express.Router {
  const router = express.Router();

  router.get(
    '/status',
    handle(async (_req, res) => {
      const client = upstream;
      if (!client) return new InfrastructureError(SERVICE_NAME, 'UPSTREAM_BASE_URL is not configured');
      const health = await guardDependency(SERVICE_NAME, () => client.ping());
      return writeJson(res, 200, { upstream: health });
    }, log)
  );

  return router;
}
