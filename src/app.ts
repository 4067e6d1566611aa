// Express provides the HTTP server and routing.
import express from 'express';
// Helmet adds secure HTTP headers.
import helmet from 'helmet';
// Morgan logs HTTP requests in a standard format.
import morgan from 'morgan';

import { BusinessError } from './errors/httpError';
import { errorMiddleware } from './http/errorMiddleware';
import { handle } from './http/handle';
import { requestId } from './http/requestContext';
import { writeJson } from './http/writeJson';
import type { AppLogger } from './logger';
import { createExamplesRouter } from './routes/examples';
import { createUpstreamRouter } from './routes/upstream';
import { createUsersRouter } from './routes/users';
import { InMemoryUserRepository } from './storage/userRepository';
import type { UserRepository } from './storage/userRepository';
import type { UpstreamClient } from './upstream/upstreamClient';

export interface AppDeps {
  logger: AppLogger;
  users?: UserRepository;
  upstream?: UpstreamClient;
}

// Builds the Express app without listening, so tests can drive it in process.
export function createApp(deps: AppDeps): express.Express {
  const { logger } = deps;
  const app = express();

  app.disable('x-powered-by');
  // Helmet sets security-related headers for the HTTP API.
  app.use(helmet());
  app.use(requestId);
  // Morgan access lines go through the app logger instead of stdout.
  app.use(morgan('combined', { stream: { write: (line: string) => logger.info(line.trimEnd()) } }));
  // JSON body parser for incoming requests.
  app.use(express.json({ limit: '1mb' }));

  // Basic health check for the process.
  app.get('/health', handle((_req, res) => writeJson(res, 200, { ok: true }), logger));

  app.use(createExamplesRouter(logger));
  app.use('/users', createUsersRouter(deps.users ?? new InMemoryUserRepository(), logger));
  app.use('/upstream', createUpstreamRouter(deps.upstream, logger));

  app.use(handle(() => new BusinessError(404, 'not found'), logger));
  app.use(errorMiddleware(logger));

  return app;
}
