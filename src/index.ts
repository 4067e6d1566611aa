// dotenv loads .env values into process.env for local development.
import 'dotenv/config';

import { createApp } from './app';
import { env } from './config';
import { createLogger } from './logger';
import { UpstreamClient } from './upstream/upstreamClient';

const logger = createLogger();

const upstream = env.UPSTREAM_BASE_URL
  ? UpstreamClient.create(env.UPSTREAM_BASE_URL, env.UPSTREAM_TIMEOUT_MS)
  : undefined;

const app = createApp({ logger, upstream });

const server = app.listen(env.PORT, env.HOST, () => {
  logger.info({ host: env.HOST, port: env.PORT }, 'server listening');
});

// A listener that cannot bind leaves nothing to serve.
server.on('error', (err) => {
  logger.fatal({ err }, 'failed to start server');
  process.exit(1);
});
