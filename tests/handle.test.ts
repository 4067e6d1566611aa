// Adapter tests: a fallible handler behind Express, driven through supertest.
import express from 'express';
import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { BusinessError, InfrastructureError } from '../src/errors/httpError';
import type { JsonValue } from '../src/errors/httpError';
import { errorMiddleware } from '../src/http/errorMiddleware';
import { handle } from '../src/http/handle';
import type { ApiHandler } from '../src/http/handle';
import { requestId } from '../src/http/requestContext';
import { writeJson } from '../src/http/writeJson';
import { createCaptureLogger } from './helpers/captureLogger';

function appFor(handler: ApiHandler) {
  const logger = createCaptureLogger();
  const app = express();
  app.use(requestId);
  app.get('/target', handle(handler, logger));
  return { app, logger };
}

describe('handle', () => {
  it('leaves a successful response alone', async () => {
    const { app, logger } = appFor((_req, res) => writeJson(res, 200, { message: 'done' }));

    const res = await request(app).get('/target').expect(200);

    expect(res.body).toEqual({ message: 'done' });
    expect(logger.error).not.toHaveBeenCalled();
  });

  it.each<[number, JsonValue]>([
    [400, 'plain message'],
    [404, { id: 'no such record' }],
    [409, ['first', 'second']],
    [422, { fields: { name: ['too short', 'has digits'] }, retry: false, count: 2, note: null }],
  ])('sends business error %i with its payload as msg', async (status, payload) => {
    const { app, logger } = appFor(() => new BusinessError(status, payload));

    const res = await request(app).get('/target').expect(status);

    expect(res.body).toEqual({ statusCode: status, msg: payload });
    expect(logger.error).not.toHaveBeenCalled();
  });

  it.each([
    ['Database', 'failed to connect to database'],
    ['Cache', '","msg":"leaked"}\n<script>alert(1)</script>'],
    ['Search', '{"statusCode":200}'],
  ])('masks %s failures and logs the detail once', async (service, detail) => {
    const { app, logger } = appFor(() => new InfrastructureError(service, detail));

    const res = await request(app).get('/target').set('x-request-id', 'req-42').expect(503);

    expect(res.text).toBe('{"statusCode":503,"msg":"service temporarily unavailable"}');
    expect(res.headers['content-type']).toBe('application/json; charset=utf-8');
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      { service, detail, path: '/target', requestId: 'req-42' },
      'infrastructure error'
    );
  });

  it('masks a returned plain error as an internal error', async () => {
    const { app, logger } = appFor(() => new Error('secret connection string'));

    const res = await request(app).get('/target').expect(500);

    expect(res.text).toBe('{"statusCode":500,"msg":"internal server error"}');
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      { err: 'secret connection string', path: '/target', requestId: expect.any(String) },
      'unclassified error'
    );
  });

  it('treats a thrown error like a returned one', async () => {
    const { app, logger } = appFor(async () => {
      throw new InfrastructureError('Queue', 'broker unreachable');
    });

    const res = await request(app).get('/target').expect(503);

    expect(res.body).toEqual({ statusCode: 503, msg: 'service temporarily unavailable' });
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ service: 'Queue', detail: 'broker unreachable' }),
      'infrastructure error'
    );
  });

  it('masks thrown values that are not errors', async () => {
    const { app, logger } = appFor(() => {
      throw { kind: 'business', statusCode: 418, payload: 'teapot' };
    });

    const res = await request(app).get('/target').expect(500);

    expect(res.body).toEqual({ statusCode: 500, msg: 'internal server error' });
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ err: '[object Object]', path: '/target' }),
      'unclassified error'
    );
  });

  it('logs a payload that cannot be serialized and closes the response', async () => {
    const payload: { [key: string]: JsonValue } = { field: 'value' };
    payload.self = payload;
    const { app, logger } = appFor(() => new BusinessError(422, payload));

    const res = await request(app).get('/target');

    expect(res.status).toBe(422);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.stringContaining('circular'), path: '/target' }),
      'error response serialization failed'
    );
  });

  it('only logs when the handler fails after writing', async () => {
    const { app, logger } = appFor((_req, res) => {
      res.status(200).type('text/plain');
      res.write('partial');
      return new InfrastructureError('Database', 'lost connection mid-stream');
    });

    const res = await request(app).get('/target').expect(200);

    expect(res.text).toBe('partial');
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ err: 'infrastructure error with service Database: lost connection mid-stream' }),
      'handler failed after response was sent'
    );
  });

  it('logs the path the client requested for a router root', async () => {
    const logger = createCaptureLogger();
    const app = express();
    const router = express.Router();
    router.get('/', handle(() => new Error('listing failed'), logger));
    app.use('/items', router);

    await request(app).get('/items?page=2').expect(500);

    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ err: 'listing failed', path: '/items' }),
      'unclassified error'
    );
  });
});

describe('errorMiddleware', () => {
  it('gives errors from plain middleware the same envelope', async () => {
    const logger = createCaptureLogger();
    const app = express();
    app.use(requestId);
    app.use((_req, _res, next) => next(new InfrastructureError('Session store', 'timeout after 2s')));
    app.use(errorMiddleware(logger));

    const res = await request(app).get('/anything').set('x-request-id', 'mw-1').expect(503);

    expect(res.text).toBe('{"statusCode":503,"msg":"service temporarily unavailable"}');
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      { service: 'Session store', detail: 'timeout after 2s', path: '/anything', requestId: 'mw-1' },
      'infrastructure error'
    );
  });

  it('only logs an error that arrives after the response started', async () => {
    const logger = createCaptureLogger();
    const app = express();
    app.use((_req, res, next) => {
      res.status(200).type('text/plain');
      res.write('partial');
      next(new Error('stream broke'));
    });
    app.use(errorMiddleware(logger));

    const res = await request(app).get('/stream').expect(200);

    expect(res.text).toBe('partial');
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ err: 'stream broke', path: '/stream' }),
      'error after response was sent'
    );
  });
});
