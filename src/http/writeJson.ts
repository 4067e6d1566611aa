import express from 'express';
import type { JsonValue } from '../errors/httpError';

/**
 * Writes `value` as the JSON response body with the given status.
 *
 * The status goes first, then the content type, then the body. A value that
 * cannot be serialized (a cycle, for instance) sends nothing and the error is
 * returned to the caller as is.
 */
export function writeJson(res: express.Response, status: number, value: JsonValue): Error | undefined {
  res.status(status);
  res.setHeader('Content-Type', 'application/json; charset=utf-8');
  let body: string;
  try {
    body = JSON.stringify(value);
  } catch (err) {
    return err instanceof Error ? err : new Error(String(err));
  }
  res.send(body);
  return undefined;
}
