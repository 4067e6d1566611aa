// Pino writes structured JSON log lines to stdout.
import pino from 'pino';
import type { Logger } from 'pino';
import { env } from './config';

// The one capability the error responder needs from a log sink.
export interface ErrorLog {
  error(fields: Record<string, unknown>, message: string): void;
}

// What the app wiring needs: access lines at info, failures at error.
export interface AppLogger extends ErrorLog {
  info(message: string): void;
}

// Process-wide logger; components receive it (or a stand-in) as a parameter.
export function createLogger(): Logger {
  return pino({
    level: env.LOG_LEVEL,
    base: { service: 'error-envelope' },
  });
}
