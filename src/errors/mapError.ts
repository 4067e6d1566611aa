import type { ClassifiedError } from './classify';
import { describeError } from './httpError';
import type { JsonValue } from './httpError';

// Wire shape of every error response.
export type ErrorEnvelope = { statusCode: number; msg: JsonValue };

// What the responder should log for an error; absent for errors the caller caused.
export type ErrorLogRecord = { message: string; fields: Record<string, unknown> };

export type MappedError = {
  status: number;
  body: ErrorEnvelope;
  log?: ErrorLogRecord;
};

// Request details copied into log records.
export type ErrorContext = { path: string; requestId?: string };

export const SERVICE_UNAVAILABLE_MSG = 'service temporarily unavailable';
export const INTERNAL_ERROR_MSG = 'internal server error';

/**
 * Translates a classified error into the response and log record to emit.
 *
 * Business errors are echoed to the client and not logged. The other two kinds
 * get a fixed message on the wire; their detail only goes to the log record.
 */
export function mapError(classified: ClassifiedError, ctx: ErrorContext): MappedError {
  switch (classified.kind) {
    case 'business': {
      const { statusCode, payload } = classified.error;
      return { status: statusCode, body: { statusCode, msg: payload } };
    }
    case 'infrastructure': {
      const { serviceName, detail } = classified.error;
      return {
        status: 503,
        body: { statusCode: 503, msg: SERVICE_UNAVAILABLE_MSG },
        log: {
          message: 'infrastructure error',
          fields: { service: serviceName, detail, path: ctx.path, requestId: ctx.requestId },
        },
      };
    }
    case 'unclassified':
      return {
        status: 500,
        body: { statusCode: 500, msg: INTERNAL_ERROR_MSG },
        log: {
          message: 'unclassified error',
          fields: { err: describeError(classified.error), path: ctx.path, requestId: ctx.requestId },
        },
      };
    default:
      return assertNever(classified);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled error kind: ${JSON.stringify(value)}`);
}
