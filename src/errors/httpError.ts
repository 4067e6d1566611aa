// Any value JSON can carry; business payloads are fixed to this shape when constructed.
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Error the caller caused or can act on. Its status and payload are sent to the
 * client as they are, so only put in `payload` what the caller may see.
 */
export class BusinessError extends Error {
  readonly kind = 'business' as const;
  readonly statusCode: number;
  readonly payload: JsonValue;

  constructor(statusCode: number, payload: JsonValue) {
    super(`${statusCode}: ${summarize(payload)}`);
    this.name = 'BusinessError';
    this.statusCode = statusCode;
    this.payload = payload;
  }

  // Exposes another error's message as the payload.
  static fromError(statusCode: number, err: Error): BusinessError {
    return new BusinessError(statusCode, err.message);
  }
}

function summarize(payload: JsonValue): string {
  if (typeof payload === 'string') return payload;
  try {
    return JSON.stringify(payload);
  } catch {
    return '[unserializable payload]';
  }
}

/**
 * Failure of a dependency the caller cannot see (database, cache, remote API).
 * `detail` is for the logs only and is never serialized to the client.
 */
export class InfrastructureError extends Error {
  readonly kind = 'infrastructure' as const;
  readonly serviceName: string;
  readonly detail: string;

  constructor(serviceName: string, detail: string) {
    super(`infrastructure error with service ${serviceName}: ${detail}`);
    this.name = 'InfrastructureError';
    this.serviceName = serviceName;
    this.detail = detail;
  }
}

// Text used when logging a value that is not one of the classes above.
export function describeError(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}
