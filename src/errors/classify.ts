import { BusinessError, InfrastructureError } from './httpError';

// Closed set of error kinds the responder knows how to translate.
export type ClassifiedError =
  | { kind: 'business'; error: BusinessError }
  | { kind: 'infrastructure'; error: InfrastructureError }
  | { kind: 'unclassified'; error: unknown };

/**
 * Only instances of the two error classes are known kinds; their `kind` tag,
 * fixed by the constructor, picks the branch. A plain object shaped like a
 * BusinessError stays unclassified.
 */
export function classify(value: unknown): ClassifiedError {
  if (!(value instanceof BusinessError) && !(value instanceof InfrastructureError)) {
    return { kind: 'unclassified', error: value };
  }
  switch (value.kind) {
    case 'business':
      return { kind: 'business', error: value };
    case 'infrastructure':
      return { kind: 'infrastructure', error: value };
  }
}
