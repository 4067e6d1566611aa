import type { ZodError } from 'zod';
import { BusinessError } from './httpError';

// Turns a zod failure into a 422 whose payload maps each field to its first message.
export function fromZodError(error: ZodError): BusinessError {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : '_';
    if (!(key in fields)) fields[key] = issue.message;
  }
  return new BusinessError(422, fields);
}
