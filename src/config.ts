// Zod provides runtime validation for environment variables.
import { z } from 'zod';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4009),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  UPSTREAM_BASE_URL: z.string().url().optional(),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
});

// Inferred type keeps TS in sync with the runtime schema.
export type Env = z.infer<typeof EnvSchema>;

// Validates an environment map; throws a ZodError naming the bad variables.
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return EnvSchema.parse(source);
}

// Parse process.env once and export a typed, validated config object.
export const env: Env = parseEnv(process.env);
