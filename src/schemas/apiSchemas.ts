// Zod provides runtime validation for request payloads.
import { z } from 'zod';

// Sign-up payload; messages are what the client sees in the 422 envelope.
export const CreateUserSchema = z.object({
  username: z.string({ required_error: 'username is required' }).trim().min(1, 'username is required'),
  email: z.string({ required_error: 'email is required' }).trim().email('email is invalid'),
});

export type CreateUserInput = z.infer<typeof CreateUserSchema>;

// Body the upstream service's health endpoint must return.
export const UpstreamHealthSchema = z.object({
  ok: z.boolean(),
});

export type UpstreamHealth = z.infer<typeof UpstreamHealthSchema>;
