import { z } from 'zod';
import { parseExpiresAt } from '../auth/credential.js';
import { nullableString, resource } from './common.js';

/** `expires_at` may be left out, but a value that is sent must parse. */
const expiresAtSchema = z
  .string()
  .refine((value) => parseExpiresAt(value) !== null, 'Invalid ISO-8601 timestamp')
  .nullish();

export const userSchema = resource({
  id: z.string(),
  email: z.string(),
  platform_role: nullableString,
  theme: nullableString,
});
export type User = z.infer<typeof userSchema>;

export const loginResponseSchema = z
  .object({
    token: z.string().min(1),
    expires_at: expiresAtSchema,
    user: userSchema.nullish(),
  })
  .passthrough();

export const refreshResponseSchema = z
  .object({
    token: z.string().min(1),
    expires_at: expiresAtSchema,
  })
  .passthrough();

/** Outcome of a successful `login` or `refresh`. */
export interface AuthResult {
  /** Bearer token now used by the client. */
  token: string;
  /** Expiry reported by the backend; `null` when the response has none. */
  expiresAt: Date | null;
  /** Account the token belongs to; only `login` reports it. */
  user: User | null;
}
