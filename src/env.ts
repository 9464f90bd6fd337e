import { z } from 'zod';
import { GrimnirClient } from './core/client.js';
import type { GrimnirClientOptions } from './core/types.js';
import { ConfigError } from './error/configError.js';
import { validator } from './utils/validator.js';
import { type SafeWrapAsync, safeWrap } from './utils/wrap.js';

/** Empty variables count as unset. */
const optionalString = z.preprocess((value) => (value === '' ? undefined : value), z.string().optional());

export const envSchema = z.object({
  GRIMNIR_URL: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.string().url().default('http://localhost:8080'),
  ),
  GRIMNIR_API_KEY: optionalString,
  GRIMNIR_EMAIL: optionalString,
  GRIMNIR_PASSWORD: optionalString,
  GRIMNIR_TIMEOUT_MS: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.coerce.number().int().positive().optional(),
  ),
});

/** Environment variables read by {@link createClientFromEnv}. */
export type GrimnirEnv = z.infer<typeof envSchema>;

/**
 * Builds a client from `GRIMNIR_*` environment variables:
 *
 * - `GRIMNIR_URL`, defaults to `http://localhost:8080`
 * - `GRIMNIR_API_KEY`, or `GRIMNIR_EMAIL` with `GRIMNIR_PASSWORD` to log in
 * - `GRIMNIR_TIMEOUT_MS`
 *
 * With email and password the client comes back logged in; a failed login
 * disposes it and returns the login error.
 *
 * @example
 * const [err, client] = await createClientFromEnv();
 */
export async function createClientFromEnv(
  env: Record<string, string | undefined> = process.env,
  overrides: Pick<GrimnirClientOptions, 'dispatcher'> = {},
): SafeWrapAsync<Error, GrimnirClient> {
  const [errEnv, vars] = await validator(env, envSchema, 'environment');
  if (errEnv) {
    return [new ConfigError('error reading client configuration from environment', { cause: errEnv }), null];
  }

  const { GRIMNIR_URL, GRIMNIR_API_KEY, GRIMNIR_EMAIL, GRIMNIR_PASSWORD, GRIMNIR_TIMEOUT_MS } = vars;
  if (GRIMNIR_API_KEY && GRIMNIR_EMAIL) {
    return [new ConfigError('error reading client configuration, GRIMNIR_API_KEY and GRIMNIR_EMAIL are mutually exclusive'), null];
  }

  if (GRIMNIR_EMAIL && !GRIMNIR_PASSWORD) {
    return [new ConfigError('error reading client configuration, GRIMNIR_EMAIL is set without GRIMNIR_PASSWORD'), null];
  }

  const [errClient, client] = safeWrap(
    () =>
      new GrimnirClient({
        baseUrl: GRIMNIR_URL,
        apiKey: GRIMNIR_API_KEY,
        timeout: GRIMNIR_TIMEOUT_MS,
        dispatcher: overrides.dispatcher,
      }),
  );
  if (errClient) {
    return [errClient, null];
  }

  if (GRIMNIR_EMAIL && GRIMNIR_PASSWORD) {
    const [errLogin] = await client.login(GRIMNIR_EMAIL, GRIMNIR_PASSWORD);
    if (errLogin) {
      client.dispose();
      return [errLogin, null];
    }
  }

  return [null, client];
}
