import { assert, describe, expect, it } from 'vitest';
import { ApiError } from '../error/apiError.js';
import { AuthError, getAuthError } from '../error/authError.js';
import { ConfigError } from '../error/configError.js';
import { ConnectionError } from '../error/connectionError.js';
import { DecodeError } from '../error/decodeError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { ValidationError } from '../error/validationError.js';
import { createRecordingDispatcher } from '../testing/recordingDispatcher.js';
import { DEFAULT_TIMEOUT, GrimnirClient, withClient } from './client.js';

const BASE_URL = 'https://radio.example.com';

function setup(options: { apiKey?: string; token?: string; expiresAt?: string } = {}) {
  const dispatcher = createRecordingDispatcher();
  const client = new GrimnirClient({ baseUrl: BASE_URL, dispatcher: dispatcher.provider, ...options });
  return { client, dispatcher };
}

describe('GrimnirClient', () => {
  describe('construction', () => {
    it('rejects an api key combined with a token', () => {
      expect(() => new GrimnirClient({ baseUrl: BASE_URL, apiKey: 'test-key', token: 'test-token' })).toThrow(
        ConfigError,
      );
    });

    it('rejects a base URL that does not parse', () => {
      expect(() => new GrimnirClient({ baseUrl: 'not a url' })).toThrow(ConfigError);
    });

    it('rejects a non-positive timeout', () => {
      expect(() => new GrimnirClient({ baseUrl: BASE_URL, timeout: 0 })).toThrow(
        'error configuring client, timeout must be a positive number of milliseconds, got 0',
      );
    });

    it('strips trailing slashes and hands a frozen config to the dispatcher', () => {
      const dispatcher = createRecordingDispatcher();
      const client = new GrimnirClient({ baseUrl: `${BASE_URL}//`, dispatcher: dispatcher.provider });

      expect(client.config).toStrictEqual({ baseUrl: BASE_URL, apiPathPrefix: '/api/v1', timeout: DEFAULT_TIMEOUT });
      expect(Object.isFrozen(client.config)).toBe(true);
      expect(dispatcher.configs).toEqual([client.config]);
    });

    it('uses the configured timeout', () => {
      const dispatcher = createRecordingDispatcher();
      new GrimnirClient({ baseUrl: BASE_URL, timeout: 5_000, dispatcher: dispatcher.provider });

      expect(dispatcher.configs[0]?.timeout).toBe(5_000);
    });

    it('starts anonymous without credentials', () => {
      const { client } = setup();

      expect(client.credential).toBeNull();
      expect(client.isAuthenticated).toBe(false);
    });

    it('holds a frozen api key credential', () => {
      const { client } = setup({ apiKey: 'test-key' });

      expect(client.credential).toStrictEqual({ type: 'apiKey', key: 'test-key' });
      expect(Object.isFrozen(client.credential)).toBe(true);
      expect(client.isAuthenticated).toBe(true);
    });

    it('parses the expiry of a pre-issued token', () => {
      const { client } = setup({ token: 'test-token', expiresAt: '2030-01-01T00:00:00Z' });

      expect(client.credential).toStrictEqual({
        type: 'bearer',
        token: 'test-token',
        expiresAt: new Date('2030-01-01T00:00:00+00:00'),
      });
    });
  });

  describe('login', () => {
    it('posts credentials without auth and switches to the bearer token', async () => {
      const { client, dispatcher } = setup();
      dispatcher.reply({ token: 'test-token', expires_at: '2030-01-01T12:00:00Z', user: { id: 'u1', email: 'dj@example.com' } });

      const [err, result] = await client.login('dj@example.com', 'test-password');

      expect(err).toBeNull();
      expect(result).toStrictEqual({
        token: 'test-token',
        expiresAt: new Date('2030-01-01T12:00:00+00:00'),
        user: { id: 'u1', email: 'dj@example.com' },
      });
      expect(dispatcher.calls[0]).toStrictEqual({
        request: {
          method: 'POST',
          path: '/auth/login',
          json: { email: 'dj@example.com', password: 'test-password' },
        },
        credential: null,
      });
      expect(client.credential).toStrictEqual({
        type: 'bearer',
        token: 'test-token',
        expiresAt: new Date('2030-01-01T12:00:00+00:00'),
      });
    });

    it('sends the bearer token on later calls', async () => {
      const { client, dispatcher } = setup();
      dispatcher.reply({ token: 'test-token' });
      dispatcher.reply({ stations: [] });

      await client.login('dj@example.com', 'test-password');
      await client.stations.list();

      expect(dispatcher.calls[1]?.credential).toStrictEqual({ type: 'bearer', token: 'test-token', expiresAt: null });
    });

    it('replaces an earlier session wholesale', async () => {
      const { client, dispatcher } = setup({ token: 'old-token', expiresAt: '2030-01-01T00:00:00Z' });
      dispatcher.reply({ token: 'new-token' });

      const [err, result] = await client.login('dj@example.com', 'test-password');

      expect(err).toBeNull();
      expect(result?.user).toBeNull();
      expect(client.credential).toStrictEqual({ type: 'bearer', token: 'new-token', expiresAt: null });
    });

    it('wraps a rejection in an AuthError with the ApiError as cause', async () => {
      const { client, dispatcher } = setup();
      dispatcher.reply('{"error":"invalid_credentials"}', 401);

      const [err, result] = await client.login('dj@example.com', 'wrong-password');

      expect(result).toBeNull();
      expect(err).toBeInstanceOf(AuthError);
      expect(err?.message).toBe('error login rejected with status 401');
      expect(getAuthError(err)?.statusCode).toBe(401);

      const cause = err?.cause;
      expect(cause).toBeInstanceOf(ApiError);
      expect(cause instanceof ApiError && cause.rawBody).toBe('{"error":"invalid_credentials"}');
      expect(client.credential).toBeNull();
    });

    it('refuses to log in on an api key client', async () => {
      const { client, dispatcher } = setup({ apiKey: 'test-key' });

      const [err] = await client.login('dj@example.com', 'test-password');

      expect(err).toBeInstanceOf(ConfigError);
      expect(dispatcher.calls).toHaveLength(0);
      expect(client.credential).toStrictEqual({ type: 'apiKey', key: 'test-key' });
    });

    it('returns a ValidationError when the token is missing', async () => {
      const { client, dispatcher } = setup();
      dispatcher.reply({ expires_at: '2030-01-01T00:00:00Z' });

      const [err] = await client.login('dj@example.com', 'test-password');

      expect(err).toBeInstanceOf(ValidationError);
      expect(client.credential).toBeNull();
    });

    it('returns a ValidationError for an unparsable expiry', async () => {
      const { client, dispatcher } = setup();
      dispatcher.reply({ token: 'test-token', expires_at: 'next tuesday' });

      const [err, result] = await client.login('dj@example.com', 'test-password');

      expect(result).toBeNull();
      expect(err).toBeInstanceOf(ValidationError);
      expect(err?.message).toBe('error validating login response (expires_at: Invalid ISO-8601 timestamp)');
      expect(client.credential).toBeNull();
    });

    it('passes a DecodeError through unchanged', async () => {
      const { client, dispatcher } = setup();
      dispatcher.reply('<html>maintenance</html>');

      const [err] = await client.login('dj@example.com', 'test-password');

      expect(err).toBeInstanceOf(DecodeError);
    });
  });

  describe('refresh', () => {
    it('returns a ConfigError without a bearer token and sends nothing', async () => {
      const { client, dispatcher } = setup({ apiKey: 'test-key' });

      const [err, result] = await client.refresh();

      expect(result).toBeNull();
      expect(err).toBeInstanceOf(ConfigError);
      expect(dispatcher.calls).toHaveLength(0);
    });

    it('sends the current token and swaps in the new one', async () => {
      const { client, dispatcher } = setup({ token: 'old-token', expiresAt: '2030-01-01T00:00:00Z' });
      dispatcher.reply({ token: 'new-token' });

      const [err, result] = await client.refresh();

      expect(err).toBeNull();
      expect(result).toStrictEqual({ token: 'new-token', expiresAt: null, user: null });
      expect(dispatcher.calls[0]).toStrictEqual({
        request: { method: 'POST', path: '/auth/refresh' },
        credential: { type: 'bearer', token: 'old-token', expiresAt: new Date('2030-01-01T00:00:00+00:00') },
      });
      expect(client.credential).toStrictEqual({ type: 'bearer', token: 'new-token', expiresAt: null });
    });

    it('keeps the old token when the new expiry does not parse', async () => {
      const { client, dispatcher } = setup({ token: 'old-token' });
      dispatcher.reply({ token: 'new-token', expires_at: 'soon' });

      const [err] = await client.refresh();

      expect(err).toBeInstanceOf(ValidationError);
      expect(client.credential).toStrictEqual({ type: 'bearer', token: 'old-token', expiresAt: null });
    });

    it('keeps the old token when the refresh is rejected', async () => {
      const { client, dispatcher } = setup({ token: 'old-token' });
      dispatcher.reply('token expired', 401);

      const [err] = await client.refresh();

      expect(err).toBeInstanceOf(AuthError);
      expect(err?.message).toBe('error refresh rejected with status 401');
      expect(client.credential).toStrictEqual({ type: 'bearer', token: 'old-token', expiresAt: null });
    });
  });

  describe('logout', () => {
    it('drops the bearer token', () => {
      const { client } = setup({ token: 'test-token' });

      client.logout();

      expect(client.credential).toBeNull();
      expect(client.isAuthenticated).toBe(false);
    });

    it('keeps an api key', () => {
      const { client } = setup({ apiKey: 'test-key' });

      client.logout();

      expect(client.credential).toStrictEqual({ type: 'apiKey', key: 'test-key' });
    });
  });

  describe('response handling', () => {
    it('returns the dispatcher error object unchanged', async () => {
      const { client, dispatcher } = setup({ apiKey: 'test-key' });
      const timeout = new TimeoutError('error request timed out after 30000ms', 30_000);
      dispatcher.fail(timeout);

      const [err] = await client.stations.list();

      expect(err).toBe(timeout);
    });

    it('returns an ApiError with the body verbatim on failure statuses', async () => {
      const { client, dispatcher } = setup({ apiKey: 'test-key' });
      dispatcher.reply('<html><body>Not Found</body></html>', 404);

      const [err] = await client.stations.get('s1');

      assert(err instanceof ApiError);
      expect(err.statusCode).toBe(404);
      expect(err.rawBody).toBe('<html><body>Not Found</body></html>');
      expect(err.endpointPath).toBe('/stations/s1');
    });

    it('reads an empty json body as an empty object', async () => {
      const { client, dispatcher } = setup({ apiKey: 'test-key' });
      dispatcher.reply('');

      const [err, result] = await client.playout.skip('s1');

      expect(err).toBeNull();
      expect(result).toStrictEqual({});
    });

    it('reads a missing or null envelope key as an empty list', async () => {
      const { client, dispatcher } = setup({ apiKey: 'test-key' });
      dispatcher.reply({});
      dispatcher.reply({ stations: null });

      expect(await client.stations.list()).toStrictEqual([null, []]);
      expect(await client.stations.list()).toStrictEqual([null, []]);
    });

    it('keeps fields the schema does not list', async () => {
      const { client, dispatcher } = setup({ apiKey: 'test-key' });
      dispatcher.reply({ stations: [{ id: 's1', name: 'Radio One', listeners_peak: 12 }] });

      const [err, stations] = await client.stations.list();

      expect(err).toBeNull();
      expect(stations).toStrictEqual([{ id: 's1', name: 'Radio One', listeners_peak: 12 }]);
    });

    it('returns a ValidationError when an envelope holds no list', async () => {
      const { client, dispatcher } = setup({ apiKey: 'test-key' });
      dispatcher.reply({ stations: 'none' });

      const [err] = await client.stations.list();

      expect(err).toBeInstanceOf(ValidationError);
      expect(err?.message).toBe('error validating stations from /stations (Expected array, received string)');
    });

    it('returns a ValidationError when a list body is not an object', async () => {
      const { client, dispatcher } = setup({ apiKey: 'test-key' });
      dispatcher.reply([{ id: 's1', name: 'Test FM' }]);

      const [err, stations] = await client.stations.list();

      expect(stations).toBeNull();
      expect(err).toBeInstanceOf(ValidationError);
      expect(err?.message).toBe('error validating stations from /stations (Expected object, received array)');
    });
  });

  describe('dispose', () => {
    it('releases the dispatcher', () => {
      const { client, dispatcher } = setup();

      client.dispose();

      expect(dispatcher.disposeCount).toBe(1);
    });

    it('withClient disposes after the callback resolves', async () => {
      const dispatcher = createRecordingDispatcher();
      dispatcher.reply({ status: 'ok' });

      const [err, health] = await withClient({ baseUrl: BASE_URL, dispatcher: dispatcher.provider }, (client) =>
        client.system.health(),
      );

      expect(err).toBeNull();
      expect(health).toStrictEqual({ status: 'ok' });
      expect(dispatcher.disposeCount).toBe(1);
    });

    it('withClient disposes when the callback throws', async () => {
      const dispatcher = createRecordingDispatcher();
      const failure = new ConnectionError('error boom');

      await expect(
        withClient({ baseUrl: BASE_URL, dispatcher: dispatcher.provider }, async () => {
          throw failure;
        }),
      ).rejects.toBe(failure);
      expect(dispatcher.disposeCount).toBe(1);
    });
  });
});
