import { afterAll, assert, beforeAll, beforeEach, describe, expect, test } from 'vitest';
import {
  ApiError,
  AuthError,
  ConnectionError,
  GrimnirClient,
  getApiError,
  TimeoutError,
  withClient,
} from '../src/index.js';
import { E2E_API_KEY, E2E_PASSWORD, type E2EServer, ICAL_BODY, startE2EServer } from './server.js';

let server: E2EServer;

beforeAll(async () => {
  const [err, srv] = await startE2EServer();
  assert(err === null, 'error is not null on server-start, cannot continue');

  server = srv;
});

beforeEach(() => {
  server.reset();
});

afterAll(async () => {
  const err = await server.close();
  expect(err).toBeNull();
});

function apiKeyClient(timeout?: number) {
  return new GrimnirClient({ baseUrl: server.url, apiKey: E2E_API_KEY, timeout });
}

describe('station client e2e', () => {
  test('api key client lists stations with the key header', async () => {
    const client = apiKeyClient();

    const [err, stations] = await client.stations.list();

    expect(err).toBeNull();
    expect(stations?.map(({ id }) => id)).toStrictEqual(['s1', 's2']);

    const [request] = server.requests();
    expect(request?.path).toBe('/api/v1/stations');
    expect(request?.headers['x-api-key']).toBe(E2E_API_KEY);
    expect(request?.headers.authorization).toBeUndefined();
    expect(request?.headers['content-type']).toBe('application/json');
    client.dispose();
  });

  test('anonymous client reads public stations and is refused private ones', async () => {
    const client = new GrimnirClient({ baseUrl: server.url });

    const [errPublic, stations] = await client.stations.listPublic();
    const [errPrivate] = await client.stations.list();

    expect(errPublic).toBeNull();
    expect(stations).toHaveLength(2);
    assert(errPrivate instanceof ApiError);
    expect(errPrivate.statusCode).toBe(401);
    expect(errPrivate.rawBody).toBe('unauthorized');
    client.dispose();
  });

  test('login switches to a bearer token and refresh replaces it', async () => {
    const client = new GrimnirClient({ baseUrl: server.url });

    const [errLogin, session] = await client.login('dj@example.com', E2E_PASSWORD);
    expect(errLogin).toBeNull();
    expect(session?.token).toBe('e2e-token-1');
    expect(session?.expiresAt).toStrictEqual(new Date('2030-01-01T00:00:00+00:00'));

    const [errStations] = await client.stations.list();
    expect(errStations).toBeNull();

    const [errRefresh, refreshed] = await client.refresh();
    expect(errRefresh).toBeNull();
    expect(refreshed?.token).toBe('e2e-token-2');

    const [errAfter] = await client.stations.list();
    expect(errAfter).toBeNull();

    const authHeaders = server.requests().map(({ headers }) => headers.authorization);
    expect(authHeaders).toStrictEqual([undefined, 'Bearer e2e-token-1', 'Bearer e2e-token-1', 'Bearer e2e-token-2']);
    client.dispose();
  });

  test('a rejected login is an AuthError around the ApiError', async () => {
    const client = new GrimnirClient({ baseUrl: server.url });

    const [err] = await client.login('dj@example.com', 'wrong-password');

    expect(err).toBeInstanceOf(AuthError);
    expect(getApiError(err)?.rawBody).toBe('{"error":"invalid credentials"}');
    expect(client.isAuthenticated).toBe(false);
    client.dispose();
  });

  test('uploads a file as multipart form data', async () => {
    const client = apiKeyClient();
    const file = { filename: 'jingle.mp3', content: new Uint8Array([1, 2, 3, 4]), mimeType: 'audio/mpeg' };

    const [err, item] = await client.media.upload('s1', file);

    expect(err).toBeNull();
    expect(item).toStrictEqual({
      id: 'md1',
      station_id: 's1',
      title: 'jingle.mp3',
      mime_type: 'audio/mpeg',
      size: 4,
      fields: ['file'],
    });

    const [request] = server.requests();
    expect(request?.search).toBe('?station_id=s1');
    expect(request?.headers['content-type']?.startsWith('multipart/form-data; boundary=')).toBe(true);
    client.dispose();
  });

  test('exports iCal as text', async () => {
    const client = apiKeyClient();

    const [err, calendar] = await client.schedule.exportICal('s1');

    expect(err).toBeNull();
    expect(calendar).toBe(ICAL_BODY);
    const [request] = server.requests();
    expect(request?.search).toBe('?station_id=s1&format=ical');
    expect(request?.headers.accept).not.toBe('application/json');
    client.dispose();
  });

  test('sends since exactly once as ISO-8601', async () => {
    const client = apiKeyClient();

    const [err, spins] = await client.analytics.spins('s1', { since: new Date('2030-01-01T08:00:00Z') });

    expect(err).toBeNull();
    expect(spins).toStrictEqual([{ id: 'sp1', station_id: 's1', title: 'So What' }]);
    expect(server.requests()[0]?.search).toBe('?station_id=s1&limit=100&since=2030-01-01T08%3A00%3A00.000Z');
    client.dispose();
  });

  test('reads an empty success body as an empty object', async () => {
    const client = apiKeyClient();

    const [err, result] = await client.playout.skip('s1');

    expect(err).toBeNull();
    expect(result).toStrictEqual({});
    client.dispose();
  });

  test('reads a null envelope as an empty list', async () => {
    const client = apiKeyClient();

    const [err, mounts] = await client.stations.mounts('s1');

    expect(err).toBeNull();
    expect(mounts).toStrictEqual([]);
    client.dispose();
  });

  test('keeps an html error page verbatim', async () => {
    const client = apiKeyClient();

    const [err] = await client.stations.get('missing');

    assert(err instanceof ApiError);
    expect(err.statusCode).toBe(404);
    expect(err.rawBody).toBe('<html><body><h1>404 Not Found</h1></body></html>');
    expect(err.endpointPath).toBe('/stations/missing');
    client.dispose();
  });

  test('times out a slow response', async () => {
    server.setStatusDelay(500);
    const client = apiKeyClient(50);

    const [err] = await client.system.status();

    assert(err instanceof TimeoutError);
    expect(err.timeout).toBe(50);
    client.dispose();
  });

  test('reports a refused connection as a ConnectionError', async () => {
    const client = new GrimnirClient({ baseUrl: 'http://127.0.0.1:1', apiKey: E2E_API_KEY });

    const [err] = await client.stations.list();

    expect(err).toBeInstanceOf(ConnectionError);
    expect(err?.cause).toBeInstanceOf(Error);
    client.dispose();
  });

  test('withClient refuses calls once disposed', async () => {
    const kept: GrimnirClient[] = [];
    const [err] = await withClient({ baseUrl: server.url, apiKey: E2E_API_KEY }, (client) => {
      kept.push(client);
      return client.system.health();
    });

    // `/health` is not served by the fake backend.
    assert(err instanceof ApiError);
    expect(err.statusCode).toBe(404);

    const [client] = kept;
    assert(client);
    const [errDisposed] = await client.stations.list();
    expect(errDisposed).toBeInstanceOf(ConnectionError);
  });
});
