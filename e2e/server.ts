import { type ServerType, serve } from '@hono/node-server';
import { type Context, Hono, type MiddlewareHandler } from 'hono';
import { type SafeWrapAsync, safeWrapAsync } from '../src/utils/wrap.js';

export const E2E_API_KEY = 'test-key';
export const E2E_PASSWORD = 'test-password';
export const ICAL_BODY = 'BEGIN:VCALENDAR\r\nVERSION:2.0\r\nPRODID:-//e2e//station//EN\r\nEND:VCALENDAR\r\n';

/** A request as the fake backend saw it. */
export interface SeenRequest {
  method: string;
  path: string;
  search: string;
  headers: Record<string, string>;
}

export type E2EServer = {
  url: string;
  close: () => Promise<Error | null>;
  reset: () => void;
  requests: () => SeenRequest[];
  /** Holds back `/system/status` responses by `ms`. */
  setStatusDelay: (ms: number) => void;
};

const stations = [
  { id: 's1', name: 'Radio One', timezone: 'UTC', active: true },
  { id: 's2', name: 'Night Owl FM', timezone: 'Europe/Oslo', active: true },
];

function bearerOf(c: Context): string | null {
  const header = c.req.header('authorization');
  return header?.startsWith('Bearer ') ? header.slice('Bearer '.length) : null;
}

/**
 * Starts an in-process stand-in for the station backend on a random local port.
 * Routes live under `/api/v1` and accept the API key {@link E2E_API_KEY} or a
 * token issued by its own `/auth/login`.
 */
export async function startE2EServer(): SafeWrapAsync<Error, E2EServer> {
  const seen: SeenRequest[] = [];
  const tokens = new Set<string>();
  let issued = 0;
  let statusDelay = 0;

  const app = new Hono().basePath('/api/v1');

  app.use('*', async (c, next) => {
    const url = new URL(c.req.url);
    seen.push({ method: c.req.method, path: url.pathname, search: url.search, headers: c.req.header() });
    await next();
  });

  const requireAuth: MiddlewareHandler = async (c, next) => {
    const token = bearerOf(c);
    if (c.req.header('x-api-key') !== E2E_API_KEY && !(token && tokens.has(token))) {
      return c.text('unauthorized', 401);
    }

    await next();
  };

  app.post('/auth/login', async (c) => {
    const body = await c.req.json<{ email?: string; password?: string }>();
    if (body.password !== E2E_PASSWORD) {
      return c.json({ error: 'invalid credentials' }, 401);
    }

    issued += 1;
    const token = `e2e-token-${issued}`;
    tokens.add(token);
    return c.json({ token, expires_at: '2030-01-01T00:00:00Z', user: { id: 'u1', email: body.email } });
  });

  app.post('/auth/refresh', (c) => {
    const token = bearerOf(c);
    if (!token || !tokens.has(token)) {
      return c.json({ error: 'invalid token' }, 401);
    }

    tokens.delete(token);
    issued += 1;
    const next = `e2e-token-${issued}`;
    tokens.add(next);
    return c.json({ token: next });
  });

  app.get('/public/stations', (c) => c.json({ stations }));
  app.get('/public/now-playing', (c) => c.json({ current: null, next: null }));

  app.use('/stations/*', requireAuth);
  app.use('/stations', requireAuth);
  app.use('/media/*', requireAuth);
  app.use('/schedule/*', requireAuth);
  app.use('/analytics/*', requireAuth);
  app.use('/playout/*', requireAuth);
  app.use('/system/*', requireAuth);

  app.get('/stations', (c) => c.json({ stations }));

  app.get('/stations/:id', (c) => {
    const station = stations.find(({ id }) => id === c.req.param('id'));
    if (!station) {
      return c.html('<html><body><h1>404 Not Found</h1></body></html>', 404);
    }

    return c.json(station);
  });

  app.get('/stations/:id/mounts', (c) => c.json({ mounts: null }));

  app.post('/media/upload', async (c) => {
    const body = await c.req.parseBody();
    const file = body.file;
    if (!(file instanceof File)) {
      return c.json({ error: 'missing file' }, 400);
    }

    return c.json(
      {
        id: 'md1',
        station_id: c.req.query('station_id'),
        title: file.name,
        mime_type: file.type,
        size: file.size,
        fields: Object.keys(body),
      },
      201,
    );
  });

  app.get('/schedule/export', (c) => {
    c.header('content-type', 'text/calendar');
    return c.body(ICAL_BODY);
  });

  app.get('/analytics/spins', (c) =>
    c.json({
      spins: [{ id: 'sp1', station_id: c.req.query('station_id'), title: 'So What' }],
    }),
  );

  app.post('/playout/skip', (c) => c.body(null, 204));

  app.get('/system/status', async (c) => {
    await new Promise((resolve) => setTimeout(resolve, statusDelay));
    return c.json({ status: 'ok' });
  });

  const [errServer, serverAndPort] = await safeWrapAsync(
    () =>
      new Promise<[ServerType, number]>((resolve) => {
        const srv = serve({ fetch: app.fetch, port: 0, hostname: '127.0.0.1' }, (serverInfo) => {
          resolve([srv, serverInfo.port]);
        });
      }),
  );

  if (errServer) {
    return [new Error('error starting server', { cause: errServer }), null];
  }

  const [server, port] = serverAndPort;

  return [
    null,
    {
      url: `http://127.0.0.1:${port}`,
      reset: () => {
        seen.length = 0;
        statusDelay = 0;
      },
      setStatusDelay: (ms) => {
        statusDelay = ms;
      },
      requests: () => structuredClone(seen),
      close: () =>
        new Promise<Error | null>((resolve) =>
          server.close((err) => {
            if (err) {
              resolve(new Error('error closing server', { cause: err }));
              return;
            }

            resolve(null);
          }),
        ),
    },
  ];
}
