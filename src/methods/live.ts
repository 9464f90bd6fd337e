import type { EndpointTransport } from '../core/types.js';
import { type LiveSession, type LiveToken, liveSessionSchema, liveTokenSchema } from '../models/broadcast.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

const liveSessionListSchema = liveSessionSchema.array();

/** Live DJ access: connection tokens and sessions. */
export class LiveMethods {
  readonly #transport: EndpointTransport;

  constructor(transport: EndpointTransport) {
    this.#transport = transport;
  }

  /** Issues a token a DJ uses to connect to a mount. */
  createToken(stationId: string, mountId: string): SafeWrapAsync<Error, LiveToken> {
    return this.#transport.object(
      { method: 'POST', path: '/live/tokens', json: { station_id: stationId, mount_id: mountId } },
      liveTokenSchema,
    );
  }

  /** Active sessions, across stations unless `stationId` is given. */
  sessions(stationId?: string): SafeWrapAsync<Error, LiveSession[]> {
    return this.#transport.list(
      { method: 'GET', path: '/live/sessions', query: { station_id: stationId } },
      'sessions',
      liveSessionListSchema,
    );
  }

  session(id: string): SafeWrapAsync<Error, LiveSession> {
    return this.#transport.object({ method: 'GET', path: '/live/sessions/{id}', params: { id } }, liveSessionSchema);
  }
}
