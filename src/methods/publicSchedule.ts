import type { EndpointTransport } from '../core/types.js';
import { type JsonObject, jsonObjectSchema } from '../models/common.js';
import type { DateRange } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Listener-facing schedule; works without a credential. */
export class PublicScheduleMethods {
  readonly #transport: EndpointTransport;

  constructor(transport: EndpointTransport) {
    this.#transport = transport;
  }

  get(stationId: string, range: DateRange = {}): SafeWrapAsync<Error, JsonObject> {
    return this.#transport.object(
      { method: 'GET', path: '/public/schedule', query: { station_id: stationId, start: range.start, end: range.end } },
      jsonObjectSchema,
    );
  }

  /** Current and next show. */
  nowPlaying(stationId: string): SafeWrapAsync<Error, JsonObject> {
    return this.#transport.object(
      { method: 'GET', path: '/public/now-playing', query: { station_id: stationId } },
      jsonObjectSchema,
    );
  }
}
