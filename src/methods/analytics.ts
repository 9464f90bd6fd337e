import type { EndpointTransport } from '../core/types.js';
import { type NowPlaying, nowPlayingSchema, type Spin, spinSchema } from '../models/broadcast.js';
import { type JsonObject, jsonObjectSchema } from '../models/common.js';
import type { DateInput } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

const spinListSchema = spinSchema.array();

/** Options of {@link AnalyticsMethods.spins}. */
export interface SpinOptions {
  /** Only plays that started at or after this instant. */
  since?: DateInput;
  /** Defaults to 100. */
  limit?: number;
}

export class AnalyticsMethods {
  readonly #transport: EndpointTransport;

  constructor(transport: EndpointTransport) {
    this.#transport = transport;
  }

  /** Track on air. */
  nowPlaying(stationId?: string): SafeWrapAsync<Error, NowPlaying> {
    return this.#transport.object(
      { method: 'GET', path: '/analytics/now-playing', query: { station_id: stationId } },
      nowPlayingSchema,
    );
  }

  /** Current listener statistics. */
  listeners(stationId?: string): SafeWrapAsync<Error, JsonObject> {
    return this.#transport.object(
      { method: 'GET', path: '/analytics/listeners', query: { station_id: stationId } },
      jsonObjectSchema,
    );
  }

  /** Play history, newest first. */
  spins(stationId: string, options: SpinOptions = {}): SafeWrapAsync<Error, Spin[]> {
    return this.#transport.list(
      {
        method: 'GET',
        path: '/analytics/spins',
        query: { station_id: stationId, limit: options.limit ?? 100, since: options.since },
      },
      'spins',
      spinListSchema,
    );
  }
}
