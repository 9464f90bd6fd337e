import type { EndpointTransport } from '../core/types.js';
import { type JsonObject, jsonObjectSchema } from '../models/common.js';
import type { DateRange } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Reports on how scheduled shows perform. */
export class ScheduleAnalyticsMethods {
  readonly #transport: EndpointTransport;

  constructor(transport: EndpointTransport) {
    this.#transport = transport;
  }

  /** Performance per show. The backend defaults to the last 30 days. */
  shows(stationId: string, range: DateRange = {}): SafeWrapAsync<Error, JsonObject> {
    return this.#transport.object(
      {
        method: 'GET',
        path: '/schedule-analytics/shows',
        query: { station_id: stationId, start: range.start, end: range.end },
      },
      jsonObjectSchema,
    );
  }

  bestSlots(stationId: string, limit = 10): SafeWrapAsync<Error, JsonObject> {
    return this.#transport.object(
      { method: 'GET', path: '/schedule-analytics/best-slots', query: { station_id: stationId, limit } },
      jsonObjectSchema,
    );
  }

  suggestions(stationId: string): SafeWrapAsync<Error, JsonObject> {
    return this.#transport.object(
      { method: 'GET', path: '/schedule-analytics/suggestions', query: { station_id: stationId } },
      jsonObjectSchema,
    );
  }
}
