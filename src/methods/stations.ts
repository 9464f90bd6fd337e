import type { EndpointTransport } from '../core/types.js';
import { type JsonObject, jsonObjectSchema } from '../models/common.js';
import {
  type LogLevel,
  type LogResponse,
  logResponseSchema,
  type Mount,
  mountSchema,
  type Station,
  stationSchema,
} from '../models/stations.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

const stationListSchema = stationSchema.array();
const mountListSchema = mountSchema.array();

/** Filters of a log query. Unset filters are not sent. */
export interface LogFilters {
  level?: LogLevel;
  component?: string;
  /** Substring matched against messages. */
  search?: string;
  /** Maximum number of entries. Defaults to 500. */
  limit?: number;
}

/** Builds the query of a log request; shared with the system-wide log endpoint. */
export function logQuery(filters: LogFilters = {}) {
  return {
    limit: filters.limit ?? 500,
    level: filters.level,
    component: filters.component,
    search: filters.search,
  };
}

/** Stations, their mounts and their logs. */
export class StationMethods {
  readonly #transport: EndpointTransport;

  constructor(transport: EndpointTransport) {
    this.#transport = transport;
  }

  /** Stations visible to the current credential. */
  list(): SafeWrapAsync<Error, Station[]> {
    return this.#transport.list({ method: 'GET', path: '/stations' }, 'stations', stationListSchema);
  }

  /** Stations listed publicly; works without a credential. */
  listPublic(): SafeWrapAsync<Error, Station[]> {
    return this.#transport.list({ method: 'GET', path: '/public/stations' }, 'stations', stationListSchema);
  }

  get(id: string): SafeWrapAsync<Error, Station> {
    return this.#transport.object({ method: 'GET', path: '/stations/{id}', params: { id } }, stationSchema);
  }

  /** Output mounts of a station. */
  mounts(id: string): SafeWrapAsync<Error, Mount[]> {
    return this.#transport.list(
      { method: 'GET', path: '/stations/{id}/mounts', params: { id } },
      'mounts',
      mountListSchema,
    );
  }

  logs(id: string, filters?: LogFilters): SafeWrapAsync<Error, LogResponse> {
    return this.#transport.object(
      { method: 'GET', path: '/stations/{id}/logs', params: { id }, query: logQuery(filters) },
      logResponseSchema,
    );
  }

  /** Component names that appear in the station's logs. */
  logComponents(id: string): SafeWrapAsync<Error, JsonObject> {
    return this.#transport.object(
      { method: 'GET', path: '/stations/{id}/logs/components', params: { id } },
      jsonObjectSchema,
    );
  }
}
