import type { EndpointTransport } from '../core/types.js';
import { type JsonObject, jsonObjectSchema } from '../models/common.js';
import { type LogResponse, logResponseSchema } from '../models/stations.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type LogFilters, logQuery } from './stations.js';

/** Platform health and logs. `status` and `logs` need a platform admin. */
export class SystemMethods {
  readonly #transport: EndpointTransport;

  constructor(transport: EndpointTransport) {
    this.#transport = transport;
  }

  health(): SafeWrapAsync<Error, JsonObject> {
    return this.#transport.object({ method: 'GET', path: '/health' }, jsonObjectSchema);
  }

  status(): SafeWrapAsync<Error, JsonObject> {
    return this.#transport.object({ method: 'GET', path: '/system/status' }, jsonObjectSchema);
  }

  /** Logs of every station, with station names resolved. */
  logs(filters?: LogFilters): SafeWrapAsync<Error, LogResponse> {
    return this.#transport.object({ method: 'GET', path: '/system/logs', query: logQuery(filters) }, logResponseSchema);
  }
}
