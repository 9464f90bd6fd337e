import type { EndpointTransport } from '../core/types.js';
import { type JsonObject, jsonObjectSchema } from '../models/common.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Playout commands. Each one acts on the station's running engine. */
export class PlayoutMethods {
  readonly #transport: EndpointTransport;

  constructor(transport: EndpointTransport) {
    this.#transport = transport;
  }

  /** Skips the track on air. */
  skip(stationId: string): SafeWrapAsync<Error, JsonObject> {
    return this.#command('skip', stationId);
  }

  /** Stops all playout. */
  stop(stationId: string): SafeWrapAsync<Error, JsonObject> {
    return this.#command('stop', stationId);
  }

  /** Reloads the station's playout pipeline. */
  reload(stationId: string): SafeWrapAsync<Error, JsonObject> {
    return this.#command('reload', stationId);
  }

  #command(command: 'skip' | 'stop' | 'reload', stationId: string) {
    return this.#transport.object(
      { method: 'POST', path: `/playout/${command}`, json: { station_id: stationId } },
      jsonObjectSchema,
    );
  }
}
