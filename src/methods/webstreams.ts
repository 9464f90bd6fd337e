import type { EndpointTransport } from '../core/types.js';
import { type Webstream, type WebstreamFormat, webstreamSchema } from '../models/broadcast.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

const webstreamListSchema = webstreamSchema.array();

/** Input of {@link WebstreamMethods.create}. */
export interface CreateWebstreamInput {
  stationId: string;
  name: string;
  url: string;
  format: WebstreamFormat;
  /** Used when `url` stops responding. */
  fallbackUrl?: string;
}

/** Relays of external streams. */
export class WebstreamMethods {
  readonly #transport: EndpointTransport;

  constructor(transport: EndpointTransport) {
    this.#transport = transport;
  }

  list(stationId: string): SafeWrapAsync<Error, Webstream[]> {
    return this.#transport.list(
      { method: 'GET', path: '/webstreams', query: { station_id: stationId } },
      'webstreams',
      webstreamListSchema,
    );
  }

  get(id: string): SafeWrapAsync<Error, Webstream> {
    return this.#transport.object({ method: 'GET', path: '/webstreams/{id}', params: { id } }, webstreamSchema);
  }

  create(input: CreateWebstreamInput): SafeWrapAsync<Error, Webstream> {
    const json: Record<string, string> = {
      station_id: input.stationId,
      name: input.name,
      url: input.url,
      format: input.format,
    };
    if (input.fallbackUrl) {
      json.fallback_url = input.fallbackUrl;
    }

    return this.#transport.object({ method: 'POST', path: '/webstreams', json }, webstreamSchema);
  }
}
