import type { EndpointTransport } from '../core/types.js';
import { type JsonObject, jsonObjectSchema } from '../models/common.js';
import { type Sponsor, sponsorSchema } from '../models/network.js';
import type { DateRange } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

const sponsorListSchema = sponsorSchema.array();

export class UnderwritingMethods {
  readonly #transport: EndpointTransport;

  constructor(transport: EndpointTransport) {
    this.#transport = transport;
  }

  sponsors(stationId: string): SafeWrapAsync<Error, Sponsor[]> {
    return this.#transport.list(
      { method: 'GET', path: '/sponsors', query: { station_id: stationId } },
      'sponsors',
      sponsorListSchema,
    );
  }

  /** Creates a sponsor. `contactInfo` is sent only when given. */
  createSponsor(stationId: string, name: string, contactInfo?: Record<string, string>): SafeWrapAsync<Error, Sponsor> {
    return this.#transport.object(
      {
        method: 'POST',
        path: '/sponsors',
        json: contactInfo
          ? { station_id: stationId, name, contact_info: contactInfo }
          : { station_id: stationId, name },
      },
      sponsorSchema,
    );
  }

  /** Obligations and aired spots over a period. */
  fulfillment(stationId: string, range: DateRange = {}): SafeWrapAsync<Error, JsonObject> {
    return this.#transport.object(
      {
        method: 'GET',
        path: '/underwriting/fulfillment',
        query: { station_id: stationId, start: range.start, end: range.end },
      },
      jsonObjectSchema,
    );
  }
}
