import type { EndpointTransport } from '../core/types.js';
import {
  type Network,
  type NetworkShow,
  type NetworkSubscription,
  networkSchema,
  networkShowSchema,
  networkSubscriptionSchema,
} from '../models/network.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

const networkListSchema = networkSchema.array();
const networkShowListSchema = networkShowSchema.array();

/** Input of {@link SyndicationMethods.subscribe}. */
export interface SubscribeInput {
  stationId: string;
  networkShowId: string;
  /** Local air time, `HH:MM`. */
  localTime: string;
  /** Air days, e.g. `MO,WE,FR`. */
  localDays: string;
  /** Defaults to `UTC`. */
  timezone?: string;
}

/** Networks sharing shows between stations. */
export class SyndicationMethods {
  readonly #transport: EndpointTransport;

  constructor(transport: EndpointTransport) {
    this.#transport = transport;
  }

  networks(ownerId?: string): SafeWrapAsync<Error, Network[]> {
    return this.#transport.list(
      { method: 'GET', path: '/networks', query: { owner_id: ownerId } },
      'networks',
      networkListSchema,
    );
  }

  /** Shows offered for syndication. */
  networkShows(networkId?: string): SafeWrapAsync<Error, NetworkShow[]> {
    return this.#transport.list(
      { method: 'GET', path: '/network-shows', query: { network_id: networkId } },
      'shows',
      networkShowListSchema,
    );
  }

  /** Subscribes a station to a network show. */
  subscribe(input: SubscribeInput): SafeWrapAsync<Error, NetworkSubscription> {
    return this.#transport.object(
      {
        method: 'POST',
        path: '/network-subscriptions',
        json: {
          station_id: input.stationId,
          network_show_id: input.networkShowId,
          local_time: input.localTime,
          local_days: input.localDays,
          timezone: input.timezone ?? 'UTC',
        },
      },
      networkSubscriptionSchema,
    );
  }
}
