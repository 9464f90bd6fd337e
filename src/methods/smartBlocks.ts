import type { EndpointTransport } from '../core/types.js';
import {
  type MediaItem,
  mediaItemSchema,
  type SmartBlock,
  type SmartBlockRule,
  type SmartBlockSort,
  smartBlockSchema,
} from '../models/library.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

const smartBlockListSchema = smartBlockSchema.array();
const trackListSchema = mediaItemSchema.array();

/** Input of {@link SmartBlockMethods.create}. */
export interface CreateSmartBlockInput {
  stationId: string;
  name: string;
  /** Filters passed to the backend as given. */
  rules: SmartBlockRule[];
  /** Defaults to an empty string. */
  description?: string;
  /** Tracks per materialization. Defaults to 10. */
  limit?: number;
  /** Defaults to `random`. */
  sortBy?: SmartBlockSort;
}

/** Rule-based track selections. Rules are evaluated by the backend. */
export class SmartBlockMethods {
  readonly #transport: EndpointTransport;

  constructor(transport: EndpointTransport) {
    this.#transport = transport;
  }

  list(stationId: string): SafeWrapAsync<Error, SmartBlock[]> {
    return this.#transport.list(
      { method: 'GET', path: '/smart-blocks', query: { station_id: stationId } },
      'smart_blocks',
      smartBlockListSchema,
    );
  }

  create(input: CreateSmartBlockInput): SafeWrapAsync<Error, SmartBlock> {
    return this.#transport.object(
      {
        method: 'POST',
        path: '/smart-blocks',
        json: {
          station_id: input.stationId,
          name: input.name,
          description: input.description ?? '',
          rules: input.rules,
          limit: input.limit ?? 10,
          sort_by: input.sortBy ?? 'random',
        },
      },
      smartBlockSchema,
    );
  }

  /** Runs the block's rules and returns the selected tracks. */
  materialize(id: string, limit = 10): SafeWrapAsync<Error, MediaItem[]> {
    return this.#transport.list(
      { method: 'POST', path: '/smart-blocks/{id}/materialize', params: { id }, json: { limit } },
      'tracks',
      trackListSchema,
    );
  }
}
