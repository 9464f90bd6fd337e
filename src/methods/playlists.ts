import type { EndpointTransport } from '../core/types.js';
import { type Playlist, playlistSchema } from '../models/library.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

const playlistListSchema = playlistSchema.array();

export class PlaylistMethods {
  readonly #transport: EndpointTransport;

  constructor(transport: EndpointTransport) {
    this.#transport = transport;
  }

  list(stationId: string): SafeWrapAsync<Error, Playlist[]> {
    return this.#transport.list(
      { method: 'GET', path: '/playlists', query: { station_id: stationId } },
      'playlists',
      playlistListSchema,
    );
  }
}
