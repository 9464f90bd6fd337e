import type { EndpointTransport } from '../core/types.js';
import { type MediaItem, mediaItemSchema } from '../models/library.js';
import type { FileAttachment } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Media library uploads and lookups. */
export class MediaMethods {
  readonly #transport: EndpointTransport;

  constructor(transport: EndpointTransport) {
    this.#transport = transport;
  }

  /**
   * Uploads an audio file to a station's library as multipart form data.
   * Build `file` from disk with {@link fileFromPath}.
   */
  upload(stationId: string, file: FileAttachment): SafeWrapAsync<Error, MediaItem> {
    return this.#transport.object(
      { method: 'POST', path: '/media/upload', query: { station_id: stationId }, file },
      mediaItemSchema,
    );
  }

  get(id: string): SafeWrapAsync<Error, MediaItem> {
    return this.#transport.object({ method: 'GET', path: '/media/{id}', params: { id } }, mediaItemSchema);
  }
}
