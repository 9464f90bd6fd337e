import { RequestShapeError } from '../error/requestShapeError.js';
import type { HeaderOptions, OutboundRequest } from '../types/request.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';

/**
 * Filters out unsupported values and turns remaining into strings.
 */
function sanitize(value: unknown): string | null {
  const type = typeof value;
  return type === 'object' || type === 'function' || type === 'symbol' ? null : String(value);
}

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, unknown]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers.map(([key, value]): [string, unknown] => [key, value]);
  }

  return Object.entries(headers);
}

/**
 * Merge header sets left to right into a single `Headers` instance.
 * A `null` or `undefined` value removes the header set by an earlier source.
 */
export function mergeHeaderOptions(...sources: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const source of sources) {
    for (const [key, value] of toEntries(source)) {
      if (value == null) {
        merged.delete(key);
        continue;
      }

      const clean = sanitize(value);
      if (clean !== null) {
        merged.set(key, clean);
      }
    }
  }

  return merged;
}

/**
 * Encodes the request body:
 * - a file becomes multipart form data with one `file` field,
 * - a JSON value is serialized,
 * - otherwise there is no body.
 *
 * A request with both a file and a JSON value is rejected.
 */
export function encodeBody(request: OutboundRequest): SafeWrap<Error, BodyInit | undefined> {
  const { file, json, path } = request;

  if (file && json !== undefined) {
    return [new RequestShapeError('error request carries both a JSON body and a file', path), null];
  }

  if (file) {
    const part = file.content instanceof Blob ? file.content : new Uint8Array(file.content);
    const form = new FormData();
    form.append('file', new Blob([part], { type: file.mimeType }), file.filename);
    return [null, form];
  }

  if (json === undefined) {
    return [null, undefined];
  }

  const [errJson, serialized] = safeWrap(() => JSON.stringify(json));
  if (errJson) {
    return [new Error(`error serializing JSON body for ${request.path}`, { cause: errJson }), null];
  }

  return [null, serialized];
}
