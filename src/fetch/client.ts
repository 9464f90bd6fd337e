import { buildHeaders, type Credential } from '../auth/credential.js';
import { ConnectionError } from '../error/connectionError.js';
import { TimeoutError } from '../error/timeoutError.js';
import type { ClientConfig, Dispatcher, OutboundRequest, RawResponse } from '../types/request.js';
import { buildQuery, resolvePath } from '../utils/constructUrl.js';
import { createRequestSignal } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { encodeBody, mergeHeaderOptions } from './utils.js';

/**
 * Dispatcher on top of the native `fetch` API that:
 * - prefixes every path with the base URL and the versioned API prefix,
 * - merges credential and body-encoding headers,
 * - bounds each call, body included, by the configured timeout,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * Status codes are not inspected here; every response that arrives is returned.
 */
export class FetchClient implements Dispatcher {
  /** Resolved client configuration. */
  #config: ClientConfig;
  /** Aborted on dispose; parent of every request signal. */
  #abortController = new AbortController();

  /** Creates a new fetch dispatcher bound to the given configuration */
  constructor(config: ClientConfig) {
    this.#config = config;
  }

  /** Whether {@link FetchClient.dispose} has been called. */
  get disposed(): boolean {
    return this.#abortController.signal.aborted;
  }

  /**
   * Aborts in-flight requests; later calls fail with a {@link ConnectionError}.
   */
  dispose() {
    if (this.disposed) {
      return;
    }

    this.#abortController.abort(new ConnectionError('error client was disposed'));
  }

  /**
   * Sends one request.
   *
   * Errors:
   * - Path or body problems are returned before any I/O.
   * - An elapsed timeout gives a {@link TimeoutError}.
   * - Any other transport failure gives a {@link ConnectionError} with the cause attached.
   *
   * @returns A promise resolving to `[error, response]`.
   */
  async execute(request: OutboundRequest, credential: Credential | null): SafeWrapAsync<Error, RawResponse> {
    const [errPath, endpointPath] = resolvePath(request.path, request.params);
    if (errPath) {
      return [errPath, null];
    }

    const [errQuery, query] = buildQuery(request.query, endpointPath);
    if (errQuery) {
      return [errQuery, null];
    }

    const [errBody, body] = encodeBody(request);
    if (errBody) {
      return [errBody, null];
    }

    if (this.disposed) {
      return [new ConnectionError(`error ${request.method} ${endpointPath} on a disposed client`), null];
    }

    // Multipart bodies need fetch to set Content-Type with the boundary itself
    const headers = mergeHeaderOptions(buildHeaders(credential), request.file ? { 'Content-Type': null } : undefined);

    const url = `${this.#config.baseUrl}${this.#config.apiPathPrefix}${endpointPath}${query}`;
    const { signal, release } = createRequestSignal(this.#config.timeout, [this.#abortController.signal]);

    const [errFetch, response] = await safeWrapAsync(async () => {
      const res = await fetch(url, { method: request.method, headers, body, signal });
      return { status: res.status, bodyText: await res.text() };
    });
    release();

    if (errFetch) {
      if (signal.reason instanceof TimeoutError) {
        return [signal.reason, null];
      }

      return [
        new ConnectionError(`error sending ${request.method} ${endpointPath}`, { cause: signal.reason ?? errFetch }),
        null,
      ];
    }

    return [null, { ...response, endpointPath }];
  }
}
