import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { DispatcherProvider, OutboundRequest } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Output type of a Standard Schema. */
export type SchemaOutput<Schema extends StandardSchemaV1> = StandardSchemaV1.InferOutput<Schema>;

/**
 * What an endpoint group sees of the client: one way to send a request for
 * each response shape. The active credential is attached by the client.
 */
export interface EndpointTransport {
  /** JSON contract; the whole body is checked against `schema`. */
  object<Schema extends StandardSchemaV1>(
    request: OutboundRequest,
    schema: Schema,
  ): SafeWrapAsync<Error, SchemaOutput<Schema>>;
  /** JSON contract; the list under envelope `key` is checked against `schema`. */
  list<Schema extends StandardSchemaV1>(
    request: OutboundRequest,
    key: string,
    schema: Schema,
  ): SafeWrapAsync<Error, SchemaOutput<Schema>>;
  /** Text contract; the body comes back verbatim. */
  text(request: OutboundRequest): SafeWrapAsync<Error, string>;
}

/** Options for constructing a {@link GrimnirClient}. */
export interface GrimnirClientOptions {
  /** Backend origin, e.g. `https://radio.example.com`. Trailing slashes are dropped. */
  baseUrl: string;
  /** Static API key. Cannot be combined with `token` or `login`. */
  apiKey?: string;
  /** Pre-issued bearer token. */
  token?: string;
  /** Expiry of `token`, as a date or an ISO-8601 string. */
  expiresAt?: Date | string;
  /** Timeout for every call in milliseconds. Defaults to 30 000. */
  timeout?: number;
  /** Dispatcher implementation. Defaults to {@link FetchClient}. */
  dispatcher?: DispatcherProvider;
}
