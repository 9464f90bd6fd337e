import type { Credential } from '../auth/credential.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the header merger; `null` removes a header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null | undefined>;

/** HTTP methods used by the API. */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** Values accepted in a query string; `null`/`undefined` entries are left out. */
export type QueryValue = string | number | boolean | Date | null | undefined;

/** Query parameters of a request. */
export type QueryParams = Record<string, QueryValue>;

/** Values substituted into `{placeholders}` of a path template. */
export type PathParams = Record<string, string | number>;

/** A single file sent as the `file` field of a multipart body. */
export interface FileAttachment {
  /** File name reported in the multipart part. */
  filename: string;
  /** Raw file bytes. */
  content: Uint8Array | Blob;
  /** MIME type of the part, e.g. `audio/mpeg`. */
  mimeType: string;
}

interface RequestBase {
  method: HttpMethod;
  /** Path template relative to the API prefix, e.g. `/stations/{id}`. */
  path: string;
  /** Values for the path template placeholders. */
  params?: PathParams;
  /** Query string entries. */
  query?: QueryParams;
}

/**
 * A request as built by an endpoint. Carries a JSON body, a file, or neither;
 * never both.
 */
export type OutboundRequest = RequestBase &
  (
    | {
        /** JSON-serializable body. */
        json?: unknown;
        file?: never;
      }
    | {
        /** File sent as multipart form data. */
        file: FileAttachment;
        json?: never;
      }
  );

/**
 * How a successful body is read: parsed as JSON, or handed back as text.
 * Chosen by the endpoint, never inferred from response headers.
 */
export type ContentContract = 'json' | 'text';

/** Response as received, before classification. */
export interface RawResponse {
  /** HTTP status code. */
  status: number;
  /** Full body text, possibly empty. */
  bodyText: string;
  /** Resolved path the request went to, relative to the API prefix. */
  endpointPath: string;
}

/** Resolved, immutable client configuration. */
export interface ClientConfig {
  /** Origin of the backend, without trailing slash (e.g. `https://radio.example.com`). */
  readonly baseUrl: string;
  /** Versioned API prefix. */
  readonly apiPathPrefix: '/api/v1';
  /** Timeout bounding every call, in milliseconds. */
  readonly timeout: number;
}

/** Contract for the component that puts requests on the wire. */
export interface Dispatcher {
  /** Sends one request and returns the response whatever its status. */
  execute: (request: OutboundRequest, credential: Credential | null) => SafeWrapAsync<Error, RawResponse>;
  /** Aborts in-flight requests and refuses further ones. */
  dispose: () => void;
}

/** Factory signature for constructing dispatchers. */
export interface DispatcherProvider {
  /** Creates a dispatcher bound to the given configuration. */
  new (config: ClientConfig): Dispatcher;
}

/** A point in time given as a `Date` or an ISO-8601 string. */
export type DateInput = Date | string;

/** Optional time window of a report or listing. */
export interface DateRange {
  start?: DateInput;
  end?: DateInput;
}
