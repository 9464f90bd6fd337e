import type { StandardSchemaV1 } from '@standard-schema/spec';
import { apiKeyCredential, bearerCredential, type Credential, parseExpiresAt } from '../auth/credential.js';
import { ApiError } from '../error/apiError.js';
import { AuthError } from '../error/authError.js';
import { ConfigError } from '../error/configError.js';
import { FetchClient } from '../fetch/client.js';
import { AnalyticsMethods } from '../methods/analytics.js';
import { LiveMethods } from '../methods/live.js';
import { MediaMethods } from '../methods/media.js';
import { PlaylistMethods } from '../methods/playlists.js';
import { PlayoutMethods } from '../methods/playout.js';
import { PublicScheduleMethods } from '../methods/publicSchedule.js';
import { ScheduleMethods } from '../methods/schedule.js';
import { ScheduleAnalyticsMethods } from '../methods/scheduleAnalytics.js';
import { ShowMethods } from '../methods/shows.js';
import { SmartBlockMethods } from '../methods/smartBlocks.js';
import { StationMethods } from '../methods/stations.js';
import { SyndicationMethods } from '../methods/syndication.js';
import { SystemMethods } from '../methods/system.js';
import { UnderwritingMethods } from '../methods/underwriting.js';
import { WebstreamMethods } from '../methods/webstreams.js';
import { type AuthResult, loginResponseSchema, refreshResponseSchema } from '../models/auth.js';
import type { ClientConfig, Dispatcher, OutboundRequest } from '../types/request.js';
import { unwrapEnvelope } from '../utils/envelope.js';
import { interpret } from '../utils/interpret.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import type { EndpointTransport, GrimnirClientOptions, SchemaOutput } from './types.js';

/** Timeout applied when none is configured, in milliseconds. */
export const DEFAULT_TIMEOUT = 30_000;

/**
 * Client for the station backend's `/api/v1` REST API.
 *
 * - Authenticates with a static API key, or with a bearer token from
 *   {@link GrimnirClient.login} / {@link GrimnirClient.refresh}, never both.
 * - Groups endpoints by domain (`client.stations`, `client.shows`, ...).
 * - Checks response bodies against zod schemas.
 *
 * Every call returns an error-first tuple via {@link SafeWrapAsync}; errors from
 * the dispatcher, the translator and the schema check reach the caller as they
 * were created.
 *
 * One client holds one logical session. Calls to `login`/`refresh` replace the
 * credential for every later call, so share an instance only under external
 * serialization.
 *
 * @example
 * const client = new GrimnirClient({ baseUrl: 'https://radio.example.com', apiKey });
 * const [err, stations] = await client.stations.list();
 */
export class GrimnirClient {
  /** Resolved configuration, frozen. */
  #config: ClientConfig;
  /** Puts requests on the wire. */
  #dispatcher: Dispatcher;
  /** Active credential; `null` for an anonymous client. */
  #credential: Credential | null;

  readonly stations: StationMethods;
  readonly media: MediaMethods;
  readonly playlists: PlaylistMethods;
  readonly smartBlocks: SmartBlockMethods;
  readonly schedule: ScheduleMethods;
  readonly live: LiveMethods;
  readonly webstreams: WebstreamMethods;
  readonly playout: PlayoutMethods;
  readonly analytics: AnalyticsMethods;
  readonly shows: ShowMethods;
  readonly scheduleAnalytics: ScheduleAnalyticsMethods;
  readonly publicSchedule: PublicScheduleMethods;
  readonly syndication: SyndicationMethods;
  readonly underwriting: UnderwritingMethods;
  readonly system: SystemMethods;

  /**
   * Creates a client.
   *
   * @throws {ConfigError} when `apiKey` and `token` are both given, the base URL
   * does not parse, or the timeout is not a positive number.
   */
  constructor({ baseUrl, apiKey, token, expiresAt, timeout = DEFAULT_TIMEOUT, dispatcher = FetchClient }: GrimnirClientOptions) {
    if (apiKey && token) {
      throw new ConfigError('error configuring client, apiKey and token are mutually exclusive');
    }

    const origin = baseUrl.replace(/\/+$/, '');
    const [errUrl] = safeWrap(() => new URL(origin));
    if (errUrl) {
      throw new ConfigError(`error configuring client, invalid baseUrl ${baseUrl}`, { cause: errUrl });
    }

    if (!Number.isFinite(timeout) || timeout <= 0) {
      throw new ConfigError(`error configuring client, timeout must be a positive number of milliseconds, got ${timeout}`);
    }

    const config: ClientConfig = { baseUrl: origin, apiPathPrefix: '/api/v1', timeout };
    this.#config = Object.freeze(config);
    this.#dispatcher = new dispatcher(this.#config);

    if (apiKey) {
      this.#credential = apiKeyCredential(apiKey);
    } else if (token) {
      this.#credential = bearerCredential(
        token,
        expiresAt instanceof Date ? expiresAt : parseExpiresAt(expiresAt),
      );
    } else {
      this.#credential = null;
    }

    const transport: EndpointTransport = {
      object: (request, schema) => this.#object(request, schema),
      list: (request, key, schema) => this.#list(request, key, schema),
      text: (request) => this.#text(request),
    };

    this.stations = new StationMethods(transport);
    this.media = new MediaMethods(transport);
    this.playlists = new PlaylistMethods(transport);
    this.smartBlocks = new SmartBlockMethods(transport);
    this.schedule = new ScheduleMethods(transport);
    this.live = new LiveMethods(transport);
    this.webstreams = new WebstreamMethods(transport);
    this.playout = new PlayoutMethods(transport);
    this.analytics = new AnalyticsMethods(transport);
    this.shows = new ShowMethods(transport);
    this.scheduleAnalytics = new ScheduleAnalyticsMethods(transport);
    this.publicSchedule = new PublicScheduleMethods(transport);
    this.syndication = new SyndicationMethods(transport);
    this.underwriting = new UnderwritingMethods(transport);
    this.system = new SystemMethods(transport);
  }

  /** Resolved configuration. */
  get config(): ClientConfig {
    return this.#config;
  }

  /** Credential attached to every call, or `null`. */
  get credential(): Credential | null {
    return this.#credential;
  }

  /** Whether calls carry any credential. */
  get isAuthenticated(): boolean {
    return this.#credential !== null;
  }

  /**
   * Exchanges email and password for a bearer token and uses it from then on.
   *
   * Errors:
   * - {@link ConfigError} on a client built with an API key, before any I/O.
   * - {@link AuthError} when the backend rejects the login; the {@link ApiError}
   *   is its `cause`.
   * - Dispatcher, decode and validation errors as they are.
   */
  async login(email: string, password: string): SafeWrapAsync<Error, AuthResult> {
    if (this.#credential?.type === 'apiKey') {
      return [new ConfigError('error logging in, client is configured with an api key'), null];
    }

    const [errBody, body] = await this.#json({ method: 'POST', path: '/auth/login', json: { email, password } }, null);
    if (errBody) {
      return [toAuthError('login', errBody), null];
    }

    const [errValidation, response] = await validator(body, loginResponseSchema, 'login response');
    if (errValidation) {
      return [errValidation, null];
    }

    const credential = bearerCredential(response.token, parseExpiresAt(response.expires_at));
    this.#credential = credential;
    return [null, { token: credential.token, expiresAt: credential.expiresAt, user: response.user ?? null }];
  }

  /**
   * Trades the current bearer token for a new one. The new expiry comes from
   * the response, or is `null` when the response has none.
   *
   * Returns a {@link ConfigError} without any I/O when the client holds no
   * bearer token.
   */
  async refresh(): SafeWrapAsync<Error, AuthResult> {
    const current = this.#credential;
    if (current?.type !== 'bearer') {
      return [new ConfigError('error refreshing token, client has no bearer token'), null];
    }

    const [errBody, body] = await this.#json({ method: 'POST', path: '/auth/refresh' }, current);
    if (errBody) {
      return [toAuthError('refresh', errBody), null];
    }

    const [errValidation, response] = await validator(body, refreshResponseSchema, 'refresh response');
    if (errValidation) {
      return [errValidation, null];
    }

    const credential = bearerCredential(response.token, parseExpiresAt(response.expires_at));
    this.#credential = credential;
    return [null, { token: credential.token, expiresAt: credential.expiresAt, user: null }];
  }

  /** Forgets the bearer token. Local only; an API key stays in place. */
  logout() {
    if (this.#credential?.type === 'bearer') {
      this.#credential = null;
    }
  }

  /**
   * Aborts in-flight calls and releases the dispatcher. Later calls fail with a
   * `ConnectionError`. Safe to call more than once.
   */
  dispose() {
    this.#dispatcher.dispose();
  }

  /** Sends a request and reads the body under the JSON contract. */
  async #json(request: OutboundRequest, credential: Credential | null): SafeWrapAsync<Error, unknown> {
    const [errExecute, raw] = await this.#dispatcher.execute(request, credential);
    if (errExecute) {
      return [errExecute, null];
    }

    return interpret(raw, 'json');
  }

  async #text(request: OutboundRequest): SafeWrapAsync<Error, string> {
    const [errExecute, raw] = await this.#dispatcher.execute(request, this.#credential);
    if (errExecute) {
      return [errExecute, null];
    }

    return interpret(raw, 'text');
  }

  async #object<Schema extends StandardSchemaV1>(
    request: OutboundRequest,
    schema: Schema,
  ): SafeWrapAsync<Error, SchemaOutput<Schema>> {
    const [errBody, body] = await this.#json(request, this.#credential);
    if (errBody) {
      return [errBody, null];
    }

    return validator(body, schema, `response from ${request.path}`);
  }

  async #list<Schema extends StandardSchemaV1>(
    request: OutboundRequest,
    key: string,
    schema: Schema,
  ): SafeWrapAsync<Error, SchemaOutput<Schema>> {
    const [errBody, body] = await this.#json(request, this.#credential);
    if (errBody) {
      return [errBody, null];
    }

    const context = `${key} from ${request.path}`;
    const [errEnvelope, list] = unwrapEnvelope(body, key, context);
    if (errEnvelope) {
      return [errEnvelope, null];
    }

    return validator(list, schema, context);
  }
}

/** Rejections of the auth endpoints become an {@link AuthError}; anything else passes through. */
function toAuthError(operation: 'login' | 'refresh', err: Error): Error {
  if (!(err instanceof ApiError)) {
    return err;
  }

  return new AuthError(`error ${operation} rejected with status ${err.statusCode}`, err.statusCode, { cause: err });
}

/**
 * Creates a client, hands it to `fn` and disposes it once `fn` settles, whether
 * it resolved or threw.
 * @example
 * const [err, stations] = await withClient({ baseUrl, apiKey }, (client) => client.stations.list());
 */
export async function withClient<Result>(
  options: GrimnirClientOptions,
  fn: (client: GrimnirClient) => Promise<Result>,
): Promise<Result> {
  const client = new GrimnirClient(options);
  try {
    return await fn(client);
  } finally {
    client.dispose();
  }
}
