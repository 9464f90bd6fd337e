/**
 * Root entrypoint: re-exports the client, its endpoint groups, response models
 * and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/** Immutable credential values and the helpers that turn them into headers. */
export {
  type ApiKeyCredential,
  apiKeyCredential,
  type BearerCredential,
  bearerCredential,
  buildHeaders,
  type Credential,
  parseExpiresAt,
} from './auth/credential.js';

/** Client for the station backend, and a scoped variant that disposes itself. */
export { DEFAULT_TIMEOUT, GrimnirClient, withClient } from './core/client.js';
export type { EndpointTransport, GrimnirClientOptions, SchemaOutput } from './core/types.js';

/** Client built from `GRIMNIR_*` environment variables. */
export { createClientFromEnv, envSchema, type GrimnirEnv } from './env.js';

export * from './error/index.js';

/** Default dispatcher on top of `fetch`. */
export { FetchClient } from './fetch/client.js';

/** Inputs of the endpoint groups. */
export type { AnalyticsMethods, SpinOptions } from './methods/analytics.js';
export type { LiveMethods } from './methods/live.js';
export type { MediaMethods } from './methods/media.js';
export type { PlaylistMethods } from './methods/playlists.js';
export type { PlayoutMethods } from './methods/playout.js';
export type { PublicScheduleMethods } from './methods/publicSchedule.js';
export type { ScheduleMethods } from './methods/schedule.js';
export type { ScheduleAnalyticsMethods } from './methods/scheduleAnalytics.js';
export type { CreateShowInput, ShowMethods } from './methods/shows.js';
export type { CreateSmartBlockInput, SmartBlockMethods } from './methods/smartBlocks.js';
export type { LogFilters, StationMethods } from './methods/stations.js';
export type { SubscribeInput, SyndicationMethods } from './methods/syndication.js';
export type { SystemMethods } from './methods/system.js';
export type { UnderwritingMethods } from './methods/underwriting.js';
export type { CreateWebstreamInput, WebstreamMethods } from './methods/webstreams.js';

/** Response models: zod schemas and the types inferred from them. */
export * from './models/auth.js';
export * from './models/broadcast.js';
export * from './models/common.js';
export * from './models/library.js';
export * from './models/network.js';
export * from './models/scheduling.js';
export * from './models/stations.js';

/** Request shapes and the dispatcher contract. */
export type {
  ClientConfig,
  ContentContract,
  DateInput,
  DateRange,
  Dispatcher,
  DispatcherProvider,
  FileAttachment,
  HttpMethod,
  OutboundRequest,
  QueryParams,
  QueryValue,
  RawResponse,
} from './types/request.js';

/** Reads a file from disk into an upload attachment. */
export { fileFromPath } from './utils/file.js';
export { interpret } from './utils/interpret.js';
export { unwrapEnvelope } from './utils/envelope.js';

/** Tuple results and helpers to produce or unwrap them. */
export { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync, unwrap } from './utils/wrap.js';
