/**
 * Core entrypoint: exports the client and its option types.
 * Import from here if you only need the client without error helpers.
 * @module
 */

export { DEFAULT_TIMEOUT, GrimnirClient, withClient } from './client.js';

export type { EndpointTransport, GrimnirClientOptions, SchemaOutput } from './types.js';
