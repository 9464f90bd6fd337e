import { ApiError } from '../error/apiError.js';
import { DecodeError } from '../error/decodeError.js';
import type { ContentContract, RawResponse } from '../types/request.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Turns a raw response into a success value or an error.
 *
 * Behavior:
 * - Any status >= 400 gives an {@link ApiError} holding the body text as sent,
 *   whatever the contract. Error bodies are never decoded.
 * - `json`: an empty body gives `{}`, anything else is parsed; a parse failure
 *   gives a {@link DecodeError}.
 * - `text`: the body is returned verbatim.
 */
export function interpret(raw: RawResponse, contract: 'text'): SafeWrap<Error, string>;
export function interpret(raw: RawResponse, contract: 'json'): SafeWrap<Error, unknown>;
export function interpret(raw: RawResponse, contract: ContentContract): SafeWrap<Error, unknown>;
export function interpret(raw: RawResponse, contract: ContentContract): SafeWrap<Error, unknown> {
  if (raw.status >= 400) {
    return [new ApiError(raw.status, raw.bodyText, raw.endpointPath), null];
  }

  if (contract === 'text') {
    return [null, raw.bodyText];
  }

  if (!raw.bodyText) {
    return [null, {}];
  }

  const [errJson, json] = safeWrap<unknown>(() => JSON.parse(raw.bodyText));
  if (errJson) {
    return [
      new DecodeError(`error parsing json response body from ${raw.endpointPath}`, raw.bodyText, { cause: errJson }),
      null,
    ];
  }

  return [null, json];
}
