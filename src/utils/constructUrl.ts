import { ConstructURLError } from '../error/constructUrlError.js';
import type { PathParams, QueryParams, QueryValue } from '../types/request.js';
import type { SafeWrap } from './wrap.js';

/**
 * Serializes one query value. Dates become ISO-8601 strings; an invalid date
 * gives `null`.
 */
function serializeQueryValue(value: Exclude<QueryValue, null | undefined>): string | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }

  return String(value);
}

/**
 * Replaces `{placeholder}` segments of a path template with URI-encoded values.
 *
 * Fails when a value is an empty string (it would collapse the path onto a
 * different endpoint) or when placeholders remain unfilled.
 */
export function resolvePath(template: string, params?: PathParams): SafeWrap<ConstructURLError, string> {
  let result = template.startsWith('/') ? template : `/${template}`;

  for (const [key, value] of Object.entries(params ?? {})) {
    const serialized = String(value);
    if (!serialized) {
      return [new ConstructURLError(`error constructing path, empty value for {${key}}`, template), null];
    }

    result = result.replaceAll(`{${key}}`, encodeURIComponent(serialized));
  }

  if (result.includes('{') || result.includes('}')) {
    return [new ConstructURLError(`error constructing path, unresolved placeholder in ${result}`, template), null];
  }

  return [null, result];
}

/**
 * Builds a query string (with leading `?`) from the defined entries of `query`.
 * Gives an empty string when nothing is left to send, and a
 * {@link ConstructURLError} for an invalid date.
 */
export function buildQuery(query?: QueryParams, path = ''): SafeWrap<ConstructURLError, string> {
  const searchParams = new URLSearchParams();

  for (const [key, value] of Object.entries(query ?? {})) {
    if (value === undefined || value === null) {
      continue;
    }

    const serialized = serializeQueryValue(value);
    if (serialized === null) {
      return [new ConstructURLError(`error constructing query, invalid date for ${key}`, path), null];
    }

    searchParams.set(key, serialized);
  }

  const serialized = searchParams.toString();
  return [null, serialized ? `?${serialized}` : ''];
}
