/** Static API key, sent as `X-API-Key` on every call. */
export interface ApiKeyCredential {
  readonly type: 'apiKey';
  readonly key: string;
}

/** Session token from `login`/`refresh`, sent as `Authorization: Bearer`. */
export interface BearerCredential {
  readonly type: 'bearer';
  readonly token: string;
  /** Expiry reported by the backend. Informational only; nothing refreshes on it. */
  readonly expiresAt: Date | null;
}

/** The two mutually exclusive ways a client authenticates. */
export type Credential = ApiKeyCredential | BearerCredential;

export function apiKeyCredential(key: string): ApiKeyCredential {
  return Object.freeze({ type: 'apiKey', key });
}

export function bearerCredential(token: string, expiresAt: Date | null = null): BearerCredential {
  return Object.freeze({ type: 'bearer', token, expiresAt });
}

/**
 * Header contribution of a credential. Always carries the JSON content type;
 * the dispatcher strips it for multipart bodies.
 */
export function buildHeaders(credential: Credential | null): Record<string, string> {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };

  switch (credential?.type) {
    case 'bearer':
      headers.Authorization = `Bearer ${credential.token}`;
      break;
    case 'apiKey':
      headers['X-API-Key'] = credential.key;
      break;
  }

  return headers;
}

/**
 * Parses an ISO-8601 `expires_at` value. A trailing `Z` is rewritten to `+00:00`
 * first. Missing or unparsable input gives `null`.
 */
export function parseExpiresAt(value: string | null | undefined): Date | null {
  if (!value) {
    return null;
  }

  const normalized = value.endsWith('Z') ? `${value.slice(0, -1)}+00:00` : value;
  const parsed = new Date(normalized);
  if (Number.isNaN(parsed.getTime())) {
    return null;
  }

  return parsed;
}
