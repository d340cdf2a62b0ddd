import type { Credential } from '../types/index.js';

export function authorizationValue(credential: Credential): string {
  switch (credential.authType) {
    case 'basic':
      return `Basic ${credential.token}`;
    case 'bearer':
      return `Bearer ${credential.token}`;
  }
}

/**
 * Extra headers first, then Authorization. A user-supplied header named
 * `authorization` in any letter case is discarded.
 */
export function buildHeaders(
  credential: Credential,
  extraHeaders: ReadonlyMap<string, string>,
): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of extraHeaders) {
    if (name.toLowerCase() === 'authorization') {
      continue;
    }
    headers[name] = value;
  }
  headers['Authorization'] = authorizationValue(credential);
  return headers;
}
