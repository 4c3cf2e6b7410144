/**
 * Query-string serialization for Aladhan requests
 * The upstream API expects literal "true"/"false" strings for booleans.
 */

import type { QueryParams, QueryValue } from './types.js';

export function serializeQueryValue(value: QueryValue): string {
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  return String(value);
}

/**
 * Build URLSearchParams in insertion order, omitting undefined entries
 */
export function buildQuery(params: QueryParams = {}): URLSearchParams {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) {
      continue;
    }
    search.set(key, serializeQueryValue(value));
  }
  return search;
}
