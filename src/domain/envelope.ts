/**
 * Unwrapping of the Aladhan `{ code, status, data }` response envelope
 *
 * A missing, null or empty `data` is not an error: the whole envelope is
 * returned instead, so a successful transport-level response always reaches
 * the caller.
 */

import type { AladhanEnvelope } from './types.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isEnvelope(value: unknown): value is AladhanEnvelope {
  return isRecord(value);
}

/**
 * null, undefined, '', [] and {} count as empty. 0 and false do not.
 */
export function isEmptyPayload(value: unknown): boolean {
  if (value === null || value === undefined || value === '') {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  if (isRecord(value)) {
    return Object.keys(value).length === 0;
  }
  return false;
}

/**
 * `envelope.data` when present and non-empty, else the envelope itself
 */
export function unwrapEnvelope(envelope: unknown): unknown {
  if (isEnvelope(envelope) && !isEmptyPayload(envelope.data)) {
    return envelope.data;
  }
  return envelope;
}

/**
 * `envelope.data.timings` for the daily timing endpoints, falling back to
 * unwrapEnvelope() when there are no timings
 */
export function unwrapTimings(envelope: unknown): unknown {
  const data = unwrapEnvelope(envelope);
  if (data !== envelope && isRecord(data) && !isEmptyPayload(data.timings)) {
    return data.timings;
  }
  return data;
}

/**
 * `{ direction }` from a qibla envelope, or the whole envelope when the
 * direction is missing
 */
export function unwrapQibla(envelope: unknown): unknown {
  if (isEnvelope(envelope) && isRecord(envelope.data)) {
    const direction = envelope.data.direction;
    if (direction !== null && direction !== undefined) {
      return { direction };
    }
  }
  return envelope;
}
