import { getPath } from './agent-payload';

/**
 * Parse a Retry-After header given either as delta-seconds or as an HTTP-date.
 * Returns seconds from `now`, clamped at 0, or undefined when unparseable.
 */
export function parseRetryAfterHeader(
  value: unknown,
  now: number = Date.now(),
): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.max(0, value) : undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }

  const trimmed = value.trim();
  const seconds = Number(trimmed);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds);
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, (date - now) / 1000);
}

const BODY_HINT_PATHS: readonly (readonly string[])[] = [
  ['retry_after'],
  ['retryAfter'],
  ['error', 'retry_after'],
  ['error', 'retryAfter'],
  ['meta', 'retry_after'],
];

/**
 * Look for a retry hint (seconds) in a decoded 429 body
 */
export function extractRetryAfterFromBody(data: unknown): number | undefined {
  for (const path of BODY_HINT_PATHS) {
    const node = getPath(data, path);
    if (typeof node !== 'number' && typeof node !== 'string') {
      continue;
    }
    const value = typeof node === 'number' ? node : Number(node.trim() || NaN);
    if (Number.isFinite(value)) {
      return Math.max(0, value);
    }
  }
  return undefined;
}
