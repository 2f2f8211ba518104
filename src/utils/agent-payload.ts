export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walk a decoded JSON payload along `path`, returning undefined on the first missing key
 */
export function getPath(data: unknown, path: readonly string[]): unknown {
  let node = data;
  for (const key of path) {
    if (!isRecord(node) || !(key in node)) {
      return undefined;
    }
    node = node[key];
  }
  return node;
}

/**
 * Normalize an HTTP response body into a JSON object.
 * Bodies that are not a JSON object are wrapped as `{ raw_text }`.
 */
export function decodeBody(data: unknown): Record<string, unknown> {
  if (isRecord(data)) {
    return data;
  }
  if (typeof data === 'string') {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch {
      return { raw_text: data };
    }
    return isRecord(parsed) ? parsed : { raw_text: data };
  }
  return { raw_text: data === undefined || data === null ? '' : String(data) };
}

const REPLY_PATHS: readonly (readonly string[])[] = [
  ['message', 'content'],
  ['response', 'output'],
  ['response', 'output_text'],
  ['data', 'message', 'content'],
];

/**
 * Extract reply text from a sessions API payload
 */
export function extractReplyText(data: unknown): string | undefined {
  for (const path of REPLY_PATHS) {
    const node = getPath(data, path);
    if (typeof node === 'string') {
      return node;
    }
  }
  return undefined;
}

/**
 * Extract reply text from an OpenAI-style chat completion, then fall back to
 * the sessions API shapes
 */
export function extractEndpointReplyText(data: unknown): string | undefined {
  const choices = getPath(data, ['choices']);
  if (Array.isArray(choices) && choices.length > 0) {
    const first: unknown = choices[0];
    const content = getPath(first, ['message', 'content']);
    if (typeof content === 'string') {
      return content;
    }
    const text = getPath(first, ['text']);
    if (typeof text === 'string') {
      return text;
    }
  }
  return extractReplyText(data);
}

const SESSION_ID_PATHS: readonly (readonly string[])[] = [
  ['session', 'id'],
  ['id'],
  ['session_id'],
];

export function extractSessionId(data: unknown): string | undefined {
  for (const path of SESSION_ID_PATHS) {
    const node = getPath(data, path);
    if ((typeof node === 'string' && node !== '') || typeof node === 'number') {
      return String(node);
    }
  }
  return undefined;
}
