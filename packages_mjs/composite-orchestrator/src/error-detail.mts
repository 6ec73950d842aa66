/**
 * Error detail extraction from backend error bodies
 */
import { isPlainObject, resolvePath } from './path.mjs';

export const DEFAULT_MAX_DETAIL_LENGTH = 1000;

/**
 * Message locations tried in order; the first string found wins
 */
const MESSAGE_PATHS = ['error.message.value', 'error.message', 'message', 'detail', 'title', 'error'];

export interface ExtractedErrorDetail {
  detail: string;
  /** Parsed body when it is a JSON object or array */
  structured?: unknown;
}

/**
 * Parse a body as JSON when possible, otherwise return the text
 */
export function parseBody(body: string): unknown {
  if (body.trim() === '') {
    return body;
  }
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch {
    return body;
  }
}

export function truncate(value: string, maxLength: number): string {
  return value.length > maxLength ? `${value.slice(0, maxLength)}...` : value;
}

/**
 * Pull a human-readable message out of a backend error body
 */
export function extractErrorDetail(body: string, maxLength = DEFAULT_MAX_DETAIL_LENGTH): ExtractedErrorDetail {
  const parsed = parseBody(body);

  if (isPlainObject(parsed) || Array.isArray(parsed)) {
    for (const path of MESSAGE_PATHS) {
      const lookup = resolvePath(parsed, path);
      if (lookup.found && typeof lookup.value === 'string' && lookup.value.length > 0) {
        return { detail: truncate(lookup.value, maxLength), structured: parsed };
      }
    }
    return { detail: truncate(body, maxLength), structured: parsed };
  }

  return { detail: truncate(body, maxLength) };
}
