/**
 * Document path navigation: `items.0.id`, `items[0].id`, `Header`
 */

export type PathSegment = string | number;

export type PathLookup = { found: true; value: unknown } | { found: false; reason: string };

/**
 * Split a path into key and index segments
 *
 * Bracketed segments are always indices; bare numeric segments stay strings and
 * index arrays or key objects depending on what they meet.
 */
export function parsePath(path: string): PathSegment[] {
  const segments: PathSegment[] = [];
  for (const part of path.split('.')) {
    if (part === '') {
      continue;
    }
    const match = /^([^[\]]*)((?:\[\d+\])*)$/.exec(part);
    if (!match) {
      segments.push(part);
      continue;
    }
    const [, key, indices] = match;
    if (key) {
      segments.push(key);
    }
    for (const index of (indices ?? '').matchAll(/\[(\d+)\]/g)) {
      segments.push(Number(index[1]));
    }
  }
  return segments;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readKey(target: Record<string, unknown>, key: string): PathLookup {
  if (Object.prototype.hasOwnProperty.call(target, key)) {
    return { found: true, value: target[key] };
  }
  const lowerKey = key.toLowerCase();
  const match = Object.keys(target).find((candidate) => candidate.toLowerCase() === lowerKey);
  return match === undefined
    ? { found: false, reason: `property "${key}" not found` }
    : { found: true, value: target[match] };
}

/**
 * Navigate `document` along `path`
 *
 * Object keys match exactly first, then case-insensitively. An empty path
 * returns the document itself.
 */
export function resolvePath(document: unknown, path: string | PathSegment[]): PathLookup {
  const segments = typeof path === 'string' ? parsePath(path) : path;
  let current: unknown = document;

  for (const segment of segments) {
    if (Array.isArray(current)) {
      const index = typeof segment === 'number' ? segment : /^\d+$/.test(segment) ? Number(segment) : NaN;
      if (Number.isNaN(index)) {
        return { found: false, reason: `"${segment}" is not an index into an array` };
      }
      if (index >= current.length) {
        return { found: false, reason: `index ${index} is out of range (length ${current.length})` };
      }
      current = current[index];
    } else if (isPlainObject(current)) {
      const lookup = readKey(current, String(segment));
      if (!lookup.found) {
        return lookup;
      }
      current = lookup.value;
    } else {
      return { found: false, reason: `cannot read "${segment}" of ${current === null ? 'null' : typeof current}` };
    }
  }

  return { found: true, value: current };
}
