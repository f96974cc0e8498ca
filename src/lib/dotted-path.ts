/**
 * Dotted-path access into plain JSON objects, e.g. `button_mappings.left_click`.
 */

export type JsonObject = { [key: string]: unknown };

export function isPlainObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Raw lookup, undefined on any missing segment */
export function readPath(source: unknown, path: string): unknown {
  let current: unknown = source;
  for (const key of path.split('.')) {
    if (!isPlainObject(current) || !Object.hasOwn(current, key)) return undefined;
    current = current[key];
  }
  return current;
}

function isSameKind<T>(value: unknown, fallback: T): value is T {
  if (value === undefined) return false;
  if (fallback === undefined || fallback === null) return true;
  if (isPlainObject(fallback)) return isPlainObject(value);
  if (Array.isArray(fallback)) return Array.isArray(value);
  return typeof value === typeof fallback;
}

/**
 * Look up a value, returning `fallback` when a segment is missing or the
 * found value is not the same kind as the fallback.
 */
export function getPath<T>(source: unknown, path: string, fallback: T): T {
  const value = readPath(source, path);
  return isSameKind(value, fallback) ? value : fallback;
}

/**
 * Copy of `source` with `value` written at `path`. Missing or non-object
 * segments, the source included, are replaced by empty objects.
 */
export function setPath(source: unknown, path: string, value: unknown): JsonObject {
  const base = isPlainObject(source) ? source : {};
  const [key, ...rest] = path.split('.');
  if (rest.length === 0) {
    return { ...base, [key]: value };
  }
  return { ...base, [key]: setPath(base[key], rest.join('.'), value) };
}
