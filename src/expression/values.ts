/**
 * Helpers for the dynamic values that flow through templates and step outputs.
 *
 * Numbers are integers when `Number.isInteger` holds; everything else numeric is a float.
 */

export type DynamicMap = Record<string, unknown>;

export function isRecord(value: unknown): value is DynamicMap {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/**
 * Short type name used in error messages. Never includes the value itself.
 */
export function typeName(value: unknown): string {
  if (value === null || value === undefined) return 'nil';
  if (typeof value === 'string') return 'string';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'number') return Number.isInteger(value) ? 'int' : 'float';
  if (Array.isArray(value)) return 'slice';
  if (isRecord(value)) return 'map';
  return typeof value;
}

/**
 * Empty per the `default`/`coalesce` rules: nil, "", [] or {}.
 */
export function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return value.length === 0;
  if (Array.isArray(value)) return value.length === 0;
  if (isRecord(value)) return Object.keys(value).length === 0;
  return false;
}

/**
 * Truth used by `if`, `with`, `and`, `or` and `not`: false, 0, nil and empty collections are false.
 */
export function isTruthy(value: unknown): boolean {
  if (value === false || value === 0) return false;
  if (typeof value === 'number' && Number.isNaN(value)) return false;
  return !isEmptyValue(value);
}

/**
 * Render a value the way template output prints it: maps as `map[k:v]` with sorted keys,
 * arrays as `[a b]`.
 */
export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '<nil>';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => formatValue(item)).join(' ')}]`;
  }
  if (isRecord(value)) {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${key}:${formatValue(value[key])}`);
    return `map[${entries.join(' ')}]`;
  }
  return String(value);
}

/**
 * Look up a dotted path segment by segment. Numeric segments index arrays.
 * Returns `{ found: false }` as soon as a segment is missing.
 */
export function lookupPath(
  root: unknown,
  segments: readonly string[]
): { found: true; value: unknown } | { found: false } {
  let current: unknown = root;
  for (const segment of segments) {
    if (isRecord(current) && Object.prototype.hasOwnProperty.call(current, segment)) {
      current = current[segment];
      continue;
    }
    if (Array.isArray(current) && /^\d+$/.test(segment)) {
      const index = Number(segment);
      if (index < current.length) {
        current = current[index];
        continue;
      }
    }
    return { found: false };
  }
  return { found: true, value: current };
}
