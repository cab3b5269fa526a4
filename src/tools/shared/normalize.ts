// ============================================================================
// Object Normalizer
// ============================================================================
// Turns whatever the platform client hands back into plain JSON values.
// Dispatch is a fixed, ordered chain of type tests; the first match wins.
// ============================================================================

export type NormalizedValue =
  | null
  | boolean
  | number
  | string
  | NormalizedValue[]
  | { [key: string]: NormalizedValue };

export type NormalizedObject = { [key: string]: NormalizedValue };

/** Nesting deeper than this is replaced by TRUNCATED_MARKER */
export const MAX_NORMALIZE_DEPTH = 32;
export const TRUNCATED_MARKER = '[truncated]';

interface TimestampLike {
  toISOString(): string;
}

interface NameLike {
  name: unknown;
}

interface ValueLike {
  value: unknown;
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isTimestampLike(value: object): value is TimestampLike {
  return 'toISOString' in value && typeof value.toISOString === 'function';
}

function hasName(value: object): value is NameLike {
  return 'name' in value;
}

function hasValue(value: object): value is ValueLike {
  return 'value' in value;
}

function toIsoString(value: TimestampLike): string {
  try {
    return value.toISOString();
  } catch {
    // Invalid Date throws RangeError
    return String(value);
  }
}

function normalizeEntries(entries: Iterable<[unknown, unknown]>, depth: number): NormalizedObject {
  const out: NormalizedObject = {};
  for (const [key, item] of entries) {
    out[String(key)] = normalizeAt(item, depth + 1);
  }
  return out;
}

function normalizeAt(value: unknown, depth: number): NormalizedValue {
  if (value === null || value === undefined) return null;

  switch (typeof value) {
    case 'boolean':
    case 'number':
    case 'string':
      return value;
    case 'bigint':
      return value.toString();
    case 'function':
      return value.name;
    case 'symbol':
      return String(value);
  }

  if (typeof value !== 'object') return String(value);
  if (depth >= MAX_NORMALIZE_DEPTH) return TRUNCATED_MARKER;

  if (Array.isArray(value)) {
    return value.map(item => normalizeAt(item, depth + 1));
  }
  if (value instanceof Map) {
    return normalizeEntries(value.entries(), depth);
  }
  if (isPlainObject(value)) {
    return normalizeEntries(Object.entries(value), depth);
  }
  if (isTimestampLike(value)) {
    return toIsoString(value);
  }
  if (hasName(value)) {
    return String(value.name);
  }
  if (hasValue(value)) {
    return normalizeAt(value.value, depth + 1);
  }
  return String(value);
}

/**
 * Convert any value into a JSON-safe tree. Total: never throws.
 */
export function normalize(value: unknown): NormalizedValue {
  return normalizeAt(value, 0);
}

/**
 * Normalize a record of fields into an object (top level stays an object).
 */
export function normalizeFields(fields: Record<string, unknown>): NormalizedObject {
  return normalizeEntries(Object.entries(fields), 0);
}
