// ============================================================================
// TTL Cache
// ============================================================================
// Key/value store with reader-supplied freshness. One instance is built at
// startup and handed to every operation through OperationContext.
//
// Every method is synchronous, so each call runs to completion on the event
// loop: a reader never sees a half-written entry, and expiry-on-read cannot
// interleave with a set() of the same key.
// ============================================================================

import { normalize, type NormalizedValue } from './normalize.js';

export interface CacheEntry<T> {
  key: string;
  value: T;
  /** Epoch milliseconds */
  storedAt: number;
}

export type Clock = () => number;

export class TtlCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(private readonly now: Clock = Date.now) {}

  /**
   * Return the value if it is no older than `ttlSeconds`. An expired entry is
   * evicted on the spot. The TTL belongs to the reader, not the entry.
   */
  get(key: string, ttlSeconds: number): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    const ageMs = this.now() - entry.storedAt;
    if (ageMs > ttlSeconds * 1000) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T): void {
    this.entries.set(key, { key, value, storedAt: this.now() });
  }

  clear(): void {
    this.entries.clear();
  }

  /** Includes expired entries nobody has read yet */
  size(): number {
    return this.entries.size;
  }
}

// ============================================================================
// Key Construction
// ============================================================================

function canonical(value: NormalizedValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonical).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const body = Object.keys(value)
      .sort()
      .map(k => `${JSON.stringify(k)}:${canonical(value[k])}`);
    return `{${body.join(',')}}`;
  }
  return JSON.stringify(value);
}

/**
 * Deterministic key for an operation call. Parameter order does not matter;
 * parameters that are null or undefined count as absent.
 */
export function cacheKey(operation: string, params: Record<string, unknown>): string {
  const present: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(params)) {
    if (value !== undefined && value !== null) {
      present[name] = value;
    }
  }
  return `${operation}:${canonical(normalize(present))}`;
}
