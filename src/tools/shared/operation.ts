// ============================================================================
// Operation Runner
// ============================================================================
// Every facade operation runs inside runOperation(), which is the one place
// failures are caught: validation errors become `validation` envelopes,
// anything else goes through the error classifier. Nothing is re-thrown.
// ============================================================================

import { log, logDebug, logError, logWarning, type Config } from '../../config.js';
import type { PlatformClient } from '../../platform/types.js';
import type { OperationContext, OperationResponse } from '../types.js';
import { cacheKey, TtlCache, type Clock } from './cache.js';
import { classifyError, errorText, ValidationError } from './errors.js';
import { normalizeFields, type NormalizedObject } from './normalize.js';
import { errorEnvelope, successEnvelope } from './response.js';

export function createOperationContext(options: {
  client: PlatformClient;
  config: Config;
  clock?: Clock;
}): OperationContext {
  return {
    client: options.client,
    config: options.config,
    cache: new TtlCache<NormalizedObject>(options.clock),
    inFlight: new Map(),
  };
}

/**
 * Run an operation body and wrap the outcome in an envelope.
 */
export async function runOperation(
  operation: string,
  body: () => Promise<NormalizedObject>
): Promise<OperationResponse> {
  log(`${operation} called`);
  try {
    return successEnvelope(await body());
  } catch (err) {
    if (err instanceof ValidationError) {
      logWarning(`${operation} rejected: ${err.message}`);
      return errorEnvelope(err.message, 'validation');
    }

    const text = errorText(err);
    logError(`Error in ${operation}: ${text}`);
    const { kind, message } = classifyError(text);
    return errorEnvelope(message, kind);
  }
}

/**
 * Serve a result from the cache, or load, normalize and store it.
 * Concurrent misses on the same key share a single upstream call.
 */
export async function cachedLoad(
  ctx: OperationContext,
  operation: string,
  params: Record<string, unknown>,
  ttlSeconds: number,
  load: () => Promise<Record<string, unknown>>
): Promise<NormalizedObject> {
  const key = cacheKey(operation, params);

  const hit = ctx.cache.get(key, ttlSeconds);
  if (hit !== undefined) {
    logDebug(`Cache hit: ${key}`);
    return hit;
  }

  const pending = ctx.inFlight.get(key);
  if (pending) {
    logDebug(`Joining in-flight request: ${key}`);
    return pending;
  }

  const request = (async () => {
    try {
      const payload = normalizeFields(await load());
      ctx.cache.set(key, payload);
      return payload;
    } finally {
      ctx.inFlight.delete(key);
    }
  })();

  ctx.inFlight.set(key, request);
  return request;
}

/**
 * Normalize a result that must never be cached (downloads).
 */
export async function uncachedLoad(
  load: () => Promise<Record<string, unknown>>
): Promise<NormalizedObject> {
  return normalizeFields(await load());
}
