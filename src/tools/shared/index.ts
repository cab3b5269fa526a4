// ============================================================================
// Shared Helpers - Barrel Export
// ============================================================================

export { successEnvelope, errorEnvelope, isErrorEnvelope, toToolResult } from './response.js';
export { createOperationContext, runOperation, cachedLoad, uncachedLoad } from './operation.js';
export {
  validatePagination,
  validateReference,
  validateIdentifier,
  requireValid,
  requireReference,
  filterValue,
  sanitizeFileName,
  isSafeSegment,
} from './validation.js';
export { normalize, normalizeFields } from './normalize.js';
export type { NormalizedValue, NormalizedObject } from './normalize.js';
export { TtlCache, cacheKey } from './cache.js';
export { classifyError, errorText, ValidationError } from './errors.js';
export type { ErrorKind, UpstreamErrorKind, ClassifiedError } from './errors.js';
