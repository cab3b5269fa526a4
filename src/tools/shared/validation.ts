// ============================================================================
// Validation Helpers
// ============================================================================
// Pure checks on tool arguments. They return results instead of throwing;
// requireValid() turns a failed result into a ValidationError at the
// operation boundary.
// ============================================================================

import { ValidationError } from './errors.js';

export type ValidationResult = { valid: true } | { valid: false; message: string };

export type ReferenceValidation =
  | { valid: true; owner: string; name: string }
  | { valid: false; message: string };

export const DEFAULT_MAX_PAGE_SIZE = 100;

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

/**
 * A slug becomes one directory under the download path, so it must be a
 * single, non-relative path segment.
 */
export function isSafeSegment(value: string): boolean {
  return (
    value !== '.' &&
    value !== '..' &&
    !value.includes('/') &&
    !value.includes('\\') &&
    !CONTROL_CHARS.test(value)
  );
}

export function validatePagination(
  page: number,
  pageSize: number,
  maxPageSize: number = DEFAULT_MAX_PAGE_SIZE
): ValidationResult {
  if (page < 1) {
    return { valid: false, message: 'Page number must be 1 or greater' };
  }
  if (pageSize < 1) {
    return { valid: false, message: 'Page size must be 1 or greater' };
  }
  if (pageSize > maxPageSize) {
    return { valid: false, message: `Page size cannot exceed ${maxPageSize}` };
  }
  return { valid: true };
}

/**
 * Validate an `owner/name` reference and split it.
 */
export function validateReference(ref: string, label = 'Dataset'): ReferenceValidation {
  if (!ref) {
    return { valid: false, message: `${label} reference cannot be empty` };
  }
  if (!ref.includes('/')) {
    return { valid: false, message: `${label} reference must be in format 'owner/name'` };
  }

  const parts = ref.split('/');
  if (parts.length !== 2) {
    return { valid: false, message: `${label} reference must contain exactly one '/' separator` };
  }

  const [owner, name] = parts;
  if (!owner || !name) {
    return { valid: false, message: 'Both owner and name must be non-empty' };
  }
  if (!isSafeSegment(owner) || !isSafeSegment(name)) {
    return { valid: false, message: `${label} reference contains an invalid owner or name` };
  }
  return { valid: true, owner, name };
}

export function validateIdentifier(value: string, label: string): ValidationResult {
  if (!value || !value.trim()) {
    return { valid: false, message: `${label} cannot be empty` };
  }
  if (!isSafeSegment(value)) {
    return { valid: false, message: `${label} must be a single path segment` };
  }
  return { valid: true };
}

/**
 * Throw a ValidationError for a failed result.
 */
export function requireValid(result: ValidationResult): void {
  if (!result.valid) {
    throw new ValidationError(result.message);
  }
}

/**
 * Validate and split an `owner/name` reference, throwing a ValidationError if malformed.
 */
export function requireReference(ref: string, label?: string): { owner: string; name: string } {
  const result = validateReference(ref, label);
  if (!result.valid) {
    throw new ValidationError(result.message);
  }
  return { owner: result.owner, name: result.name };
}

/** Drop `all` and empty filters so they are not forwarded upstream */
export function filterValue(value: string | undefined): string | undefined {
  return value && value !== 'all' ? value : undefined;
}

const UNSAFE_FILENAME_CHARS = /[<>:"/\\|?*]/g;

/**
 * Make a caller-supplied file name safe to join onto a download directory.
 */
export function sanitizeFileName(fileName: string): string {
  const cleaned = fileName.replace(UNSAFE_FILENAME_CHARS, '_').replace(/^[ .]+|[ .]+$/g, '');
  return cleaned || 'unnamed_file';
}
