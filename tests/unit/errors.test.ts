import { describe, it, expect } from 'vitest';
import { classifyError, errorText, ValidationError } from '../../src/tools/shared/errors.js';

describe('Error Classifier', () => {
  it.each([
    ['401 Client Error: Unauthorized', 'authentication', 'Authentication failed. Please check your API credentials.'],
    ['Unauthorized', 'authentication', 'Authentication failed. Please check your API credentials.'],
    ['403 Forbidden', 'permission', 'Access denied. You may not have permission to access this resource.'],
    ['404 Client Error: Not Found for url', 'not_found', 'Resource not found. Please check the identifier.'],
    ['HTTP 429 Too Many Requests', 'rate_limit', 'Rate limit exceeded. Please wait before making more requests.'],
    ['Rate Limit reached', 'rate_limit', 'Rate limit exceeded. Please wait before making more requests.'],
    ['Connection Timeout', 'timeout', 'Request timed out. Please try again later.'],
  ])('should classify "%s" as %s', (text, kind, message) => {
    expect(classifyError(text)).toEqual({ kind, message });
  });

  describe('rule priority', () => {
    it('should prefer not_found over timeout', () => {
      expect(classifyError('404 while waiting: read timeout').kind).toBe('not_found');
    });

    it('should prefer authentication over rate_limit', () => {
      expect(classifyError('401 — rate limit exceeded').kind).toBe('authentication');
    });

    it('should prefer permission over not_found', () => {
      expect(classifyError('403 Forbidden: 404 page').kind).toBe('permission');
    });
  });

  describe('unknown errors', () => {
    it('should keep the original text in the message', () => {
      expect(classifyError('socket hang up')).toEqual({
        kind: 'unknown',
        message: 'An unexpected error occurred: socket hang up',
      });
    });

    it('should handle empty text', () => {
      expect(classifyError('')).toEqual({
        kind: 'unknown',
        message: 'An unexpected error occurred: ',
      });
    });
  });

  describe('errorText', () => {
    it('should use the message of an Error', () => {
      expect(errorText(new Error('403 Forbidden'))).toBe('403 Forbidden');
    });

    it('should stringify anything else', () => {
      expect(errorText('plain text')).toBe('plain text');
      expect(errorText(429)).toBe('429');
    });
  });

  describe('ValidationError', () => {
    it('should carry its own name', () => {
      const err = new ValidationError('Page size must be 1 or greater');

      expect(err).toBeInstanceOf(Error);
      expect(err.name).toBe('ValidationError');
      expect(err.message).toBe('Page size must be 1 or greater');
    });
  });
});
