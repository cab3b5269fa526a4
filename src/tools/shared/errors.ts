// ============================================================================
// Error Taxonomy
// ============================================================================
// Upstream failures only reach us as text, so classification is a
// priority-ordered substring match. Order matters: "404 ... timeout" is
// not_found because rule 3 is checked before rule 5.
// ============================================================================

export type UpstreamErrorKind =
  | 'authentication'
  | 'permission'
  | 'not_found'
  | 'rate_limit'
  | 'timeout'
  | 'unknown';

export type ErrorKind = 'validation' | UpstreamErrorKind;

export interface ClassifiedError {
  kind: UpstreamErrorKind;
  message: string;
}

interface ClassificationRule {
  kind: UpstreamErrorKind;
  matches: (text: string) => boolean;
  message: string;
}

const RULES: ClassificationRule[] = [
  {
    kind: 'authentication',
    matches: t => t.includes('401') || t.includes('Unauthorized'),
    message: 'Authentication failed. Please check your API credentials.',
  },
  {
    kind: 'permission',
    matches: t => t.includes('403') || t.includes('Forbidden'),
    message: 'Access denied. You may not have permission to access this resource.',
  },
  {
    kind: 'not_found',
    matches: t => t.includes('404') || t.includes('Not Found'),
    message: 'Resource not found. Please check the identifier.',
  },
  {
    kind: 'rate_limit',
    matches: t => t.includes('429') || t.toLowerCase().includes('rate limit'),
    message: 'Rate limit exceeded. Please wait before making more requests.',
  },
  {
    kind: 'timeout',
    matches: t => t.toLowerCase().includes('timeout'),
    message: 'Request timed out. Please try again later.',
  },
];

export function classifyError(errorText: string): ClassifiedError {
  const rule = RULES.find(r => r.matches(errorText));
  if (rule) {
    return { kind: rule.kind, message: rule.message };
  }
  return { kind: 'unknown', message: `An unexpected error occurred: ${errorText}` };
}

/**
 * A bad caller input, detected before any cache or upstream access.
 * Never passed through classifyError.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
