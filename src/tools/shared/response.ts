// ============================================================================
// Response Helpers
// ============================================================================
// Standardized envelopes for facade operations and their MCP rendering.
// ============================================================================

import type {
  ErrorEnvelope,
  OperationResponse,
  SuccessEnvelope,
  ToolResult,
} from '../types.js';
import type { ErrorKind } from './errors.js';
import type { NormalizedObject } from './normalize.js';

export function successEnvelope(payload: NormalizedObject): SuccessEnvelope {
  return { status: 'success', ...payload };
}

export function errorEnvelope(error: string, errorType: ErrorKind): ErrorEnvelope {
  return { error, error_type: errorType };
}

export function isErrorEnvelope(response: OperationResponse): response is ErrorEnvelope {
  return response.status !== 'success';
}

/**
 * Render an envelope as an MCP tool result
 */
export function toToolResult(response: OperationResponse): ToolResult {
  const result: ToolResult = {
    content: [{
      type: 'text',
      text: JSON.stringify(response, null, 2),
    }],
  };
  if (isErrorEnvelope(response)) {
    result.isError = true;
  }
  return result;
}
