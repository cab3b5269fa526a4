// ============================================================================
// Tool Types
// ============================================================================
// Shared type definitions for the facade operations and their MCP wiring.
// ============================================================================

import type { Config } from '../config.js';
import type { PlatformClient } from '../platform/types.js';
import type { TtlCache } from './shared/cache.js';
import type { ErrorKind } from './shared/errors.js';
import type { NormalizedObject, NormalizedValue } from './shared/normalize.js';

/**
 * Standard MCP tool result format. A type alias (not an interface) so it
 * stays assignable to the SDK's open-ended result type.
 */
export type ToolResult = {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
};

export interface SuccessEnvelope {
  status: 'success';
  [field: string]: NormalizedValue;
}

export interface ErrorEnvelope {
  status?: never;
  error: string;
  error_type: ErrorKind;
}

/** Exactly one of payload or error, never both */
export type OperationResponse = SuccessEnvelope | ErrorEnvelope;

/**
 * Everything an operation needs, built once at startup and shared by every
 * call for the life of the process.
 */
export interface OperationContext {
  client: PlatformClient;
  config: Config;
  cache: TtlCache<NormalizedObject>;
  /** Upstream calls currently running, by cache key */
  inFlight: Map<string, Promise<NormalizedObject>>;
}
