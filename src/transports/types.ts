// ============================================================================
// Transport Adapter Interface
// ============================================================================

import type { OperationContext } from '../tools/types.js';

/**
 * A transport adapter exposes the operations over one protocol. Adapters
 * create their own MCP server, connect their own transport, and manage
 * their own lifecycle.
 */
export interface TransportAdapter {
  readonly name: string;
  start(ctx: OperationContext): Promise<void>;
  stop(): Promise<void>;
}
