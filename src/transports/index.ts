// ============================================================================
// Transport Layer - public API
// ============================================================================

export type { TransportAdapter } from './types.js';
export { createMcpServer } from './mcp.js';
export { StdioAdapter } from './stdio.js';
