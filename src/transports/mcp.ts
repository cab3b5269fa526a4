// ============================================================================
// MCP Server Factory
// ============================================================================
// Creates an McpServer with every tool and resource wired to one shared
// operation context. Each transport calls this for its own instance.
// ============================================================================

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SERVER_NAME, SERVER_VERSION } from '../config.js';
import { registerAll } from '../tools/index.js';
import type { OperationContext } from '../tools/types.js';

export function createMcpServer(ctx: OperationContext): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {}, resources: {} } }
  );
  registerAll(server, ctx);
  return server;
}
