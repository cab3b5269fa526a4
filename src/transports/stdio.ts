// ============================================================================
// Stdio Transport Adapter
// ============================================================================
// Wraps StdioServerTransport for desktop MCP clients.
// Session = process lifetime.
// ============================================================================

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { log } from '../config.js';
import type { OperationContext } from '../tools/types.js';
import { createMcpServer } from './mcp.js';
import type { TransportAdapter } from './types.js';

export class StdioAdapter implements TransportAdapter {
  readonly name = 'stdio';
  private server: McpServer | null = null;

  async start(ctx: OperationContext): Promise<void> {
    this.server = createMcpServer(ctx);
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    log('Kaggle facade MCP server running on stdio');
  }

  async stop(): Promise<void> {
    if (this.server) {
      await this.server.close();
      this.server = null;
    }
  }
}
