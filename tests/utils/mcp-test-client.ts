import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createMcpServer } from '../../src/transports/mcp.js';
import type { OperationContext } from '../../src/tools/types.js';

export interface TestMcpClient {
  client: Client;
  server: McpServer;
  close: () => Promise<void>;
  listTools: () => Promise<Array<{ name: string; description?: string }>>;
  listResources: () => Promise<Array<{ name: string; uri: string }>>;
  callTool: (name: string, args: Record<string, unknown>) => Promise<{
    content: Array<{ type: string; text: string }>;
    isError?: boolean;
  }>;
  readResource: (uri: string) => Promise<string>;
}

function isTextContent(item: unknown): item is { type: 'text'; text: string } {
  return (
    typeof item === 'object' &&
    item !== null &&
    'type' in item &&
    item.type === 'text' &&
    'text' in item &&
    typeof item.text === 'string'
  );
}

/**
 * Creates a test MCP client connected to a real server instance via in-memory transport.
 * This allows testing the full MCP protocol flow without stdio.
 */
export async function createTestMcpClient(ctx: OperationContext): Promise<TestMcpClient> {
  const server = createMcpServer(ctx);
  const client = new Client({ name: 'test-client', version: '0.1.0' });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([
    client.connect(clientTransport),
    server.connect(serverTransport),
  ]);

  return {
    client,
    server,
    close: async () => {
      await client.close();
      await server.close();
    },
    listTools: async () => {
      const result = await client.listTools();
      return result.tools.map(t => ({ name: t.name, description: t.description }));
    },
    listResources: async () => {
      const result = await client.listResources();
      return result.resources.map(r => ({ name: r.name, uri: r.uri }));
    },
    callTool: async (name, args) => {
      const result = await client.callTool({ name, arguments: args });
      const content: unknown[] = Array.isArray(result.content) ? result.content : [];
      return {
        content: content.filter(isTextContent).map(c => ({ type: c.type, text: c.text })),
        isError: result.isError === true,
      };
    },
    readResource: async (uri) => {
      const result = await client.readResource({ uri });
      return result.contents
        .map(c => ('text' in c && typeof c.text === 'string' ? c.text : ''))
        .join('');
    },
  };
}
