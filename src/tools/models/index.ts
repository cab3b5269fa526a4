// ============================================================================
// Model Tools
// ============================================================================

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { OperationContext } from '../types.js';
import { toToolResult } from '../shared/index.js';
import { listModels } from '../models.js';

export function registerModelTools(server: McpServer, ctx: OperationContext): void {
  server.tool(
    'list_models',
    'List Kaggle models with filtering options',
    {
      search: z.string().optional().describe('Search term to filter models'),
      sort_by: z
        .string()
        .optional()
        .describe('Sort order (hotness, downloadCount, voteCount, notebookCount, createTime)'),
      owner: z.string().optional().describe('Only models published by this owner'),
      page: z.number().int().optional().describe('Page number for pagination (default 1)'),
      page_size: z.number().int().optional().describe('Number of models per page (default 20, max 100)'),
    },
    async (args) => toToolResult(await listModels(ctx, args))
  );
}
