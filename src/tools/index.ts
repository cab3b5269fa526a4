// ============================================================================
// Tools Aggregator
// ============================================================================
// Central registration of every tool and resource the server exposes.
// ============================================================================

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { OperationContext } from './types.js';
import { registerCompetitionTools } from './competitions/index.js';
import { registerDatasetTools } from './datasets/index.js';
import { registerModelTools } from './models/index.js';
import { registerReportResources } from './reports/index.js';

export const TOOL_NAMES = [
  'list_competitions',
  'get_competition_details',
  'download_competition_files',
  'search_datasets',
  'get_dataset_details',
  'download_dataset',
  'list_models',
] as const;

export function registerAll(server: McpServer, ctx: OperationContext): void {
  registerCompetitionTools(server, ctx);
  registerDatasetTools(server, ctx);
  registerModelTools(server, ctx);
  registerReportResources(server, ctx);
}
