// ============================================================================
// Competition Tools
// ============================================================================
// Search, inspect and download Kaggle competitions.
// ============================================================================

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { OperationContext } from '../types.js';
import { toToolResult } from '../shared/index.js';
import {
  downloadCompetitionFiles,
  getCompetitionDetails,
  listCompetitions,
} from '../competitions.js';

export function registerCompetitionTools(server: McpServer, ctx: OperationContext): void {
  // -------------------------------------------------------------------------
  // list_competitions
  // -------------------------------------------------------------------------
  server.tool(
    'list_competitions',
    'List active Kaggle competitions with optional filtering',
    {
      search: z.string().optional().describe('Search term to filter competitions'),
      category: z
        .string()
        .optional()
        .describe('Competition category (all, featured, research, recruitment, gettingStarted, masters, playground)'),
      sort_by: z
        .string()
        .optional()
        .describe('Sort order (grouped, prize, earliestDeadline, latestDeadline, numberOfTeams, recentlyCreated)'),
      page: z.number().int().optional().describe('Page number for pagination (default 1)'),
      page_size: z.number().int().optional().describe('Number of competitions per page (default 20, max 100)'),
    },
    async (args) => toToolResult(await listCompetitions(ctx, args))
  );

  // -------------------------------------------------------------------------
  // get_competition_details
  // -------------------------------------------------------------------------
  server.tool(
    'get_competition_details',
    'Get detailed information about a specific Kaggle competition',
    {
      competition_id: z.string().describe('Competition identifier: numeric id, ref, or URL slug (e.g. "titanic")'),
    },
    async (args) => toToolResult(await getCompetitionDetails(ctx, args))
  );

  // -------------------------------------------------------------------------
  // download_competition_files
  // -------------------------------------------------------------------------
  server.tool(
    'download_competition_files',
    'Download competition files to a specified directory',
    {
      competition_id: z.string().describe('Competition identifier'),
      download_path: z.string().optional().describe('Local directory to download into (default from KAGGLE_DOWNLOAD_PATH)'),
      file_name: z.string().optional().describe('Single file to download; omit to download everything'),
      force: z.boolean().optional().describe('Overwrite files that already exist (default false)'),
      quiet: z.boolean().optional().describe('Suppress download progress logging (default true)'),
    },
    async (args) => toToolResult(await downloadCompetitionFiles(ctx, args))
  );
}
