// ============================================================================
// Dataset Tools
// ============================================================================

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { OperationContext } from '../types.js';
import { toToolResult } from '../shared/index.js';
import { downloadDataset, getDatasetDetails, searchDatasets } from '../datasets.js';

export function registerDatasetTools(server: McpServer, ctx: OperationContext): void {
  server.tool(
    'search_datasets',
    'Search for Kaggle datasets with filtering options',
    {
      search: z.string().optional().describe('Search term'),
      sort_by: z.string().optional().describe('Sort order (hottest, votes, updated, active, published)'),
      size: z.string().optional().describe('Dataset size filter (all, small, medium, large)'),
      file_type: z.string().optional().describe('File type filter (all, csv, sqlite, json, bigQuery)'),
      license_name: z.string().optional().describe('License filter (all, cc, gpl, odb, other)'),
      tag_ids: z.string().optional().describe('Comma-separated tag IDs'),
      user: z.string().optional().describe('Only datasets owned by this user'),
      page: z.number().int().optional().describe('Page number for pagination (default 1)'),
      page_size: z.number().int().optional().describe('Number of datasets per page (default 20, max 100)'),
    },
    async (args) => toToolResult(await searchDatasets(ctx, args))
  );

  server.tool(
    'get_dataset_details',
    'Get detailed information about a specific Kaggle dataset, including its files',
    {
      dataset_ref: z.string().describe("Dataset reference in format 'owner/dataset-name'"),
    },
    async (args) => toToolResult(await getDatasetDetails(ctx, args))
  );

  server.tool(
    'download_dataset',
    'Download a Kaggle dataset to a specified directory',
    {
      dataset_ref: z.string().describe("Dataset reference in format 'owner/dataset-name'"),
      download_path: z.string().optional().describe('Local directory to download into (default from KAGGLE_DOWNLOAD_PATH)'),
      file_name: z.string().optional().describe('Single file to download; omit to download the whole archive'),
      force: z.boolean().optional().describe('Overwrite files that already exist (default false)'),
      quiet: z.boolean().optional().describe('Suppress download progress logging (default true)'),
      unzip: z.boolean().optional().describe('Extract the downloaded archive and remove it (default true)'),
    },
    async (args) => toToolResult(await downloadDataset(ctx, args))
  );
}
