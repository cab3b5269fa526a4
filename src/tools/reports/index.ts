// ============================================================================
// Report Resources
// ============================================================================
// Read-only markdown views exposed as MCP resources.
// ============================================================================

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { OperationContext } from '../types.js';
import {
  activeCompetitionsReport,
  hotTopicsReport,
  platformStatsReport,
  popularDatasetsReport,
  upcomingDeadlinesReport,
} from '../reports.js';

interface ReportResource {
  name: string;
  uri: string;
  description: string;
  build: (ctx: OperationContext) => Promise<string>;
}

export const REPORT_RESOURCES: ReportResource[] = [
  {
    name: 'active-competitions',
    uri: 'kaggle://competitions/active',
    description: 'Currently active competitions',
    build: ctx => activeCompetitionsReport(ctx),
  },
  {
    name: 'popular-datasets',
    uri: 'kaggle://datasets/popular',
    description: 'Hottest datasets with download and vote counts',
    build: ctx => popularDatasetsReport(ctx),
  },
  {
    name: 'upcoming-deadlines',
    uri: 'kaggle://calendar/deadlines',
    description: 'Competitions closing within the next 60 days',
    build: ctx => upcomingDeadlinesReport(ctx),
  },
  {
    name: 'platform-stats',
    uri: 'kaggle://meta/platform-stats',
    description: 'Competition, dataset, model and license statistics',
    build: ctx => platformStatsReport(ctx),
  },
  {
    name: 'hot-topics',
    uri: 'kaggle://trends/hot-topics',
    description: 'Competition categories, high-value prizes and the dataset size mix',
    build: ctx => hotTopicsReport(ctx),
  },
];

export function registerReportResources(server: McpServer, ctx: OperationContext): void {
  for (const report of REPORT_RESOURCES) {
    server.resource(
      report.name,
      report.uri,
      { description: report.description, mimeType: 'text/markdown' },
      async (uri) => ({
        contents: [{ uri: uri.href, mimeType: 'text/markdown', text: await report.build(ctx) }],
      })
    );
  }
}
