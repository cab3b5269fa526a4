// ============================================================================
// Reports
// ============================================================================
// Markdown summaries built on top of the facade operations, so they read
// through the same cache and share its error handling.
// ============================================================================

import type { OperationContext, OperationResponse } from './types.js';
import { listCompetitions } from './competitions.js';
import { searchDatasets } from './datasets.js';
import { listModels } from './models.js';
import type { NormalizedObject, NormalizedValue } from './shared/normalize.js';
import { isErrorEnvelope } from './shared/response.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const ACTIVE_LIMIT = 20;
const DEADLINE_WINDOW_DAYS = 60;
const URGENT_DAYS = 7;
const TREND_COMPETITIONS = 20;
const TREND_DATASETS = 50;
const HIGH_VALUE_LIMIT = 5;

const SIZE_UNITS: Record<string, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 ** 2,
  GB: 1024 ** 3,
  TB: 1024 ** 4,
};
const SMALL_DATASET_BYTES = 10 * 1024 ** 2;
const MEDIUM_DATASET_BYTES = 1024 ** 3;

type SizeBucket = 'Small' | 'Medium' | 'Large';

// ============================================================================
// Helpers
// ============================================================================

class ReportError extends Error {}

function isObject(value: NormalizedValue): value is NormalizedObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Pull the record list out of a success envelope, or throw its error message */
function items(response: OperationResponse, field: string): NormalizedObject[] {
  if (isErrorEnvelope(response)) {
    throw new ReportError(response.error);
  }
  const value = response[field];
  return Array.isArray(value) ? value.filter(isObject) : [];
}

function show(value: NormalizedValue | undefined, fallback = 'N/A'): string {
  if (value === null || value === undefined || value === '') return fallback;
  return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

function parseDate(value: NormalizedValue | undefined): Date | undefined {
  if (typeof value !== 'string') return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

function countBy(values: string[]): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const v of values) {
    counts.set(v, (counts.get(v) ?? 0) + 1);
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1]);
}

export function formatFileSize(sizeBytes: number): string {
  if (sizeBytes === 0) return '0 B';

  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let size = sizeBytes;
  let i = 0;
  while (size >= 1024 && i < units.length - 1) {
    size /= 1024;
    i++;
  }
  return `${size.toFixed(1)} ${units[i]}`;
}

/** Bytes from a numeric size or text such as `2MB` / `9.5 GB` */
function sizeInBytes(value: NormalizedValue): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value !== 'string') return undefined;
  const match = /^\s*(\d+(?:\.\d+)?)\s*([KMGT]?B)\s*$/i.exec(value);
  if (!match) return undefined;
  return Number(match[1]) * (SIZE_UNITS[match[2].toUpperCase()] ?? 1);
}

/** Unreadable sizes count as Large; a missing size is not counted */
function sizeBucket(value: NormalizedValue | undefined): SizeBucket | undefined {
  if (value === null || value === undefined || value === '') return undefined;
  const bytes = sizeInBytes(value);
  if (bytes === undefined) return 'Large';
  if (bytes < SMALL_DATASET_BYTES) return 'Small';
  return bytes < MEDIUM_DATASET_BYTES ? 'Medium' : 'Large';
}

function formatDeadline(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

/**
 * Run a report body; a failed operation renders as a one-line error.
 */
async function render(body: () => Promise<string>): Promise<string> {
  try {
    return await body();
  } catch (err) {
    if (err instanceof ReportError) {
      return `Error: ${err.message}`;
    }
    throw err;
  }
}

// ============================================================================
// Reports
// ============================================================================

export function activeCompetitionsReport(ctx: OperationContext, now: Date = new Date()): Promise<string> {
  return render(async () => {
    const competitions = items(await listCompetitions(ctx, {}), 'competitions');
    const active = competitions
      .filter(c => {
        const deadline = parseDate(c.deadline);
        return !deadline || deadline > now;
      })
      .slice(0, ACTIVE_LIMIT);

    let out = '# Active Kaggle Competitions\n\n';
    for (const c of active) {
      out += `## ${show(c.title)}\n`;
      out += `- **ID**: ${show(c.id)}\n`;
      out += `- **Category**: ${show(c.category)}\n`;
      out += `- **Reward**: ${show(c.reward)}\n`;
      out += `- **Deadline**: ${show(c.deadline, 'Not specified')}\n`;
      out += `- **Teams**: ${show(c.total_teams)}\n`;
      out += `- **URL**: ${show(c.url)}\n\n`;
    }
    return out;
  });
}

export function popularDatasetsReport(ctx: OperationContext): Promise<string> {
  return render(async () => {
    const datasets = items(await searchDatasets(ctx, { sort_by: 'hottest' }), 'datasets');

    let out = '# Popular Kaggle Datasets\n\n';
    for (const d of datasets) {
      const size = typeof d.size === 'number' ? formatFileSize(d.size) : show(d.size);
      out += `## ${show(d.title)}\n`;
      out += `- **Reference**: ${show(d.ref)}\n`;
      out += `- **Size**: ${size}\n`;
      out += `- **Downloads**: ${show(d.download_count)}\n`;
      out += `- **Votes**: ${show(d.vote_count)}\n`;
      out += `- **Usability**: ${show(d.usability_rating)}\n`;
      out += `- **License**: ${show(d.license_name)}\n`;
      out += `- **Last Updated**: ${show(d.last_updated, 'Unknown')}\n`;
      out += `- **URL**: ${show(d.url)}\n\n`;
    }
    return out;
  });
}

export function upcomingDeadlinesReport(ctx: OperationContext, now: Date = new Date()): Promise<string> {
  return render(async () => {
    const competitions = items(await listCompetitions(ctx, {}), 'competitions');

    const upcoming: Array<{ competition: NormalizedObject; deadline: Date; days: number }> = [];
    for (const competition of competitions) {
      const deadline = parseDate(competition.deadline);
      if (!deadline) continue;
      const days = Math.floor((deadline.getTime() - now.getTime()) / DAY_MS);
      if (days >= 0 && days <= DEADLINE_WINDOW_DAYS) {
        upcoming.push({ competition, deadline, days });
      }
    }
    upcoming.sort((a, b) => a.deadline.getTime() - b.deadline.getTime());

    let out = '# Upcoming Competition Deadlines\n\n';
    out += '## Next 30 Days\n\n';
    for (const { competition, deadline, days } of upcoming.filter(u => u.days <= 30)) {
      const urgency = days <= URGENT_DAYS ? 'URGENT' : 'Soon';
      out += `- **${show(competition.title)}** (${urgency})\n`;
      out += `  - Days left: ${days}\n`;
      out += `  - Reward: ${show(competition.reward)}\n`;
      out += `  - Deadline: ${formatDeadline(deadline)}\n\n`;
    }

    out += '## Later This Window\n\n';
    for (const { competition, days } of upcoming.filter(u => u.days > 30)) {
      out += `- **${show(competition.title)}**\n`;
      out += `  - Days left: ${days}\n`;
      out += `  - Reward: ${show(competition.reward)}\n\n`;
    }
    return out;
  });
}

export function platformStatsReport(ctx: OperationContext): Promise<string> {
  return render(async () => {
    const [competitionsRes, datasetsRes, modelsRes] = await Promise.all([
      listCompetitions(ctx, {}),
      searchDatasets(ctx, {}),
      listModels(ctx, {}),
    ]);
    const competitions = items(competitionsRes, 'competitions');
    const datasets = items(datasetsRes, 'datasets');
    const models = items(modelsRes, 'models');

    let out = '# Kaggle Platform Statistics\n\n';

    out += '## Competition Overview\n\n';
    const categories = countBy(competitions.map(c => show(c.category, 'Unknown')));
    out += `- **Total Competitions**: ${competitions.length}\n`;
    out += `- **Categories**: ${categories.length}\n\n`;
    for (const [category, count] of categories) {
      out += `  - ${category}: ${count} competitions\n`;
    }

    out += '\n## Dataset Overview\n\n';
    const downloads = datasets.reduce(
      (sum, d) => sum + (typeof d.download_count === 'number' ? d.download_count : 0),
      0
    );
    const ratings = datasets
      .map(d => d.usability_rating)
      .filter((r): r is number => typeof r === 'number' && r > 0);
    const avgUsability = ratings.length
      ? `${(ratings.reduce((a, b) => a + b, 0) / ratings.length).toFixed(1)}/10`
      : 'N/A';
    out += `- **Total Popular Datasets**: ${datasets.length}\n`;
    out += `- **Total Downloads**: ${downloads.toLocaleString('en-US')}\n`;
    out += `- **Average Usability Rating**: ${avgUsability}\n`;

    out += '\n## Model Hub Overview\n\n';
    out += `- **Total Available Models**: ${models.length}\n`;

    out += '\n## License Distribution\n\n';
    for (const [license, count] of countBy(datasets.map(d => show(d.license_name, 'Unknown'))).slice(0, 5)) {
      out += `- **${license}**: ${count} datasets\n`;
    }
    return out;
  });
}

export function hotTopicsReport(ctx: OperationContext): Promise<string> {
  return render(async () => {
    const [competitionsRes, datasetsRes] = await Promise.all([
      listCompetitions(ctx, {}),
      searchDatasets(ctx, { page_size: TREND_DATASETS }),
    ]);
    const competitions = items(competitionsRes, 'competitions');
    const datasets = items(datasetsRes, 'datasets');

    let out = '# Trending Topics on Kaggle\n\n';

    out += '## Hot Competition Categories\n\n';
    const recent = competitions.slice(0, TREND_COMPETITIONS);
    for (const [category, count] of countBy(recent.map(c => show(c.category, 'Unknown')))) {
      out += `- **${category}**: ${count} active competitions\n`;
    }

    out += '\n## High-Value Competitions\n\n';
    const highValue = competitions.filter(
      c => typeof c.reward === 'string' && c.reward.includes('Usd') && c.reward !== 'Knowledge'
    );
    for (const c of highValue.slice(0, HIGH_VALUE_LIMIT)) {
      out += `- **${show(c.title)}**: ${show(c.reward)}\n`;
    }

    out += '\n## Dataset Size Mix\n\n';
    const buckets: Record<SizeBucket, number> = { Small: 0, Medium: 0, Large: 0 };
    for (const d of datasets.slice(0, TREND_DATASETS)) {
      const bucket = sizeBucket(d.size);
      if (bucket) buckets[bucket]++;
    }
    for (const [bucket, count] of Object.entries(buckets)) {
      out += `- **${bucket} Datasets**: ${count} popular entries\n`;
    }
    return out;
  });
}
