import path from 'path';
import { ensureDownloadDirectory, getDownloadPath } from '../config.js';
import type { CompetitionRecord } from '../platform/types.js';
import type { OperationContext, OperationResponse } from './types.js';
import { listFiles } from './shared/files.js';
import { cachedLoad, runOperation, uncachedLoad } from './shared/operation.js';
import {
  filterValue,
  requireValid,
  sanitizeFileName,
  validateIdentifier,
  validatePagination,
} from './shared/validation.js';

// ============================================================================
// Types
// ============================================================================

export interface ListCompetitionsInput {
  search?: string;
  category?: string;
  sort_by?: string;
  page?: number;
  page_size?: number;
}

export interface GetCompetitionDetailsInput {
  competition_id: string;
}

export interface DownloadCompetitionFilesInput {
  competition_id: string;
  download_path?: string;
  file_name?: string;
  force?: boolean;
  quiet?: boolean;
}

const COMPETITION_URL = 'https://www.kaggle.com/competitions';

// ============================================================================
// Helpers
// ============================================================================

function competitionUrl(comp: CompetitionRecord): string {
  return comp.url || `${COMPETITION_URL}/${comp.ref ?? comp.id}`;
}

function summarize(comp: CompetitionRecord): Record<string, unknown> {
  return {
    id: comp.id,
    ref: comp.ref,
    title: comp.title,
    url: competitionUrl(comp),
    description: comp.description,
    category: comp.category,
    reward: comp.reward,
    deadline: comp.deadline,
    max_team_size: comp.maxTeamSize,
    evaluation_metric: comp.evaluationMetric,
    total_teams: comp.totalTeams,
    user_has_entered: comp.userHasEntered,
  };
}

/**
 * Does this record answer to the identifier? Matches numeric id, ref, or the
 * last path segment of its URL.
 */
export function matchesCompetition(comp: CompetitionRecord, identifier: string): boolean {
  if (String(comp.id) === identifier) return true;
  if (comp.ref === identifier) return true;
  return Boolean(comp.url && comp.url.replace(/\/+$/, '').endsWith(`/${identifier}`));
}

// ============================================================================
// Operations
// ============================================================================

export function listCompetitions(
  ctx: OperationContext,
  input: ListCompetitionsInput
): Promise<OperationResponse> {
  const { pagination, cacheTtl } = ctx.config;
  const params = {
    search: input.search || undefined,
    category: filterValue(input.category),
    sort_by: input.sort_by || 'latestDeadline',
    page: input.page ?? 1,
    page_size: input.page_size ?? pagination.defaultPageSize,
  };

  return runOperation('list_competitions', async () => {
    requireValid(validatePagination(params.page, params.page_size, pagination.maxPageSize));

    return cachedLoad(ctx, 'list_competitions', params, cacheTtl.competitions, async () => {
      const competitions = await ctx.client.listCompetitions({
        search: params.search,
        category: params.category,
        sortBy: params.sort_by,
        page: params.page,
      });
      const pageItems = competitions.slice(0, params.page_size);

      return {
        competitions: pageItems.map(summarize),
        total_count: competitions.length,
        page: params.page,
        page_size: params.page_size,
      };
    });
  });
}

export function getCompetitionDetails(
  ctx: OperationContext,
  input: GetCompetitionDetailsInput
): Promise<OperationResponse> {
  return runOperation('get_competition_details', async () => {
    const competitionId = input.competition_id.trim();
    requireValid(validateIdentifier(competitionId, 'Competition ID'));

    const params = { competition_id: competitionId };
    return cachedLoad(ctx, 'get_competition_details', params, ctx.config.cacheTtl.competitions, async () => {
      const competitions = await ctx.client.listCompetitions({ search: competitionId });
      const competition = competitions.find(c => matchesCompetition(c, competitionId));
      if (!competition) {
        throw new Error(`404 Not Found: competition "${competitionId}"`);
      }

      return {
        ...summarize(competition),
        tags: competition.tags ?? [],
        timeline: {
          start_date: competition.enabledDate,
          deadline: competition.deadline,
          evaluation_end_date: competition.evaluationEndDate,
        },
      };
    });
  });
}

/**
 * Download one file or the whole archive. Always hits the platform.
 */
export function downloadCompetitionFiles(
  ctx: OperationContext,
  input: DownloadCompetitionFilesInput
): Promise<OperationResponse> {
  const downloadPath = getDownloadPath(ctx.config, input.download_path);
  const force = input.force ?? false;
  const quiet = input.quiet ?? true;

  return runOperation('download_competition_files', async () => {
    const competitionId = input.competition_id.trim();
    requireValid(validateIdentifier(competitionId, 'Competition ID'));

    return uncachedLoad(async () => {
      const targetDir = await ensureDownloadDirectory(downloadPath);

      let downloadedFiles: string[];
      if (input.file_name) {
        const fileName = sanitizeFileName(input.file_name);
        await ctx.client.competitionDownloadFile({
          competition: competitionId,
          fileName,
          path: targetDir,
          force,
          quiet,
        });
        downloadedFiles = [fileName];
      } else {
        await ctx.client.competitionDownloadFiles({
          competition: competitionId,
          path: targetDir,
          force,
          quiet,
        });
        downloadedFiles = await listFiles(path.join(targetDir, competitionId));
      }

      return {
        competition_id: competitionId,
        download_path: targetDir,
        downloaded_files: downloadedFiles,
        total_files: downloadedFiles.length,
      };
    });
  });
}
