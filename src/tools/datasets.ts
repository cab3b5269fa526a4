import path from 'path';
import { ensureDownloadDirectory, getDownloadPath } from '../config.js';
import type { DatasetRecord, FileRecord } from '../platform/types.js';
import type { OperationContext, OperationResponse } from './types.js';
import { listFiles } from './shared/files.js';
import { cachedLoad, runOperation, uncachedLoad } from './shared/operation.js';
import {
  filterValue,
  requireReference,
  requireValid,
  sanitizeFileName,
  validatePagination,
} from './shared/validation.js';

// ============================================================================
// Types
// ============================================================================

export interface SearchDatasetsInput {
  search?: string;
  sort_by?: string;
  size?: string;
  file_type?: string;
  license_name?: string;
  tag_ids?: string;
  user?: string;
  page?: number;
  page_size?: number;
}

export interface GetDatasetDetailsInput {
  dataset_ref: string;
}

export interface DownloadDatasetInput {
  dataset_ref: string;
  download_path?: string;
  file_name?: string;
  force?: boolean;
  quiet?: boolean;
  unzip?: boolean;
}

const DATASET_URL = 'https://www.kaggle.com/datasets';

// ============================================================================
// Helpers
// ============================================================================

function datasetUrl(dataset: DatasetRecord): string {
  return dataset.url || `${DATASET_URL}/${dataset.ref ?? ''}`;
}

function summarize(dataset: DatasetRecord): Record<string, unknown> {
  return {
    ref: dataset.ref,
    title: dataset.title,
    size: dataset.size,
    last_updated: dataset.lastUpdated,
    download_count: dataset.downloadCount,
    vote_count: dataset.voteCount,
    usability_rating: dataset.usabilityRating,
    license_name: dataset.licenseName,
    tags: dataset.tags ?? [],
    url: datasetUrl(dataset),
  };
}

function describeFile(file: FileRecord): Record<string, unknown> {
  return {
    name: file.name,
    size: file.size,
    creation_date: file.creationDate,
  };
}

// ============================================================================
// Operations
// ============================================================================

export function searchDatasets(
  ctx: OperationContext,
  input: SearchDatasetsInput
): Promise<OperationResponse> {
  const { pagination, cacheTtl } = ctx.config;
  const params = {
    search: input.search || undefined,
    sort_by: input.sort_by || 'hottest',
    size: filterValue(input.size),
    file_type: filterValue(input.file_type),
    license_name: filterValue(input.license_name),
    tag_ids: input.tag_ids || undefined,
    user: input.user || undefined,
    page: input.page ?? 1,
    page_size: input.page_size ?? pagination.defaultPageSize,
  };

  return runOperation('search_datasets', async () => {
    requireValid(validatePagination(params.page, params.page_size, pagination.maxPageSize));

    return cachedLoad(ctx, 'search_datasets', params, cacheTtl.datasets, async () => {
      const datasets = await ctx.client.listDatasets({
        search: params.search,
        sortBy: params.sort_by,
        size: params.size,
        fileType: params.file_type,
        license: params.license_name,
        tagIds: params.tag_ids,
        user: params.user,
        page: params.page,
      });
      const pageItems = datasets.slice(0, params.page_size);

      return {
        datasets: pageItems.map(summarize),
        total_count: datasets.length,
        page: params.page,
        page_size: params.page_size,
      };
    });
  });
}

export function getDatasetDetails(
  ctx: OperationContext,
  input: GetDatasetDetailsInput
): Promise<OperationResponse> {
  return runOperation('get_dataset_details', async () => {
    const { owner, name } = requireReference(input.dataset_ref);

    const params = { dataset_ref: input.dataset_ref };
    return cachedLoad(ctx, 'get_dataset_details', params, ctx.config.cacheTtl.datasets, async () => {
      const [dataset, files] = await Promise.all([
        ctx.client.viewDataset(owner, name),
        ctx.client.listDatasetFiles(owner, name),
      ]);

      return {
        ...summarize(dataset),
        subtitle: dataset.subtitle,
        description: dataset.description,
        files: files.map(describeFile),
      };
    });
  });
}

/**
 * Download one file or the whole dataset archive, extracted unless `unzip`
 * is false. Always hits the platform.
 */
export function downloadDataset(
  ctx: OperationContext,
  input: DownloadDatasetInput
): Promise<OperationResponse> {
  const downloadPath = getDownloadPath(ctx.config, input.download_path);
  const force = input.force ?? false;
  const quiet = input.quiet ?? true;
  const unzip = input.unzip ?? true;

  return runOperation('download_dataset', async () => {
    const { owner, name } = requireReference(input.dataset_ref);

    return uncachedLoad(async () => {
      const targetDir = await ensureDownloadDirectory(downloadPath);

      let downloadedFiles: string[];
      if (input.file_name) {
        const fileName = sanitizeFileName(input.file_name);
        await ctx.client.datasetDownloadFile({
          owner,
          dataset: name,
          fileName,
          path: targetDir,
          force,
          quiet,
        });
        downloadedFiles = [fileName];
      } else {
        await ctx.client.datasetDownloadFiles({
          owner,
          dataset: name,
          path: targetDir,
          force,
          quiet,
          unzip,
        });
        downloadedFiles = await listFiles(path.join(targetDir, name));
      }

      return {
        dataset_ref: input.dataset_ref,
        download_path: targetDir,
        downloaded_files: downloadedFiles,
        total_files: downloadedFiles.length,
      };
    });
  });
}
