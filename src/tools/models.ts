import type { ModelRecord } from '../platform/types.js';
import type { OperationContext, OperationResponse } from './types.js';
import { cachedLoad, runOperation } from './shared/operation.js';
import { requireValid, validatePagination } from './shared/validation.js';

export interface ListModelsInput {
  search?: string;
  sort_by?: string;
  owner?: string;
  page?: number;
  page_size?: number;
}

const MODEL_URL = 'https://www.kaggle.com/models';

function summarize(model: ModelRecord): Record<string, unknown> {
  return {
    ref: model.ref,
    title: model.title,
    subtitle: model.subtitle,
    author: model.author,
    slug: model.slug,
    is_private: model.isPrivate,
    description: model.description,
    publish_time: model.publishTime,
    url: model.url || `${MODEL_URL}/${model.ref ?? ''}`,
  };
}

export function listModels(
  ctx: OperationContext,
  input: ListModelsInput
): Promise<OperationResponse> {
  const { pagination, cacheTtl } = ctx.config;
  const params = {
    search: input.search || undefined,
    sort_by: input.sort_by || 'hotness',
    owner: input.owner || undefined,
    page: input.page ?? 1,
    page_size: input.page_size ?? pagination.defaultPageSize,
  };

  return runOperation('list_models', async () => {
    requireValid(validatePagination(params.page, params.page_size, pagination.maxPageSize));

    return cachedLoad(ctx, 'list_models', params, cacheTtl.models, async () => {
      // The platform pages models by token; page numbers above 1 are sent as the token
      const models = await ctx.client.listModels({
        search: params.search,
        sortBy: params.sort_by,
        owner: params.owner,
        pageSize: params.page_size,
        pageToken: params.page > 1 ? String(params.page) : undefined,
      });

      return {
        models: models.map(summarize),
        total_count: models.length,
        page: params.page,
        page_size: params.page_size,
      };
    });
  });
}
