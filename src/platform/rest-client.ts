// ============================================================================
// Kaggle REST Client
// ============================================================================
// PlatformClient over the public Kaggle REST API. Credentials ride along as
// HTTP basic auth on every request; there is no login step.
// ============================================================================

import fs from 'fs';
import fsp from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import extractZip from 'extract-zip';
import { log, logDebug, type Credentials } from '../config.js';
import type {
  CompetitionDownloadOptions,
  CompetitionFileDownloadOptions,
  CompetitionListOptions,
  CompetitionRecord,
  DatasetDownloadOptions,
  DatasetFileDownloadOptions,
  DatasetListOptions,
  DatasetRecord,
  FileRecord,
  ModelListOptions,
  ModelRecord,
  PlatformClient,
  Timestamp,
} from './types.js';

export interface RestClientOptions {
  baseUrl: string;
  credentials?: Credentials;
  timeoutMs: number;
}

type Query = Record<string, string | number | undefined>;
type Json = Record<string, unknown>;

// ============================================================================
// Field Pickers
// ============================================================================

function isJson(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(raw: Json, field: string): string | undefined {
  const value = raw[field];
  return typeof value === 'string' ? value : undefined;
}

function count(raw: Json, field: string): number | undefined {
  const value = raw[field];
  return typeof value === 'number' ? value : undefined;
}

function flag(raw: Json, field: string): boolean | undefined {
  const value = raw[field];
  return typeof value === 'boolean' ? value : undefined;
}

/** Revive an ISO string into a Date; unparseable strings pass through as-is */
function timestamp(raw: Json, field: string): Timestamp | undefined {
  const value = raw[field];
  if (value === null) return null;
  if (typeof value !== 'string') return undefined;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? value : parsed;
}

function list(raw: Json, field: string): unknown[] | undefined {
  const value = raw[field];
  return Array.isArray(value) ? value : undefined;
}

function sizeOf(raw: Json): number | string | undefined {
  return count(raw, 'totalBytes') ?? count(raw, 'size') ?? text(raw, 'size');
}

export function toCompetition(raw: Json): CompetitionRecord {
  const id = raw.id;
  return {
    id: typeof id === 'number' || typeof id === 'string' ? id : String(raw.ref ?? ''),
    ref: text(raw, 'ref'),
    title: text(raw, 'title'),
    url: text(raw, 'url'),
    description: text(raw, 'description'),
    category: raw.category,
    reward: text(raw, 'reward'),
    deadline: timestamp(raw, 'deadline'),
    enabledDate: timestamp(raw, 'enabledDate'),
    evaluationEndDate: timestamp(raw, 'evaluationEndDate'),
    maxTeamSize: count(raw, 'maxTeamSize'),
    evaluationMetric: text(raw, 'evaluationMetric'),
    totalTeams: count(raw, 'totalTeams') ?? count(raw, 'teamCount'),
    userHasEntered: flag(raw, 'userHasEntered'),
    tags: list(raw, 'tags'),
  };
}

export function toDataset(raw: Json): DatasetRecord {
  return {
    ref: text(raw, 'ref'),
    title: text(raw, 'title'),
    subtitle: text(raw, 'subtitle'),
    description: text(raw, 'description'),
    size: sizeOf(raw),
    lastUpdated: timestamp(raw, 'lastUpdated'),
    downloadCount: count(raw, 'downloadCount'),
    voteCount: count(raw, 'voteCount'),
    usabilityRating: count(raw, 'usabilityRating'),
    licenseName: text(raw, 'licenseName'),
    tags: list(raw, 'tags'),
    url: text(raw, 'url'),
  };
}

/** Records without a name are not files we can report or download */
export function toFile(raw: Json): FileRecord | undefined {
  const name = text(raw, 'name') ?? text(raw, 'ref');
  if (!name) return undefined;
  return {
    name,
    size: sizeOf(raw),
    creationDate: timestamp(raw, 'creationDate'),
  };
}

export function toModel(raw: Json): ModelRecord {
  return {
    ref: text(raw, 'ref'),
    title: text(raw, 'title'),
    subtitle: text(raw, 'subtitle'),
    author: text(raw, 'author'),
    slug: text(raw, 'slug'),
    isPrivate: flag(raw, 'isPrivate'),
    description: text(raw, 'description'),
    publishTime: timestamp(raw, 'publishTime'),
    url: text(raw, 'url'),
  };
}

/** Pull the record array out of a bare array or a `{ [field]: [...] }` wrapper */
function records(body: unknown, field?: string): Json[] {
  const items = Array.isArray(body) ? body : field && isJson(body) ? body[field] : undefined;
  return Array.isArray(items) ? items.filter(isJson) : [];
}

// ============================================================================
// Client
// ============================================================================

export class KaggleRestClient implements PlatformClient {
  private readonly baseUrl: string;

  constructor(private readonly options: RestClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  async listCompetitions(options: CompetitionListOptions = {}): Promise<CompetitionRecord[]> {
    const body = await this.getJson('competitions/list', {
      search: options.search,
      category: options.category,
      sortBy: options.sortBy,
      page: options.page,
    });
    return records(body).map(toCompetition);
  }

  async competitionDownloadFile(options: CompetitionFileDownloadOptions): Promise<void> {
    const route = this.route('competitions/data/download', options.competition, options.fileName);
    await this.download(route, options.competition, options.fileName, options);
  }

  async competitionDownloadFiles(options: CompetitionDownloadOptions): Promise<void> {
    const route = this.route('competitions/data/download-all', options.competition);
    await this.download(route, options.competition, `${options.competition}.zip`, options);
  }

  async listDatasets(options: DatasetListOptions = {}): Promise<DatasetRecord[]> {
    const body = await this.getJson('datasets/list', {
      search: options.search,
      sortBy: options.sortBy,
      size: options.size,
      filetype: options.fileType,
      license: options.license,
      tagids: options.tagIds,
      user: options.user,
      page: options.page,
    });
    return records(body).map(toDataset);
  }

  async viewDataset(owner: string, name: string): Promise<DatasetRecord> {
    const body = await this.getJson(this.route('datasets/view', owner, name));
    if (!isJson(body)) {
      throw new Error(`Unexpected response for dataset ${owner}/${name}`);
    }
    return toDataset(body);
  }

  async listDatasetFiles(owner: string, name: string): Promise<FileRecord[]> {
    const body = await this.getJson(this.route('datasets/list', owner, name));
    return records(body, 'datasetFiles')
      .map(toFile)
      .filter((file): file is FileRecord => file !== undefined);
  }

  async datasetDownloadFile(options: DatasetFileDownloadOptions): Promise<void> {
    const route = this.route('datasets/download', options.owner, options.dataset, options.fileName);
    await this.download(route, options.dataset, options.fileName, options);
  }

  async datasetDownloadFiles(options: DatasetDownloadOptions): Promise<void> {
    const route = this.route('datasets/download', options.owner, options.dataset);
    const archive = await this.download(route, options.dataset, `${options.dataset}.zip`, options);
    if (options.unzip && archive) {
      await this.extract(archive, options);
    }
  }

  async listModels(options: ModelListOptions = {}): Promise<ModelRecord[]> {
    const body = await this.getJson('models/list', {
      search: options.search,
      sortBy: options.sortBy,
      owner: options.owner,
      pageSize: options.pageSize,
      pageToken: options.pageToken,
    });
    return records(body, 'models').map(toModel);
  }

  // --------------------------------------------------------------------------
  // HTTP plumbing
  // --------------------------------------------------------------------------

  private route(base: string, ...segments: string[]): string {
    return [base, ...segments.map(encodeURIComponent)].join('/');
  }

  private url(route: string, query: Query = {}): string {
    const url = new URL(`${this.baseUrl}/${route}`);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined && value !== '') {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    const creds = this.options.credentials;
    if (creds) {
      const token = Buffer.from(`${creds.username}:${creds.key}`).toString('base64');
      headers.Authorization = `Basic ${token}`;
    }
    return headers;
  }

  /**
   * Issue a GET and hand the response to `consume` while the timeout is still
   * armed. The timeout is an idle timeout: `keepAlive` restarts it, so a body
   * that keeps arriving is never cut off but a stalled one is.
   */
  private async request<T>(
    route: string,
    query: Query | undefined,
    consume: (res: Response, keepAlive: () => void) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    let timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const keepAlive = () => {
      clearTimeout(timeout);
      timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    };
    logDebug(`GET ${route}`);

    try {
      const res = await fetch(this.url(route, query), {
        headers: this.headers(),
        signal: controller.signal,
      });

      if (!res.ok) {
        const detail = await res.text().catch(() => '');
        throw new Error(`${res.status} ${res.statusText}${detail ? `: ${detail}` : ''}`);
      }
      return await consume(res, keepAlive);
    } catch (err) {
      if (controller.signal.aborted) {
        throw new Error(`Request timeout after ${this.options.timeoutMs}ms: ${route}`);
      }
      throw err;
    } finally {
      clearTimeout(timeout);
    }
  }

  private getJson(route: string, query?: Query): Promise<unknown> {
    return this.request(route, query, async (res): Promise<unknown> => res.json());
  }

  /**
   * Resolve `{path}/{slug}/{fileName}`, refusing anything that lands outside `path`.
   */
  private target(root: string, slug: string, fileName: string): { dir: string; file: string } {
    const base = path.resolve(root);
    const dir = path.resolve(base, slug);
    const file = path.resolve(dir, fileName);
    const rel = path.relative(base, file);
    if (!rel || rel.startsWith('..') || path.isAbsolute(rel)) {
      throw new Error(`Refusing to write outside ${base}: ${file}`);
    }
    return { dir, file };
  }

  /**
   * Stream a download to a temporary file and move it over the target once
   * complete. Returns the written path, or undefined when an existing file
   * was kept.
   */
  private async download(
    route: string,
    slug: string,
    fileName: string,
    options: { path: string; force: boolean; quiet: boolean }
  ): Promise<string | undefined> {
    const { dir, file } = this.target(options.path, slug, fileName);

    if (!options.force && fs.existsSync(file)) {
      if (!options.quiet) log(`${file} already exists, skipping (use force to overwrite)`);
      return undefined;
    }

    await fsp.mkdir(dir, { recursive: true });
    const partial = `${file}.part`;

    try {
      const bytes = await this.request(route, undefined, async (res, keepAlive) => {
        if (!res.body) {
          throw new Error(`Empty response body: ${route}`);
        }
        let written = 0;
        await pipeline(
          Readable.fromWeb(res.body),
          async function* (source: AsyncIterable<Uint8Array>) {
            for await (const chunk of source) {
              keepAlive();
              written += chunk.byteLength;
              yield chunk;
            }
          },
          fs.createWriteStream(partial)
        );
        return written;
      });
      await fsp.rename(partial, file);
      if (!options.quiet) log(`Downloaded ${file} (${bytes} bytes)`);
      return file;
    } catch (err) {
      await fsp.rm(partial, { force: true });
      throw err;
    }
  }

  /**
   * Unpack a dataset archive beside itself and delete it.
   */
  private async extract(archive: string, options: { quiet: boolean }): Promise<void> {
    const dir = path.dirname(archive);
    await extractZip(archive, { dir });
    await fsp.rm(archive, { force: true });
    if (!options.quiet) log(`Extracted ${archive} into ${dir}`);
  }
}
