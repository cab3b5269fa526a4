// ============================================================================
// Platform Client Types
// ============================================================================
// The capability every facade operation calls into. Only the fields the
// facade reads or reshapes are typed precisely; the rest pass straight
// through the normalizer, so they stay `unknown`.
// ============================================================================

export type Timestamp = Date | string | null;

export interface CompetitionRecord {
  id: number | string;
  ref?: string;
  title?: string;
  url?: string;
  description?: string;
  category?: unknown;
  reward?: string;
  deadline?: Timestamp;
  enabledDate?: Timestamp;
  evaluationEndDate?: Timestamp;
  maxTeamSize?: number;
  evaluationMetric?: string;
  totalTeams?: number;
  userHasEntered?: boolean;
  tags?: unknown[];
}

export interface DatasetRecord {
  ref?: string;
  title?: string;
  subtitle?: string;
  description?: string;
  size?: number | string;
  lastUpdated?: Timestamp;
  downloadCount?: number;
  voteCount?: number;
  usabilityRating?: number;
  licenseName?: string;
  tags?: unknown[];
  url?: string;
}

export interface FileRecord {
  name: string;
  size?: number | string;
  creationDate?: Timestamp;
}

export interface ModelRecord {
  ref?: string;
  title?: string;
  subtitle?: string;
  author?: string;
  slug?: string;
  isPrivate?: boolean;
  description?: string;
  publishTime?: Timestamp;
  url?: string;
}

export interface CompetitionListOptions {
  search?: string;
  category?: string;
  sortBy?: string;
  page?: number;
}

export interface DatasetListOptions {
  search?: string;
  sortBy?: string;
  size?: string;
  fileType?: string;
  license?: string;
  tagIds?: string;
  user?: string;
  page?: number;
}

export interface ModelListOptions {
  search?: string;
  sortBy?: string;
  owner?: string;
  pageSize?: number;
  pageToken?: string;
}

interface DownloadOptions {
  /** Target directory; files land in `{path}/{slug}` */
  path: string;
  /** Overwrite files that already exist */
  force: boolean;
  /** Suppress progress logging */
  quiet: boolean;
}

export interface CompetitionDownloadOptions extends DownloadOptions {
  competition: string;
}

export interface CompetitionFileDownloadOptions extends CompetitionDownloadOptions {
  fileName: string;
}

interface DatasetTarget extends DownloadOptions {
  owner: string;
  dataset: string;
}

export interface DatasetDownloadOptions extends DatasetTarget {
  /** Extract the archive into `{path}/{dataset}` and remove it afterwards */
  unzip: boolean;
}

export interface DatasetFileDownloadOptions extends DatasetTarget {
  fileName: string;
}

/**
 * Already-authenticated client for the upstream data platform.
 */
export interface PlatformClient {
  listCompetitions(options?: CompetitionListOptions): Promise<CompetitionRecord[]>;
  competitionDownloadFile(options: CompetitionFileDownloadOptions): Promise<void>;
  competitionDownloadFiles(options: CompetitionDownloadOptions): Promise<void>;
  listDatasets(options?: DatasetListOptions): Promise<DatasetRecord[]>;
  viewDataset(owner: string, name: string): Promise<DatasetRecord>;
  listDatasetFiles(owner: string, name: string): Promise<FileRecord[]>;
  datasetDownloadFile(options: DatasetFileDownloadOptions): Promise<void>;
  datasetDownloadFiles(options: DatasetDownloadOptions): Promise<void>;
  listModels(options?: ModelListOptions): Promise<ModelRecord[]>;
}
