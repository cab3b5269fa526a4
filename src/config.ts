import fs from 'fs';
import fsp from 'fs/promises';
import os from 'os';
import path from 'path';
import YAML from 'yaml';

// ============================================================================
// Config Schema
// ============================================================================

export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export interface Credentials {
  username: string;
  key: string;
}

export interface PaginationSettings {
  defaultPageSize: number;
  maxPageSize: number;
}

/** Cache TTLs in seconds, one per result category */
export interface CacheTtlSettings {
  competitions: number;
  datasets: number;
  models: number;
}

export interface Config {
  env: string;
  logLevel: LogLevel;
  apiBaseUrl: string;
  requestTimeoutMs: number;
  downloadPath: string;
  credentials?: Credentials;
  pagination: PaginationSettings;
  cacheTtl: CacheTtlSettings;
}

export const SERVER_NAME = 'kaggle-facade-mcp';
export const SERVER_VERSION = '0.1.0';

const DEFAULT_PAGINATION: PaginationSettings = {
  defaultPageSize: 20,
  maxPageSize: 100,
};

const DEFAULT_CACHE_TTL: CacheTtlSettings = {
  competitions: 3600,
  datasets: 21600,
  models: 21600,
};

const LOG_LEVELS: LogLevel[] = ['DEBUG', 'INFO', 'WARNING', 'ERROR'];

// ============================================================================
// Settings File (YAML)
// ============================================================================

interface SettingsFile {
  pagination?: {
    default_page_size?: unknown;
    max_page_size?: unknown;
  };
  cache_ttl?: {
    competitions?: unknown;
    datasets?: unknown;
    models?: unknown;
  };
}

function settingsPath(): string {
  return process.env.KAGGLE_MCP_CONFIG || path.join(os.homedir(), '.kaggle-mcp', 'config.yaml');
}

function positiveNumber(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load pagination and cache settings from the YAML settings file, merged with defaults.
 * Returns defaults if the file doesn't exist or is invalid.
 */
export function loadSettings(): { pagination: PaginationSettings; cacheTtl: CacheTtlSettings } {
  const defaults = { pagination: { ...DEFAULT_PAGINATION }, cacheTtl: { ...DEFAULT_CACHE_TTL } };
  const file = settingsPath();
  if (!fs.existsSync(file)) {
    return defaults;
  }

  try {
    const parsed: unknown = YAML.parse(fs.readFileSync(file, 'utf-8'));
    if (!isRecord(parsed)) return defaults;
    const settings: SettingsFile = parsed;

    return {
      pagination: {
        defaultPageSize: positiveNumber(settings.pagination?.default_page_size, DEFAULT_PAGINATION.defaultPageSize),
        maxPageSize: positiveNumber(settings.pagination?.max_page_size, DEFAULT_PAGINATION.maxPageSize),
      },
      cacheTtl: {
        competitions: positiveNumber(settings.cache_ttl?.competitions, DEFAULT_CACHE_TTL.competitions),
        datasets: positiveNumber(settings.cache_ttl?.datasets, DEFAULT_CACHE_TTL.datasets),
        models: positiveNumber(settings.cache_ttl?.models, DEFAULT_CACHE_TTL.models),
      },
    };
  } catch (err) {
    logError(`Failed to parse settings file ${file}, using defaults: ${err}`);
    return defaults;
  }
}

// ============================================================================
// Credentials
// ============================================================================

function credentialsFilePath(): string {
  const dir = process.env.KAGGLE_CONFIG_DIR || path.join(os.homedir(), '.kaggle');
  return path.join(dir, 'kaggle.json');
}

/**
 * Resolve API credentials: KAGGLE_USERNAME/KAGGLE_KEY first, then kaggle.json.
 */
export function loadCredentials(): Credentials | undefined {
  const username = process.env.KAGGLE_USERNAME;
  const key = process.env.KAGGLE_KEY;
  if (username && key) {
    return { username, key };
  }

  const file = credentialsFilePath();
  if (!fs.existsSync(file)) {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    if (isRecord(parsed) && typeof parsed.username === 'string' && typeof parsed.key === 'string') {
      return { username: parsed.username, key: parsed.key };
    }
    logError(`${file} is missing "username" or "key"`);
  } catch (err) {
    logError(`Failed to read ${file}: ${err}`);
  }
  return undefined;
}

export function hasCredentials(): boolean {
  return loadCredentials() !== undefined;
}

// ============================================================================
// Config
// ============================================================================

function parseLogLevel(value: string | undefined): LogLevel {
  const upper = (value || 'INFO').toUpperCase();
  const level = LOG_LEVELS.find(l => l === upper);
  return level ?? 'INFO';
}

export function getConfig(): Config {
  const settings = loadSettings();
  const timeout = Number(process.env.KAGGLE_REQUEST_TIMEOUT_MS);

  return {
    env: process.env.KAGGLE_MCP_ENV || 'dev',
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
    apiBaseUrl: process.env.KAGGLE_API_BASE_URL || 'https://www.kaggle.com/api/v1',
    requestTimeoutMs: Number.isFinite(timeout) && timeout > 0 ? timeout : 30_000,
    downloadPath: process.env.KAGGLE_DOWNLOAD_PATH || './kaggle_data',
    credentials: loadCredentials(),
    pagination: settings.pagination,
    cacheTtl: settings.cacheTtl,
  };
}

/**
 * Get the download path, with optional custom override
 */
export function getDownloadPath(config: Config, customPath?: string): string {
  return customPath || config.downloadPath;
}

/**
 * Create the download directory (and parents) if missing.
 */
export async function ensureDownloadDirectory(dir: string): Promise<string> {
  const resolved = path.resolve(dir);
  await fsp.mkdir(resolved, { recursive: true });
  return resolved;
}

// ============================================================================
// Logging
// ============================================================================
// stdout carries the MCP protocol, so everything goes to stderr.

function enabled(level: LogLevel): boolean {
  const threshold = parseLogLevel(process.env.LOG_LEVEL);
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

function write(level: LogLevel, message: string, args: unknown[]): void {
  if (!enabled(level)) return;
  console.error(`[${SERVER_NAME}] ${level} ${message}`, ...args);
}

export function logDebug(message: string, ...args: unknown[]): void {
  write('DEBUG', message, args);
}

export function log(message: string, ...args: unknown[]): void {
  write('INFO', message, args);
}

export function logWarning(message: string, ...args: unknown[]): void {
  write('WARNING', message, args);
}

export function logError(message: string, ...args: unknown[]): void {
  write('ERROR', message, args);
}
