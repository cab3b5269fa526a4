import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  ensureDownloadDirectory,
  getConfig,
  getDownloadPath,
  hasCredentials,
  loadCredentials,
  loadSettings,
  log,
  logError,
  logWarning,
} from '../../src/config.js';

describe('Config', () => {
  const originalEnv = { ...process.env };
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'kaggle-mcp-config-'));
    delete process.env.KAGGLE_MCP_ENV;
    delete process.env.KAGGLE_USERNAME;
    delete process.env.KAGGLE_KEY;
    delete process.env.KAGGLE_DOWNLOAD_PATH;
    delete process.env.KAGGLE_API_BASE_URL;
    delete process.env.KAGGLE_REQUEST_TIMEOUT_MS;
    delete process.env.LOG_LEVEL;
    process.env.KAGGLE_CONFIG_DIR = tempDir;
    process.env.KAGGLE_MCP_CONFIG = path.join(tempDir, 'config.yaml');
  });

  afterEach(async () => {
    // Restore original env
    process.env = { ...originalEnv };
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('getConfig', () => {
    it('should return default values when env vars are not set', () => {
      const config = getConfig();

      expect(config.env).toBe('dev');
      expect(config.logLevel).toBe('INFO');
      expect(config.apiBaseUrl).toBe('https://www.kaggle.com/api/v1');
      expect(config.requestTimeoutMs).toBe(30000);
      expect(config.downloadPath).toBe('./kaggle_data');
      expect(config.credentials).toBeUndefined();
      expect(config.pagination).toEqual({ defaultPageSize: 20, maxPageSize: 100 });
      expect(config.cacheTtl).toEqual({ competitions: 3600, datasets: 21600, models: 21600 });
    });

    it('should read overrides from the environment', () => {
      process.env.KAGGLE_MCP_ENV = 'production';
      process.env.LOG_LEVEL = 'debug';
      process.env.KAGGLE_API_BASE_URL = 'http://localhost:9999/api/v1';
      process.env.KAGGLE_REQUEST_TIMEOUT_MS = '5000';
      process.env.KAGGLE_DOWNLOAD_PATH = '/data/kaggle';

      const config = getConfig();

      expect(config.env).toBe('production');
      expect(config.logLevel).toBe('DEBUG');
      expect(config.apiBaseUrl).toBe('http://localhost:9999/api/v1');
      expect(config.requestTimeoutMs).toBe(5000);
      expect(config.downloadPath).toBe('/data/kaggle');
    });

    it('should ignore an unknown log level and a bad timeout', () => {
      process.env.LOG_LEVEL = 'chatty';
      process.env.KAGGLE_REQUEST_TIMEOUT_MS = 'soon';

      const config = getConfig();

      expect(config.logLevel).toBe('INFO');
      expect(config.requestTimeoutMs).toBe(30000);
    });
  });

  describe('loadSettings', () => {
    it('should merge the settings file with defaults', async () => {
      await fs.writeFile(
        path.join(tempDir, 'config.yaml'),
        'pagination:\n  default_page_size: 10\ncache_ttl:\n  competitions: 60\n  models: -5\n'
      );

      expect(loadSettings()).toEqual({
        pagination: { defaultPageSize: 10, maxPageSize: 100 },
        cacheTtl: { competitions: 60, datasets: 21600, models: 21600 },
      });
    });

    it('should fall back to defaults for a malformed file', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      await fs.writeFile(path.join(tempDir, 'config.yaml'), 'pagination: [unclosed\n');

      expect(loadSettings().pagination).toEqual({ defaultPageSize: 20, maxPageSize: 100 });
    });

    it('should fall back to defaults when the file is not a mapping', async () => {
      await fs.writeFile(path.join(tempDir, 'config.yaml'), '- just\n- a list\n');

      expect(loadSettings().cacheTtl.datasets).toBe(21600);
    });
  });

  describe('credentials', () => {
    it('should prefer environment variables', () => {
      process.env.KAGGLE_USERNAME = 'test-user';
      process.env.KAGGLE_KEY = 'test-secret';

      expect(loadCredentials()).toEqual({ username: 'test-user', key: 'test-secret' });
      expect(hasCredentials()).toBe(true);
    });

    it('should read kaggle.json from the config directory', async () => {
      await fs.writeFile(
        path.join(tempDir, 'kaggle.json'),
        JSON.stringify({ username: 'file-user', key: 'test-secret' })
      );

      expect(loadCredentials()).toEqual({ username: 'file-user', key: 'test-secret' });
    });

    it('should return undefined when kaggle.json lacks a key', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      await fs.writeFile(path.join(tempDir, 'kaggle.json'), JSON.stringify({ username: 'file-user' }));

      expect(loadCredentials()).toBeUndefined();
    });

    it('should report missing credentials', () => {
      expect(hasCredentials()).toBe(false);
    });
  });

  describe('download paths', () => {
    it('should prefer a custom path', () => {
      const config = getConfig();

      expect(getDownloadPath(config)).toBe('./kaggle_data');
      expect(getDownloadPath(config, '/tmp/custom')).toBe('/tmp/custom');
    });

    it('should create nested download directories', async () => {
      const target = path.join(tempDir, 'a', 'b');

      const resolved = await ensureDownloadDirectory(target);

      expect(resolved).toBe(path.resolve(target));
      const stat = await fs.stat(target);
      expect(stat.isDirectory()).toBe(true);
    });
  });

  describe('logging', () => {
    it('should prefix messages with the server name and level', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

      log('Test message', 'extra');

      expect(spy).toHaveBeenCalledWith('[kaggle-facade-mcp] INFO Test message', 'extra');
    });

    it('should drop messages below LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'WARNING';
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

      log('quiet');
      logWarning('loud');
      logError('louder');

      expect(spy).toHaveBeenCalledTimes(2);
      expect(spy).toHaveBeenNthCalledWith(1, '[kaggle-facade-mcp] WARNING loud');
      expect(spy).toHaveBeenNthCalledWith(2, '[kaggle-facade-mcp] ERROR louder');
    });
  });
});
