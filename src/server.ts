#!/usr/bin/env node

import 'dotenv/config';
import { getConfig, log, logError, logWarning } from './config.js';
import { KaggleRestClient } from './platform/rest-client.js';
import { createOperationContext } from './tools/shared/index.js';
import { StdioAdapter } from './transports/index.js';

const config = getConfig();

log('Starting Kaggle facade MCP server');
log(`Environment: ${config.env}`);
log(`API: ${config.apiBaseUrl}`);
log(`Download directory: ${config.downloadPath}`);

if (!config.credentials) {
  logWarning(
    'No Kaggle credentials found. Set KAGGLE_USERNAME and KAGGLE_KEY or create ~/.kaggle/kaggle.json; ' +
    'upstream calls will fail with authentication errors.'
  );
}

// One client and one cache for the life of the process
const ctx = createOperationContext({
  client: new KaggleRestClient({
    baseUrl: config.apiBaseUrl,
    credentials: config.credentials,
    timeoutMs: config.requestTimeoutMs,
  }),
  config,
});

const adapter = new StdioAdapter();

async function main() {
  await adapter.start(ctx);

  const shutdown = () => {
    adapter.stop()
      .then(() => process.exit(0))
      .catch((err) => {
        logError('Error during shutdown:', err);
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  logError('Fatal error:', error);
  process.exit(1);
});
