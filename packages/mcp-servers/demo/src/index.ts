#!/usr/bin/env node
/**
 * MCP Demo Server (stdio transport)
 *
 * Greeting and calculator tools plus a product listing resource backed by SQLite.
 *
 * Environment variables:
 * - DB_PATH: SQLite database path (default: test.db)
 * - LOG_LEVEL: debug | info | warn | error (default: info)
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createLogger } from '@mcp-demo/shared';
import { loadConfig } from './config.js';
import { createDemoServer } from './server-setup.js';
import { ProductStore } from './storage.js';

async function main() {
  const config = loadConfig();
  const logger = createLogger('mcp-demo', config.logLevel);

  logger.info(`Database: ${config.dbPath}`);

  // Connection and migration failures are fatal
  const store = new ProductStore({ dbPath: config.dbPath, logger: logger.child('product-store') });

  try {
    store.seedIfEmpty();
  } catch (error) {
    logger.warn('Warning: Database seeding failed:', error);
  }

  const server = createDemoServer({ store, logger });
  server.onclose = () => {
    store.close();
  };

  logger.info('Starting MCP server...');
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('Server started');
}

main().catch((error) => {
  console.error('[mcp-demo] Fatal error:', error);
  process.exit(1);
});
