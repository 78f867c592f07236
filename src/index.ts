#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { BoardCache } from './cache.js';
import { MondayClient } from './monday-client.js';
import { BoardOperations } from './board-operations.js';
import { createServer, SERVER_NAME, SERVER_VERSION, tools } from './server.js';
import { logger } from './logging/index.js';

// ============================================
// START SERVER
// ============================================

async function main() {
  const config = loadConfig();

  const client = new MondayClient({
    apiUrl: config.MONDAY_API_URL,
    apiKey: config.MONDAY_API_KEY,
    apiVersion: config.MONDAY_API_VERSION,
    timeoutMs: config.MONDAY_REQUEST_TIMEOUT_MS,
    maxConcurrent: config.MONDAY_MAX_CONCURRENT_REQUESTS,
  });
  const cache = new BoardCache();
  const operations = new BoardOperations(client, cache, config.MONDAY_BOARD_ID, {
    maxItems: config.MONDAY_ITEMS_LIMIT,
    pageSize: config.MONDAY_ITEMS_PAGE_SIZE,
  });

  const server = createServer({
    operations,
    cache,
    client,
    settings: {
      api_url: config.MONDAY_API_URL,
      api_version: config.MONDAY_API_VERSION,
      max_concurrent_requests: config.MONDAY_MAX_CONCURRENT_REQUESTS,
      request_timeout_ms: config.MONDAY_REQUEST_TIMEOUT_MS,
      items_limit: config.MONDAY_ITEMS_LIMIT,
      items_page_size: config.MONDAY_ITEMS_PAGE_SIZE,
    },
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`${SERVER_NAME} started`, {
    version: SERVER_VERSION,
    board_id: config.MONDAY_BOARD_ID,
    tools: tools.length,
    logging_enabled: logger.getConfig().enabled,
  }, 'main');
  console.error(`${SERVER_NAME} v${SERVER_VERSION} running on stdio`);
  console.error(`- Board: ${config.MONDAY_BOARD_ID}`);
  console.error(`- Tools: ${tools.length} available`);
  console.error('- Resources: Enabled (schema, columns, items, metadata, column_types)');
  console.error('- Cache: 5 minute freshness window, cleared on writes');
  console.error('- Logging: Runtime control available via set_log_level');
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
