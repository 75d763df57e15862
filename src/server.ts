#!/usr/bin/env node

import { createApp } from './app.js';
import { createArangoConnector } from './arango.js';
import { describeConfig, getConfig, log, logger, setLogLevel } from './config.js';
import { loadFileConfig } from './fileConfig.js';
import { parseHttpArgs } from './httpServer.js';
import { installShutdownHandlers } from './lifecycle.js';
import { HttpAdapter, StdioAdapter, type TransportAdapter } from './transports/index.js';

// Start the server
async function main() {
  const config = getConfig(loadFileConfig());
  setLogLevel(config.logLevel);
  log('Starting ArangoDB MCP Server', JSON.stringify(describeConfig(config)));

  const { registry, connection, kernel } = createApp({
    config,
    connector: createArangoConnector(config),
  });
  log(`Registered ${registry.size} tools (listing: ${config.toolset})`);

  // A failed startup connect is not fatal: dispatch retries lazily
  await connection.connectWithRetry(config.connectRetries, config.connectDelayMs);

  const { httpMode, port, authToken, host } = parseHttpArgs(process.argv);
  const adapter: TransportAdapter = httpMode ? new HttpAdapter() : new StdioAdapter();
  await adapter.start(kernel, { port, host, authToken, connection });

  installShutdownHandlers(async () => {
    await adapter.stop();
    await connection.shutdown();
  });
}

main().catch((error) => {
  logger.error('Fatal error:', error);
  process.exit(1);
});
