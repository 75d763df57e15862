// ============================================================================
// Application Assembly
// ============================================================================
// Wires registry, connection manager and kernel together. server.ts calls
// this with the ArangoDB connector; tests pass a fake one.
// ============================================================================

import type { Connector } from './arango.js';
import type { Config } from './config.js';
import { logger } from './config.js';
import { ConnectionManager } from './connection.js';
import { createKernel, type ToolKernel } from './kernel.js';
import { allTools } from './tools/index.js';
import { buildRegistry, type ToolRegistry } from './tools/registry.js';
import type { ToolSpec } from './tools/types.js';

export interface App {
  registry: ToolRegistry;
  connection: ConnectionManager;
  kernel: ToolKernel;
}

export interface AppOptions {
  config: Pick<Config, 'toolset' | 'baselineCount'>;
  connector: Connector;
  tools?: readonly ToolSpec[];
}

export function createApp(options: AppOptions): App {
  const registry = buildRegistry(options.tools ?? allTools);
  const connection = new ConnectionManager(options.connector);
  const kernel = createKernel({
    registry,
    connection,
    listing: { toolset: options.config.toolset, baselineCount: options.config.baselineCount },
  });

  kernel.on('result', evt => {
    logger.debug(`Tool ${evt.tool} completed in ${evt.duration_ms ?? 0}ms`);
  });

  return { registry, connection, kernel };
}
