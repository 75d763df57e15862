// ============================================================================
// Stdio Transport
// ============================================================================
// The default transport: an MCP client spawns the server and talks JSON-RPC
// over stdin/stdout. Logs stay on stderr.
// ============================================================================

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { log } from '../config.js';
import type { ToolKernel } from '../kernel.js';
import type { TransportAdapter, TransportConfig } from './types.js';
import { createMcpServer } from './mcp.js';

export class StdioAdapter implements TransportAdapter {
  readonly name = 'stdio';
  private server: Server | null = null;

  /** Network options in the config do not apply to stdio. */
  async start(kernel: ToolKernel, _config: TransportConfig): Promise<void> {
    const server = createMcpServer(kernel);
    await server.connect(new StdioServerTransport());
    this.server = server;

    const listed = kernel.listTools().length;
    const hidden = kernel.toolCount - listed;
    log(`stdio: serving ${listed} ArangoDB tools${hidden > 0 ? ` (${hidden} callable but unlisted)` : ''}`);
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    await server?.close();
  }
}
