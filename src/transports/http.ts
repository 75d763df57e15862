// ============================================================================
// HTTP Transport Adapter
// ============================================================================
// Wraps httpServer.ts for remote agents: plain JSON routes plus a stateless
// MCP endpoint.
// ============================================================================

import { log } from '../config.js';
import type { ToolKernel } from '../kernel.js';
import type { TransportAdapter, TransportConfig } from './types.js';
import { startHttpServer, type HttpServerHandle } from '../httpServer.js';

export class HttpAdapter implements TransportAdapter {
  readonly name = 'http';
  private handle: HttpServerHandle | null = null;

  /** Bound port once started */
  get port(): number | undefined {
    return this.handle?.port;
  }

  async start(kernel: ToolKernel, config: TransportConfig): Promise<void> {
    this.handle = await startHttpServer(kernel, {
      port: config.port ?? 8787,
      host: config.host || '0.0.0.0',
      authToken: config.authToken,
      connection: config.connection,
    });
    log('HTTP transport started');
  }

  async stop(): Promise<void> {
    if (this.handle) {
      await this.handle.stop();
      this.handle = null;
    }
  }
}
