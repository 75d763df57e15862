import type { ConnectionManager } from '../connection.js';
import type { ToolKernel } from '../kernel.js';

/** Options for HttpAdapter. StdioAdapter takes none of them. */
export interface TransportConfig {
  /** Defaults to 8787; 0 binds a free port */
  port?: number;
  host?: string;
  /** Bearer token required on every route except /health */
  authToken?: string;
  /** Its status() is reported by GET /health */
  connection?: Pick<ConnectionManager, 'status'>;
}

/** How server.ts starts and stops whichever transport the CLI flags select. */
export interface TransportAdapter {
  readonly name: string;
  start(kernel: ToolKernel, config: TransportConfig): Promise<void>;
  stop(): Promise<void>;
}
