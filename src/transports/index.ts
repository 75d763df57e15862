// Both adapters expose the same kernel; server.ts picks one per process.
export type { TransportAdapter, TransportConfig } from './types.js';
export { createMcpServer, SERVER_NAME, SERVER_VERSION } from './mcp.js';
export { StdioAdapter } from './stdio.js';
export { HttpAdapter } from './http.js';
