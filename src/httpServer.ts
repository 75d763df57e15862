/**
 * HTTP Server Mode for the ArangoDB MCP server
 *
 * Exposes the tool kernel over HTTP for remote agents.
 *
 * Usage:
 *   node dist/src/server.js --http --port 8787
 *   node dist/src/server.js --http --port 8787 --auth-token YOUR_SECRET
 *
 * Endpoints:
 *   GET  /health              - Health check with database connection status
 *   GET  /tools               - List available tools
 *   POST /call                - Execute any tool: { tool: string, arguments: object }
 *   POST /mcp                 - Full MCP protocol endpoint (stateless; GET/DELETE answer 405)
 *
 * /call responses use a status envelope:
 *   { "status": "executed", "tool": "...", "result": ... }
 *   { "status": "error", "tool": "...", "result": { "error": "...", "type": "..." } }
 */

import { createServer, IncomingMessage, ServerResponse } from 'http';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { log, logger } from './config.js';
import type { ConnectionManager } from './connection.js';
import { errorMessage } from './errors.js';
import { renderResult, type ToolKernel } from './kernel.js';
import { isRecord } from './tools/shared/index.js';
import { createMcpServer, SERVER_NAME, SERVER_VERSION } from './transports/mcp.js';

// ============================================================================
// Status Envelope Types
// ============================================================================

interface StatusEnvelope {
  status: 'ok' | 'executed' | 'error';
  [key: string]: unknown;
}

interface ErrorEnvelope extends StatusEnvelope {
  status: 'error';
  error: string;
  code?: string;
}

// ============================================================================
// Response Helpers
// ============================================================================

function wrapError(error: string, code?: string): ErrorEnvelope {
  return { status: 'error', error, ...(code && { code }) };
}

function sendJson(res: ServerResponse, statusCode: number, data: StatusEnvelope | Record<string, unknown>): void {
  res.writeHead(statusCode, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

/**
 * Parse JSON body from request. An empty body is {}.
 */
async function parseBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.on('data', (chunk) => { body += chunk; });
    req.on('end', () => {
      try {
        const parsed: unknown = body ? JSON.parse(body) : {};
        resolve(parsed);
      } catch {
        reject(new Error('Invalid JSON'));
      }
    });
    req.on('error', reject);
  });
}

// ============================================================================
// Server
// ============================================================================

export interface HttpServerOptions {
  port: number;
  authToken?: string;
  host?: string;
  /** Reported by GET /health when given */
  connection?: Pick<ConnectionManager, 'status'>;
}

export interface HttpServerHandle {
  /** Bound port; differs from the requested one when that was 0 */
  port: number;
  stop(): Promise<void>;
}

/**
 * POST /call: run one tool through the kernel. Failures come back as 400
 * with the same error object the MCP envelope carries.
 */
async function handleCall(kernel: ToolKernel, req: IncomingMessage, res: ServerResponse): Promise<void> {
  let body: unknown;
  try {
    body = await parseBody(req);
  } catch (error) {
    sendJson(res, 400, wrapError(errorMessage(error), 'PARSE_ERROR'));
    return;
  }

  if (!isRecord(body) || typeof body.tool !== 'string' || body.tool === '') {
    sendJson(res, 400, wrapError("Request body must include a 'tool' name", 'MISSING_TOOL'));
    return;
  }

  const tool = body.tool;
  log(`HTTP: /call ${tool}`);
  const result = await kernel.dispatch(tool, body.arguments ?? {});
  const { failed, envelope } = renderResult(result, tool);
  const payload: unknown = JSON.parse(envelope.content[0].text);

  sendJson(res, failed ? 400 : 200, {
    status: failed ? 'error' : 'executed',
    tool,
    result: payload,
  });
}

/**
 * POST /mcp: a fresh MCP Server and stateless transport per request, both
 * closed when the response ends.
 */
async function handleMcp(kernel: ToolKernel, req: IncomingMessage, res: ServerResponse): Promise<void> {
  const server = createMcpServer(kernel);
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: undefined, // Stateless mode
  });
  res.on('close', () => {
    transport.close().catch(err => logger.debug(`HTTP: transport close failed: ${errorMessage(err)}`));
    server.close().catch(err => logger.debug(`HTTP: server close failed: ${errorMessage(err)}`));
  });
  await server.connect(transport);
  await transport.handleRequest(req, res);
}

/**
 * Start the HTTP server. Resolves once it is listening.
 */
export async function startHttpServer(
  kernel: ToolKernel,
  options: HttpServerOptions
): Promise<HttpServerHandle> {
  const { port, authToken, host = '0.0.0.0', connection } = options;

  const httpServer = createServer(async (req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);
    const path = url.pathname;

    logger.debug(`HTTP: ${req.method} ${path}`);

    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, Mcp-Session-Id, Accept');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    if (path === '/health' && req.method === 'GET') {
      sendJson(res, 200, {
        status: 'ok',
        name: SERVER_NAME,
        version: SERVER_VERSION,
        tools: kernel.toolCount,
        ...(connection && { database: connection.status() }),
      });
      return;
    }

    // Auth check (if token provided)
    if (authToken) {
      const authHeader = req.headers.authorization;
      if (!authHeader || authHeader !== `Bearer ${authToken}`) {
        log('HTTP: Unauthorized request');
        sendJson(res, 401, wrapError('Unauthorized', 'UNAUTHORIZED'));
        return;
      }
    }

    try {
      if (path === '/tools' && req.method === 'GET') {
        sendJson(res, 200, { status: 'ok', tools: kernel.listTools() });
        return;
      }

      if (path === '/call' && req.method === 'POST') {
        await handleCall(kernel, req, res);
        return;
      }

      if (path === '/mcp' && req.method === 'POST') {
        await handleMcp(kernel, req, res);
        return;
      }

      // Stateless: no standalone SSE stream and no sessions to delete
      if (path === '/mcp') {
        sendJson(res, 405, {
          jsonrpc: '2.0',
          error: { code: -32000, message: 'Method not allowed.' },
          id: null,
        });
        return;
      }
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`HTTP: Error handling ${req.method} ${path}: ${message}`);
      if (!res.writableEnded) {
        sendJson(res, 500, wrapError(message, 'INTERNAL_ERROR'));
      }
      return;
    }

    sendJson(res, 404, wrapError('Not found', 'NOT_FOUND'));
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(port, host, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  const address = httpServer.address();
  const boundPort = address !== null && typeof address === 'object' ? address.port : port;
  log(`HTTP Server listening on http://${host}:${boundPort}${authToken ? ' (bearer token required)' : ''}`);

  return {
    port: boundPort,
    stop: () => new Promise<void>((resolve, reject) => {
      httpServer.closeAllConnections();
      httpServer.close(err => (err ? reject(err) : resolve()));
    }),
  };
}

// ============================================================================
// CLI Arguments
// ============================================================================

export interface HttpArgs {
  httpMode: boolean;
  port: number;
  authToken?: string;
  host: string;
}

/**
 * Parse command line arguments for HTTP mode
 */
export function parseHttpArgs(args: string[]): HttpArgs {
  const httpMode = args.includes('--http');
  const portIndex = args.indexOf('--port');
  const parsedPort = portIndex !== -1 ? parseInt(args[portIndex + 1] ?? '', 10) : NaN;
  const port = Number.isInteger(parsedPort) && parsedPort >= 0 ? parsedPort : 8787;
  const authIndex = args.indexOf('--auth-token');
  const authToken = authIndex !== -1 ? args[authIndex + 1] : undefined;
  const hostIndex = args.indexOf('--host');
  const host = (hostIndex !== -1 ? args[hostIndex + 1] : undefined) ?? '0.0.0.0';

  return { httpMode, port, authToken, host };
}
