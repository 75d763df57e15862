import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import type { DbHandle } from '../../src/arango.js';
import { createApp, type App } from '../../src/app.js';
import type { Toolset } from '../../src/config.js';
import { createMcpServer } from '../../src/transports/mcp.js';

export interface TestMcpClient {
  client: Client;
  server: Server;
  app: App;
  close: () => Promise<void>;
  listTools: () => Promise<Array<{ name: string; description?: string; inputSchema: unknown }>>;
  /** Calls a tool and parses the JSON text of the single content item */
  callTool: (name: string, args?: Record<string, unknown>) => Promise<unknown>;
}

export interface TestMcpClientOptions {
  /** Handle the fake connector returns; null makes every connect fail */
  db: DbHandle | null;
  toolset?: Toolset;
  baselineCount?: number;
}

/**
 * Creates a test MCP client connected to a real server instance via in-memory transport.
 * The server runs the production kernel over a fake database.
 */
export async function createTestMcpClient(options: TestMcpClientOptions): Promise<TestMcpClient> {
  const { db } = options;
  const app = createApp({
    config: { toolset: options.toolset ?? 'full', baselineCount: options.baselineCount ?? 7 },
    connector: async () => {
      if (!db) throw new Error('connection refused');
      return db;
    },
  });
  await app.connection.connectWithRetry(1, 0);

  const server = createMcpServer(app.kernel);
  const client = new Client({ name: 'test-client', version: '1.0.0' }, { capabilities: {} });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);

  return {
    client,
    server,
    app,
    close: async () => {
      await client.close();
      await server.close();
      await app.connection.shutdown();
    },
    listTools: async () => {
      const result = await client.listTools();
      return result.tools;
    },
    callTool: async (name, args = {}) => {
      const result = await client.callTool({ name, arguments: args });
      const content: unknown = 'content' in result ? result.content : undefined;
      if (!Array.isArray(content) || content.length !== 1) {
        throw new Error(`Expected one content item, got ${JSON.stringify(content)}`);
      }
      const [item] = content;
      if (typeof item !== 'object' || item === null || !('text' in item) || typeof item.text !== 'string') {
        throw new Error(`Expected a text item, got ${JSON.stringify(item)}`);
      }
      return JSON.parse(item.text);
    },
  };
}
