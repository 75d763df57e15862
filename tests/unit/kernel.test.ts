import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import type { DbHandle } from '../../src/arango.js';
import { ConnectionManager } from '../../src/connection.js';
import { MissingParameterError, NotFoundError } from '../../src/errors.js';
import { createKernel, DATABASE_UNAVAILABLE_HINT, toEnvelope, type DispatchEvent } from '../../src/kernel.js';
import { insertTool } from '../../src/tools/documents/index.js';
import { buildRegistry } from '../../src/tools/registry.js';
import { defineTool, type ToolSpec } from '../../src/tools/types.js';
import { FakeDb } from '../utils/fake-db.js';

const pingTool = defineTool({
  definition: { name: 'ping', description: 'Liveness check' },
  schema: z.object({}),
  handler: async () => ({ pong: true }),
});

function throwingTool(name: string, error: unknown): ToolSpec {
  return defineTool({
    definition: { name, description: 'Always fails' },
    schema: z.object({}),
    handler: async () => {
      throw error;
    },
  });
}

function valueTool(name: string, value: unknown): ToolSpec {
  return defineTool({
    definition: { name, description: 'Returns a fixed value' },
    schema: z.object({}),
    handler: async () => value,
  });
}

function setup(tools: ToolSpec[], db: DbHandle | null = new FakeDb()) {
  const acquire = vi.fn(async () => db);
  const kernel = createKernel({ registry: buildRegistry(tools), connection: { acquire } });
  return { kernel, acquire };
}

function parse(result: { content: Array<{ text: string }> }): unknown {
  return JSON.parse(result.content[0].text);
}

describe('Kernel', () => {
  describe('call', () => {
    it('should return the handler value as compact JSON', async () => {
      const { kernel } = setup([pingTool]);

      const result = await kernel.call('ping', {});

      expect(result).toEqual({ content: [{ type: 'text', text: '{"pong":true}' }] });
    });

    it('should never mark the envelope with isError', async () => {
      const { kernel } = setup([pingTool]);

      const result = await kernel.call('missing', {});

      expect(result.content).toHaveLength(1);
      expect('isError' in result).toBe(false);
    });

    it('should report unknown tools', async () => {
      const { kernel, acquire } = setup([pingTool]);

      const result = await kernel.call('nope', {});

      expect(parse(result)).toEqual({ error: 'Unknown tool: nope', type: 'UnknownTool', tool: 'nope' });
      expect(acquire).not.toHaveBeenCalled();
    });

    it('should report validation failures with per-field details', async () => {
      const { kernel, acquire } = setup([insertTool]);

      const result = await kernel.call('arango_insert', { document: { a: 1 } });

      expect(parse(result)).toEqual({
        error: 'Invalid arguments for arango_insert: collection: Required',
        type: 'ValidationError',
        tool: 'arango_insert',
        details: [{ field: 'collection', message: 'Required', code: 'invalid_type' }],
      });
      expect(acquire).not.toHaveBeenCalled();
    });

    it('should report an unavailable database with a hint', async () => {
      const { kernel, acquire } = setup([pingTool], null);

      const result = await kernel.call('ping', {});

      expect(parse(result)).toEqual({
        error: 'Database unavailable',
        type: 'DatabaseUnavailable',
        tool: 'ping',
        hint: DATABASE_UNAVAILABLE_HINT,
      });
      expect(acquire).toHaveBeenCalledTimes(1);
    });

    it('should map MissingParameterError', async () => {
      const { kernel } = setup([throwingTool('needs_key', new MissingParameterError('key'))]);

      const result = await kernel.call('needs_key', {});

      expect(parse(result)).toEqual({
        error: "Missing required parameter: 'key'",
        type: 'MissingParameter',
        tool: 'needs_key',
      });
    });

    it('should keep the kind of other tool errors', async () => {
      const { kernel } = setup([throwingTool('lookup', new NotFoundError("Collection 'x' does not exist"))]);

      const result = await kernel.call('lookup', {});

      expect(parse(result)).toEqual({
        error: "Collection 'x' does not exist",
        type: 'NotFound',
        tool: 'lookup',
      });
    });

    it('should map unexpected errors with the error name', async () => {
      const { kernel } = setup([throwingTool('boom', new RangeError('out of range'))]);

      const result = await kernel.call('boom', {});

      expect(parse(result)).toEqual({
        error: 'Operation failed: out of range',
        type: 'UnexpectedError',
        tool: 'boom',
        errorName: 'RangeError',
      });
    });

    it('should turn an unserializable result into an UnexpectedError', async () => {
      const { kernel } = setup([valueTool('big', { n: BigInt(1) })]);

      const result = await kernel.call('big', {});

      expect(parse(result)).toEqual({
        error: 'Result could not be serialized: Do not know how to serialize a BigInt',
        type: 'UnexpectedError',
        tool: 'big',
        errorName: 'TypeError',
      });
    });

    it('should serialize an undefined result as null', async () => {
      const { kernel } = setup([valueTool('nothing', undefined)]);

      const result = await kernel.call('nothing', {});

      expect(result.content[0].text).toBe('null');
    });
  });

  describe('dispatch', () => {
    it('should hand the acquired handle to the handler', async () => {
      const db = new FakeDb().addCollection('users');
      const { kernel } = setup([insertTool], db);

      const result = await kernel.dispatch('arango_insert', { collection: 'users', document: { _key: 'u1' } });

      expect(result).toEqual({ ok: true, value: { _id: 'users/u1', _key: 'u1', _rev: '_r1' } });
      expect(db.docs('users')).toEqual([{ _key: 'u1', _id: 'users/u1', _rev: '_r1' }]);
    });

    it('should acquire once per dispatch', async () => {
      const { kernel, acquire } = setup([pingTool]);

      await kernel.dispatch('ping', {});
      await kernel.dispatch('ping', {});

      expect(acquire).toHaveBeenCalledTimes(2);
    });
  });

  describe('with a connection manager', () => {
    it('should keep serving after a handler throws', async () => {
      const db = new FakeDb();
      const connector = vi.fn(async () => db);
      const connection = new ConnectionManager(connector);
      const registry = buildRegistry([throwingTool('boom', new Error('kaput')), pingTool]);
      const kernel = createKernel({ registry, connection });

      const failed = await kernel.dispatch('boom', {});
      const ok = await kernel.dispatch('ping', {});

      expect(failed).toMatchObject({ ok: false, kind: 'UnexpectedError', message: 'Operation failed: kaput' });
      expect(ok).toEqual({ ok: true, value: { pong: true } });
      expect(registry.names()).toEqual(['boom', 'ping']);
      expect(connection.current).toBe(db);
    });

    it('should connect once and reuse the handle on later dispatches', async () => {
      const connector = vi.fn(async () => new FakeDb());
      const connection = new ConnectionManager(connector);
      const kernel = createKernel({ registry: buildRegistry([pingTool]), connection });

      await kernel.dispatch('ping', {});
      await kernel.dispatch('ping', {});
      await kernel.dispatch('nope', {});

      expect(connector).toHaveBeenCalledTimes(1);
      expect(connection.status()).toEqual({ state: 'connected', connected: true, attempts: 1 });
    });
  });

  describe('events', () => {
    it('should emit dispatch and result for a success', async () => {
      const { kernel } = setup([pingTool]);
      const events: DispatchEvent[] = [];
      kernel.on('dispatch', evt => events.push(evt));
      kernel.on('result', evt => events.push(evt));

      await kernel.call('ping', {});

      expect(events.map(e => e.type)).toEqual(['dispatch', 'result']);
      expect(events[1]?.success).toBe(true);
    });

    it('should emit error with the failure kind', async () => {
      const { kernel } = setup([pingTool]);
      const errors: DispatchEvent[] = [];
      kernel.on('error', evt => errors.push(evt));

      await kernel.call('nope', {});

      expect(errors).toHaveLength(1);
      expect(errors[0]?.kind).toBe('UnknownTool');
      expect(errors[0]?.error).toBe('Unknown tool: nope');
    });

    it('should not throw on errors without a listener', async () => {
      const { kernel } = setup([pingTool]);

      await expect(kernel.call('nope', {})).resolves.toBeDefined();
    });
  });

  describe('listTools', () => {
    it('should list all tools by default', () => {
      const { kernel } = setup([pingTool, valueTool('other', 1)]);

      expect(kernel.listTools().map(t => t.name)).toEqual(['ping', 'other']);
      expect(kernel.toolCount).toBe(2);
    });

    it('should apply the configured listing', () => {
      const kernel = createKernel({
        registry: buildRegistry([pingTool, valueTool('other', 1)]),
        connection: { acquire: async () => null },
        listing: { toolset: 'baseline', baselineCount: 1 },
      });

      expect(kernel.listTools().map(t => t.name)).toEqual(['ping']);
    });

    it('should still dispatch tools hidden from the listing', async () => {
      const kernel = createKernel({
        registry: buildRegistry([pingTool, valueTool('other', 1)]),
        connection: { acquire: async () => new FakeDb() },
        listing: { toolset: 'baseline', baselineCount: 1 },
      });

      const result = await kernel.call('other', {});

      expect(result.content[0].text).toBe('1');
    });
  });
});

describe('toEnvelope', () => {
  it('should include hint and details only when present', () => {
    const result = toEnvelope({ ok: false, kind: 'NotFound', message: 'gone' }, 'arango_remove');

    expect(result.content[0].text).toBe('{"error":"gone","type":"NotFound","tool":"arango_remove"}');
  });
});
