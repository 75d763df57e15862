import { describe, it, expect, vi } from 'vitest';
import type { DbHandle } from '../../src/arango.js';
import { ConnectionManager } from '../../src/connection.js';
import { FakeDb } from '../utils/fake-db.js';

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Connector that fails `failures` times, then hands out FakeDb instances. */
function flakyConnector(failures: number) {
  let calls = 0;
  return vi.fn(async (): Promise<DbHandle> => {
    calls++;
    if (calls <= failures) throw new Error(`refused #${calls}`);
    return new FakeDb();
  });
}

describe('ConnectionManager', () => {
  describe('connectWithRetry', () => {
    it('should connect on the first attempt', async () => {
      const connector = flakyConnector(0);
      const manager = new ConnectionManager(connector);

      const handle = await manager.connectWithRetry(3, 0);

      expect(handle).toBeInstanceOf(FakeDb);
      expect(connector).toHaveBeenCalledTimes(1);
      expect(manager.status()).toEqual({ state: 'connected', connected: true, attempts: 1 });
    });

    it('should retry until an attempt succeeds', async () => {
      const connector = flakyConnector(2);
      const manager = new ConnectionManager(connector);

      const handle = await manager.connectWithRetry(3, 0);

      expect(handle).not.toBeNull();
      expect(connector).toHaveBeenCalledTimes(3);
      expect(manager.current).toBe(handle);
    });

    it('should return null after the last failed attempt', async () => {
      const connector = flakyConnector(10);
      const manager = new ConnectionManager(connector);

      const handle = await manager.connectWithRetry(3, 0);

      expect(handle).toBeNull();
      expect(connector).toHaveBeenCalledTimes(3);
      expect(manager.status()).toEqual({
        state: 'disconnected',
        connected: false,
        attempts: 3,
        lastError: 'refused #3',
      });
    });

    it('should make at least one attempt', async () => {
      const connector = flakyConnector(10);
      const manager = new ConnectionManager(connector);

      await manager.connectWithRetry(0, 0);

      expect(connector).toHaveBeenCalledTimes(1);
    });

    it('should wait between failed attempts', async () => {
      const manager = new ConnectionManager(flakyConnector(10));

      const start = Date.now();
      await manager.connectWithRetry(2, 40);

      expect(Date.now() - start).toBeGreaterThanOrEqual(35);
    });

    it('should not wait after a successful attempt', async () => {
      const manager = new ConnectionManager(flakyConnector(0));

      const start = Date.now();
      await manager.connectWithRetry(3, 5000);

      expect(Date.now() - start).toBeLessThan(1000);
    });
  });

  describe('acquire', () => {
    it('should return the cached handle without reconnecting', async () => {
      const connector = flakyConnector(0);
      const manager = new ConnectionManager(connector);
      const handle = await manager.connectWithRetry(1, 0);

      await expect(manager.acquire()).resolves.toBe(handle);
      expect(connector).toHaveBeenCalledTimes(1);
    });

    it('should make a single lazy attempt when there is no handle', async () => {
      const connector = flakyConnector(10);
      const manager = new ConnectionManager(connector);

      await expect(manager.acquire()).resolves.toBeNull();
      expect(connector).toHaveBeenCalledTimes(1);
    });

    it('should reconnect lazily after startup failed', async () => {
      const connector = flakyConnector(1);
      const manager = new ConnectionManager(connector);
      await manager.connectWithRetry(1, 0);

      const handle = await manager.acquire();

      expect(handle).toBeInstanceOf(FakeDb);
      expect(manager.status().state).toBe('connected');
    });

    it('should share one in-flight attempt between concurrent callers', async () => {
      const gate = deferred<DbHandle>();
      const connector = vi.fn(() => gate.promise);
      const manager = new ConnectionManager(connector);

      const calls = [manager.acquire(), manager.acquire(), manager.lazyReconnect()];
      const db = new FakeDb();
      gate.resolve(db);
      const handles = await Promise.all(calls);

      expect(connector).toHaveBeenCalledTimes(1);
      expect(handles).toEqual([db, db, db]);
    });
  });

  describe('invalidate', () => {
    it('should close the handle and reconnect on the next acquire', async () => {
      const connector = flakyConnector(0);
      const manager = new ConnectionManager(connector);
      const first = await manager.connectWithRetry(1, 0);

      await manager.invalidate();

      expect(first).toBeInstanceOf(FakeDb);
      expect(first instanceof FakeDb && first.closed).toBe(true);
      expect(manager.status().state).toBe('disconnected');

      const second = await manager.acquire();
      expect(second).not.toBe(first);
      expect(connector).toHaveBeenCalledTimes(2);
    });
  });

  describe('shutdown', () => {
    it('should close the handle and refuse further connects', async () => {
      const db = new FakeDb();
      const connector = vi.fn(async () => db);
      const manager = new ConnectionManager(connector);
      await manager.connectWithRetry(1, 0);

      await manager.shutdown();

      expect(db.closed).toBe(true);
      expect(manager.status()).toEqual({ state: 'closed', connected: false, attempts: 1 });
      await expect(manager.acquire()).resolves.toBeNull();
      expect(connector).toHaveBeenCalledTimes(1);
    });

    it('should swallow close errors', async () => {
      const db = new FakeDb();
      db.closeError = new Error('socket already gone');
      const manager = new ConnectionManager(async () => db);
      await manager.connectWithRetry(1, 0);

      await expect(manager.shutdown()).resolves.toBeUndefined();
      expect(manager.status().state).toBe('closed');
    });

    it('should be a no-op without a handle', async () => {
      const manager = new ConnectionManager(flakyConnector(10));

      await expect(manager.shutdown()).resolves.toBeUndefined();
    });

    it('should close a handle that arrives after shutdown', async () => {
      const gate = deferred<DbHandle>();
      const manager = new ConnectionManager(() => gate.promise);

      const pending = manager.acquire();
      await manager.shutdown();
      const late = new FakeDb();
      gate.resolve(late);

      await expect(pending).resolves.toBeNull();
      expect(late.closed).toBe(true);
      expect(manager.current).toBeNull();
    });
  });
});
