// ============================================================================
// Connection Manager
// ============================================================================
// Owns the one process-wide database handle. Startup connects with bounded
// retries; after that a dispatch that finds no handle makes a single lazy
// attempt. Concurrent callers share one in-flight attempt.
// ============================================================================

import { setTimeout as sleep } from 'timers/promises';
import type { Connector, DbHandle } from './arango.js';
import { logger } from './config.js';
import { errorMessage } from './errors.js';

export type ConnectionState = 'uninitialized' | 'connecting' | 'connected' | 'disconnected' | 'closed';

export interface ConnectionStatus {
  state: ConnectionState;
  connected: boolean;
  /** Connector calls made so far */
  attempts: number;
  lastError?: string;
}

export class ConnectionManager {
  private handle: DbHandle | null = null;
  private pending: Promise<DbHandle | null> | null = null;
  private state: ConnectionState = 'uninitialized';
  private attempts = 0;
  private lastError: string | undefined;

  constructor(private readonly connector: Connector) {}

  /**
   * Startup connect: up to max(1, maxAttempts) tries, waiting delayMs between
   * failures. Returns null when every attempt fails; the server keeps running.
   */
  async connectWithRetry(maxAttempts: number, delayMs: number): Promise<DbHandle | null> {
    const attempts = Math.max(1, Math.floor(maxAttempts));

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (this.state === 'closed') return null;
      const handle = await this.attempt();
      if (handle) return handle;

      logger.warn(`Connection attempt ${attempt}/${attempts} failed: ${this.lastError ?? 'unknown error'}`);
      if (attempt < attempts && delayMs > 0) {
        await sleep(delayMs);
      }
    }

    logger.error(`Could not connect to database after ${attempts} attempt(s); continuing without a connection`);
    return null;
  }

  /** The cached handle, or one lazy reconnect attempt. */
  async acquire(): Promise<DbHandle | null> {
    if (this.handle) return this.handle;
    return this.lazyReconnect();
  }

  /**
   * Single attempt, no retry. Callers arriving while an attempt is in flight
   * get that attempt's outcome.
   */
  lazyReconnect(): Promise<DbHandle | null> {
    if (this.state === 'closed') return Promise.resolve(null);
    if (this.handle) return Promise.resolve(this.handle);
    return this.attempt().then(handle => {
      if (handle) logger.info('Lazy reconnect succeeded');
      else logger.warn(`Lazy reconnect failed: ${this.lastError ?? 'unknown error'}`);
      return handle;
    });
  }

  /** Drop the cached handle so the next acquire() reconnects. */
  async invalidate(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (this.state === 'connected') this.state = 'disconnected';
    if (handle) await this.closeQuietly(handle);
  }

  /** Close the handle if present. Close errors are logged, never thrown. */
  async shutdown(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    this.state = 'closed';
    if (handle) {
      await this.closeQuietly(handle);
      logger.info('Database connection closed');
    }
  }

  status(): ConnectionStatus {
    const status: ConnectionStatus = {
      state: this.state,
      connected: this.handle !== null,
      attempts: this.attempts,
    };
    if (this.lastError !== undefined) status.lastError = this.lastError;
    return status;
  }

  get current(): DbHandle | null {
    return this.handle;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private attempt(): Promise<DbHandle | null> {
    if (!this.pending) {
      this.pending = this.runConnector().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async runConnector(): Promise<DbHandle | null> {
    this.state = 'connecting';
    this.attempts++;

    let handle: DbHandle;
    try {
      handle = await this.connector();
    } catch (err) {
      this.lastError = errorMessage(err);
      if (!this.isClosed()) this.state = 'disconnected';
      return null;
    }

    // Shut down or already connected while we waited: don't leak the extra handle.
    if (this.isClosed() || this.handle) {
      await this.closeQuietly(handle);
      return this.isClosed() ? null : this.handle;
    }

    this.handle = handle;
    this.state = 'connected';
    this.lastError = undefined;
    return handle;
  }

  private isClosed(): boolean {
    return this.state === 'closed';
  }

  private async closeQuietly(handle: DbHandle): Promise<void> {
    try {
      await handle.close();
    } catch (err) {
      logger.warn(`Error closing database connection: ${errorMessage(err)}`);
    }
  }
}
