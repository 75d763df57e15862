// ============================================================================
// Process Lifecycle
// ============================================================================
// Graceful shutdown on SIGINT/SIGTERM: run cleanup once, bounded by a drain
// timeout, then exit.
// ============================================================================

import { log, logger } from './config.js';
import { errorMessage } from './errors.js';

export const DRAIN_TIMEOUT_MS = 5000;

export interface ShutdownOptions {
  drainTimeoutMs?: number;
  /** Replaced in tests */
  exit?: (code: number) => void;
  signals?: NodeJS.Signals[];
}

/**
 * Install signal handlers. Returns the shutdown function so callers can
 * trigger the same path directly.
 */
export function installShutdownHandlers(
  cleanup: () => Promise<void>,
  options: ShutdownOptions = {}
): (signal: string) => Promise<void> {
  const {
    drainTimeoutMs = DRAIN_TIMEOUT_MS,
    exit = (code: number) => process.exit(code),
    signals = ['SIGTERM', 'SIGINT'],
  } = options;
  let shuttingDown = false;

  async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;

    log(`${signal} received, shutting down gracefully...`);

    // Race: cleanup vs timeout
    const timer = setTimeout(() => {
      logger.error(`Drain timeout (${drainTimeoutMs}ms) exceeded, forcing exit`);
      exit(1);
    }, drainTimeoutMs);

    try {
      await cleanup();
      log('Clean shutdown complete');
    } catch (err) {
      logger.error(`Error during shutdown: ${errorMessage(err)}`);
    } finally {
      clearTimeout(timer);
      exit(0);
    }
  }

  for (const signal of signals) {
    process.on(signal, () => {
      void shutdown(signal);
    });
  }
  return shutdown;
}
