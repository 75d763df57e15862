// ============================================================================
// Tool Kernel: shared tool dispatch
// ============================================================================
// The kernel owns dispatch: registry lookup, argument validation, handle
// acquisition, handler invocation and error mapping. Both stdio and HTTP
// transports go through it.
// ============================================================================

import { EventEmitter } from 'events';
import { logger } from './config.js';
import type { ConnectionManager } from './connection.js';
import {
  type DispatchResult,
  type ErrorKind,
  type Failure,
  errorMessage,
  failure,
  isToolError,
  toFailure,
} from './errors.js';
import { listTools, type ListingOptions, type ToolRegistry } from './tools/registry.js';
import { describeViolations, toolError, toolSuccess, validateArgs } from './tools/shared/index.js';
import type { McpToolDefinition, ToolResult } from './tools/types.js';

export const DATABASE_UNAVAILABLE_HINT = 'Ensure ArangoDB is reachable or check ARANGO_* environment variables.';

// ============================================================================
// Dispatch Events
// ============================================================================

export interface DispatchEvent {
  type: 'dispatch' | 'result' | 'error';
  tool: string;
  timestamp: string;
  duration_ms?: number;
  success?: boolean;
  kind?: ErrorKind;
  error?: string;
}

export type DispatchEventType = DispatchEvent['type'];

export interface KernelOptions {
  registry: ToolRegistry;
  /** Only acquire() is used; tests pass a stub */
  connection: Pick<ConnectionManager, 'acquire'>;
  listing?: ListingOptions;
}

export interface ToolKernel {
  registry: ToolRegistry;

  /** Run one tool call. Never throws; every outcome is a DispatchResult. */
  dispatch(name: string, args: unknown): Promise<DispatchResult>;

  /** dispatch() wrapped in the MCP envelope. */
  call(name: string, args: unknown): Promise<ToolResult>;

  /** MCP tool definitions for tools/list */
  listTools(): McpToolDefinition[];

  /** Subscribe to dispatch events (dispatch, result, error) */
  on(event: DispatchEventType, listener: (evt: DispatchEvent) => void): void;

  toolCount: number;
}

/**
 * Wrap a dispatch result in the response envelope. A value that can't be
 * serialized becomes an UnexpectedError envelope, and `failed` is set.
 */
export function renderResult(result: DispatchResult, tool: string): { failed: boolean; envelope: ToolResult } {
  if (!result.ok) return { failed: true, envelope: toolError(result, tool) };
  try {
    return { failed: false, envelope: toolSuccess(result.value) };
  } catch (err) {
    const envelope = toolError(
      failure('UnexpectedError', `Result could not be serialized: ${errorMessage(err)}`, {
        errorName: err instanceof Error ? err.constructor.name : typeof err,
      }),
      tool
    );
    return { failed: true, envelope };
  }
}

export function toEnvelope(result: DispatchResult, tool: string): ToolResult {
  return renderResult(result, tool).envelope;
}

/**
 * Create the tool kernel. Call once at startup; both transports share it.
 */
export function createKernel(options: KernelOptions): ToolKernel {
  const { registry, connection } = options;
  const listing: ListingOptions = options.listing ?? { toolset: 'full', baselineCount: registry.size };

  // NOTE: EventEmitter throws on .emit('error') if no listener is registered.
  // Register a no-op default so unsubscribed errors don't crash the process.
  const emitter = new EventEmitter();
  emitter.on('error', () => {});

  function emit(evt: DispatchEvent): void {
    emitter.emit(evt.type, evt);
  }

  function fail(name: string, startTime: number, result: Failure): Failure {
    if (result.kind === 'MissingParameter') {
      logger.error(`Kernel: ${name} failed (${result.kind}): ${result.message}`);
    } else {
      logger.warn(`Kernel: ${name} failed (${result.kind}): ${result.message}`);
    }
    emit({
      type: 'error',
      tool: name,
      timestamp: new Date().toISOString(),
      duration_ms: Date.now() - startTime,
      success: false,
      kind: result.kind,
      error: result.message,
    });
    return result;
  }

  async function dispatch(name: string, args: unknown): Promise<DispatchResult> {
    const startTime = Date.now();

    const spec = registry.lookup(name);
    if (!spec) {
      return fail(name, startTime, failure('UnknownTool', `Unknown tool: ${name}`));
    }

    const validated = validateArgs(spec, args);
    if (!validated.ok) {
      return fail(name, startTime, failure(
        'ValidationError',
        `Invalid arguments for ${name}: ${describeViolations(validated.violations)}`,
        { detail: validated.violations }
      ));
    }

    const db = await connection.acquire();
    if (!db) {
      return fail(name, startTime, failure('DatabaseUnavailable', 'Database unavailable', {
        hint: DATABASE_UNAVAILABLE_HINT,
      }));
    }

    logger.debug(`Kernel: dispatch ${name}`);
    emit({ type: 'dispatch', tool: name, timestamp: new Date().toISOString() });

    try {
      const value = await validated.invoke(db);
      emit({
        type: 'result',
        tool: name,
        timestamp: new Date().toISOString(),
        duration_ms: Date.now() - startTime,
        success: true,
      });
      return { ok: true, value };
    } catch (err) {
      if (!isToolError(err)) {
        logger.error(`Kernel: unexpected error in ${name}`, err);
      }
      return fail(name, startTime, toFailure(err));
    }
  }

  async function call(name: string, args: unknown): Promise<ToolResult> {
    return toEnvelope(await dispatch(name, args), name);
  }

  return {
    registry,
    dispatch,
    call,
    listTools: () => listTools(registry, listing),
    on: (event, listener) => {
      emitter.on(event, listener);
    },
    toolCount: registry.size,
  };
}
