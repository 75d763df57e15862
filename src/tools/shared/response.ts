// ============================================================================
// Response Helpers
// ============================================================================
// The wire envelope: one text item holding compact JSON, for success and
// failure alike.
// ============================================================================

import type { Failure } from '../../errors.js';
import type { ToolResult } from '../types.js';

function envelope(text: string): ToolResult {
  return {
    content: [{ type: 'text', text }],
  };
}

/**
 * Create a successful tool response. Throws if the value can't be
 * serialized (cycles, BigInt).
 */
export function toolSuccess(data: unknown): ToolResult {
  return envelope(JSON.stringify(data) ?? 'null');
}

/**
 * Create an error tool response: `{ error, type, tool, details?, hint?, errorName? }`
 */
export function toolError(failure: Failure, tool: string): ToolResult {
  const payload: Record<string, unknown> = {
    error: failure.message,
    type: failure.kind,
    tool,
  };
  if (failure.detail !== undefined) payload.details = failure.detail;
  if (failure.hint) payload.hint = failure.hint;
  if (failure.errorName) payload.errorName = failure.errorName;
  return envelope(JSON.stringify(payload));
}
