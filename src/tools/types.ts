// ============================================================================
// Tool Types
// ============================================================================
// Shared type definitions for the tool registry and its handlers.
// ============================================================================

import type { z } from 'zod';
import type { DbHandle } from '../arango.js';

/**
 * Standard MCP tool result format. Success and failure share this shape;
 * a failure is marked only by the `error` field inside the JSON text.
 */
export type ToolResult = {
  content: Array<{
    type: 'text';
    text: string;
  }>;
};

/** MCP behaviour hints shown to clients in tools/list */
export type ToolAnnotations = {
  title?: string;
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
};

export type JsonObjectSchema = {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
};

/** Entry of a tools/list response */
export type McpToolDefinition = {
  name: string;
  description: string;
  inputSchema: JsonObjectSchema;
  annotations?: ToolAnnotations;
};

export interface ToolDefinition {
  name: string;
  description: string;
  annotations?: ToolAnnotations;
}

/**
 * Result of checking arguments against a tool's schema: either a call bound
 * to the parsed arguments, waiting for a database handle, or zod's issues.
 */
export type PreparedCall =
  | { ok: true; invoke(db: DbHandle): Promise<unknown> }
  | { ok: false; issues: z.ZodIssue[] };

/**
 * A tool as the registry holds it. Handler argument types are erased here;
 * defineTool() keeps them checked at the declaration site.
 */
export interface ToolSpec {
  definition: ToolDefinition;
  schema: z.AnyZodObject;
  /** Alternate wire names: alias -> canonical field */
  aliases?: Record<string, string>;
  /** Parse alias-resolved input with the schema (defaults applied, unknown keys dropped). */
  prepare(input: Record<string, unknown>): PreparedCall;
}

/** Handler contract: validated arguments in, JSON-serializable value out. */
export type ToolHandler<T extends z.ZodRawShape> = (
  db: DbHandle,
  args: z.output<z.ZodObject<T>>
) => Promise<unknown>;

export interface ToolDeclaration<T extends z.ZodRawShape> {
  definition: ToolDefinition;
  schema: z.ZodObject<T>;
  aliases?: Record<string, string>;
  handler: ToolHandler<T>;
}

/**
 * Declare a tool with its handler arguments inferred from the schema.
 */
export function defineTool<T extends z.ZodRawShape>(declaration: ToolDeclaration<T>): ToolSpec {
  const { definition, schema, aliases, handler } = declaration;
  return {
    definition,
    schema,
    aliases,
    prepare(input) {
      const parsed = schema.safeParse(input);
      if (!parsed.success) {
        return { ok: false, issues: parsed.error.issues };
      }
      const args = parsed.data;
      return { ok: true, invoke: db => handler(db, args) };
    },
  };
}
