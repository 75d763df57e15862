// ============================================================================
// Validation Helpers
// ============================================================================
// Argument validation for the dispatcher and listing schemas for tools/list.
// ============================================================================

import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { DbHandle } from '../../arango.js';
import { MissingParameterError } from '../../errors.js';
import type { JsonObjectSchema, ToolSpec } from '../types.js';

export interface Violation {
  /** Dotted path of the offending field; "" for the arguments object itself */
  field: string;
  message: string;
  code: string;
}

export type ValidatedCall =
  | { ok: true; invoke(db: DbHandle): Promise<unknown> }
  | { ok: false; violations: Violation[] };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Move alias keys onto their canonical field. When both are present the
 * alias value wins.
 */
export function resolveAliases(
  input: Record<string, unknown>,
  aliases: Record<string, string> = {}
): Record<string, unknown> {
  const resolved: Record<string, unknown> = { ...input };
  for (const [alias, canonical] of Object.entries(aliases)) {
    if (alias in resolved) {
      resolved[canonical] = resolved[alias];
      delete resolved[alias];
    }
  }
  return resolved;
}

function toViolation(issue: z.ZodIssue): Violation {
  return {
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  };
}

/**
 * Validate raw tool-call arguments against a tool's schema.
 *
 * Missing arguments count as `{}`. Top-level nulls are dropped first, so a
 * null alias never hides its canonical field. Aliases are resolved next, then
 * the schema applies types, enums, defaults and drops unknown keys. Numeric
 * strings are not coerced.
 */
export function validateArgs(spec: ToolSpec, raw: unknown): ValidatedCall {
  const input = raw === undefined || raw === null ? {} : raw;
  if (!isRecord(input)) {
    return {
      ok: false,
      violations: [{ field: '', message: 'Arguments must be an object', code: 'invalid_type' }],
    };
  }

  const present = Object.fromEntries(Object.entries(input).filter(([, value]) => value !== null));
  const resolved = resolveAliases(present, spec.aliases);

  const prepared = spec.prepare(resolved);
  if (!prepared.ok) {
    return { ok: false, violations: prepared.issues.map(toViolation) };
  }
  return { ok: true, invoke: prepared.invoke };
}

/**
 * Summarize violations as one line, e.g. "collection: Required".
 */
export function describeViolations(violations: Violation[]): string {
  return violations
    .map(v => (v.field ? `${v.field}: ${v.message}` : v.message))
    .join('; ');
}

// ============================================================================
// Listing Schemas
// ============================================================================

/**
 * JSON Schema (draft-07) for tools/list. Aliases appear as extra properties
 * sharing the canonical field's schema.
 */
export function toInputSchema(spec: ToolSpec): JsonObjectSchema {
  const generated: Record<string, unknown> = Object.fromEntries(
    Object.entries(zodToJsonSchema(spec.schema, { $refStrategy: 'none' }))
  );
  const properties: Record<string, unknown> = isRecord(generated.properties) ? { ...generated.properties } : {};
  const required = Array.isArray(generated.required)
    ? generated.required.filter((r): r is string => typeof r === 'string')
    : [];

  for (const [alias, canonical] of Object.entries(spec.aliases ?? {})) {
    const target = properties[canonical];
    properties[alias] = {
      ...(isRecord(target) ? target : {}),
      description: `Alias of '${canonical}'`,
    };
  }

  const schema: JsonObjectSchema = { type: 'object', properties };
  if (required.length > 0) schema.required = required;
  if (typeof generated.$schema === 'string') schema.$schema = generated.$schema;
  return schema;
}

// ============================================================================
// Handler Preconditions
// ============================================================================

/**
 * Assert that fields a handler depends on are present.
 * Throws MissingParameterError naming the first absent field.
 */
export function requireFields(args: Record<string, unknown>, ...fields: string[]): void {
  const missing = fields.find(f => args[f] === undefined || args[f] === null);
  if (missing !== undefined) {
    throw new MissingParameterError(missing);
  }
}
