// ============================================================================
// Query Domain Tools
// ============================================================================
// AQL execution, explain/profile and a structured query builder.
// ============================================================================

import { z } from 'zod';
import type { DbHandle, ExplainResult } from '../../arango.js';
import { assertCollectionName, assertFieldPath, fieldRef, isRecord } from '../shared/index.js';
import { defineTool, type ToolSpec } from '../types.js';

// ============================================================================
// Schemas
// ============================================================================

const bindVars = z.record(z.unknown()).optional().describe('Bind variables for the AQL query');

export const querySchema = z.object({
  query: z.string().describe('AQL query string'),
  bind_vars: bindVars,
});

export const explainSchema = z.object({
  query: z.string().describe('AQL query string'),
  bind_vars: bindVars,
  suggest_indexes: z.boolean().default(true).describe('Include heuristic index suggestions'),
  max_plans: z.number().int().min(1).default(1).describe('Maximum number of plans to return'),
});

export const profileSchema = z.object({
  query: z.string().describe('AQL query string'),
  bind_vars: bindVars,
  max_plans: z.number().int().min(1).default(1).describe('Maximum number of plans to return'),
});

export const FILTER_OPS = ['==', '!=', '<', '<=', '>', '>=', 'IN', 'LIKE'] as const;

export const queryBuilderSchema = z.object({
  collection: z.string().describe('Collection to query'),
  filters: z.array(z.object({
    field: z.string(),
    op: z.enum(FILTER_OPS),
    value: z.unknown(),
  })).default([]).describe('Conditions combined with AND'),
  sort: z.array(z.object({
    field: z.string(),
    direction: z.enum(['ASC', 'DESC']).default('ASC'),
  })).default([]).describe('Sort keys in order'),
  limit: z.number().int().min(1).optional().describe('Maximum number of results'),
  return_fields: z.array(z.string()).optional().describe('Fields to project; omit for the full document'),
});

export type QueryArgs = z.infer<typeof querySchema>;
export type ExplainArgs = z.infer<typeof explainSchema>;
export type ProfileArgs = z.infer<typeof profileSchema>;
export type QueryBuilderArgs = z.infer<typeof queryBuilderSchema>;

export interface IndexSuggestion {
  hint: string;
  nodeId: unknown;
}

export const INDEX_HINT = 'Consider adding a persistent/hash index for filtered fields';

// ============================================================================
// Handlers
// ============================================================================

export async function runQuery(db: DbHandle, args: QueryArgs): Promise<unknown[]> {
  return db.query(args.query, args.bind_vars ?? {});
}

/**
 * One hint per distinct Filter / EnumerateCollection node across all plans.
 */
export function suggestIndexes(plans: unknown[]): IndexSuggestion[] {
  const seen = new Set<unknown>();
  const suggestions: IndexSuggestion[] = [];
  for (const plan of plans) {
    if (!isRecord(plan) || !Array.isArray(plan.nodes)) continue;
    for (const node of plan.nodes) {
      if (!isRecord(node)) continue;
      if (node.type !== 'Filter' && node.type !== 'EnumerateCollection') continue;
      if (seen.has(node.id)) continue;
      seen.add(node.id);
      suggestions.push({ hint: INDEX_HINT, nodeId: node.id });
    }
  }
  return suggestions;
}

export async function explainQuery(
  db: DbHandle,
  args: ExplainArgs
): Promise<ExplainResult & { index_suggestions?: IndexSuggestion[] }> {
  const explained = await db.explain(args.query, args.bind_vars ?? {}, args.max_plans);
  if (!args.suggest_indexes) return explained;
  return { ...explained, index_suggestions: suggestIndexes(explained.plans) };
}

export async function profileQuery(db: DbHandle, args: ProfileArgs): Promise<ExplainResult> {
  return db.explain(args.query, args.bind_vars ?? {}, args.max_plans);
}

/**
 * Build `FOR doc IN <collection> FILTER ... SORT ... LIMIT n RETURN ...`.
 * Names go into the text after validation; values become bind parameters.
 */
export function buildQuery(args: QueryBuilderArgs): { query: string; bindVars: Record<string, unknown> } {
  const collection = assertCollectionName(args.collection);
  const bindVars: Record<string, unknown> = {};
  const lines = [`FOR doc IN ${collection}`];

  const clauses = args.filters.map((filter, i) => {
    const name = `v${i}`;
    bindVars[name] = filter.value ?? null;
    const ref = fieldRef('doc', filter.field);
    return filter.op === 'LIKE' ? `LIKE(${ref}, @${name})` : `${ref} ${filter.op} @${name}`;
  });
  if (clauses.length > 0) lines.push(`  FILTER ${clauses.join(' AND ')}`);

  if (args.sort.length > 0) {
    lines.push(`  SORT ${args.sort.map(s => `${fieldRef('doc', s.field)} ${s.direction}`).join(', ')}`);
  }

  if (args.limit !== undefined) {
    bindVars.limit = args.limit;
    lines.push('  LIMIT @limit');
  }

  if (args.return_fields && args.return_fields.length > 0) {
    const projection = args.return_fields
      .map(f => `${JSON.stringify(assertFieldPath(f))}: ${fieldRef('doc', f)}`)
      .join(', ');
    lines.push(`  RETURN { ${projection} }`);
  } else {
    lines.push('  RETURN doc');
  }

  return { query: lines.join('\n'), bindVars };
}

export async function queryBuilder(db: DbHandle, args: QueryBuilderArgs): Promise<unknown[]> {
  const { query, bindVars } = buildQuery(args);
  return db.query(query, bindVars);
}

// ============================================================================
// Tool Specs
// ============================================================================

export const queryTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_query',
    description: 'Execute an AQL query with optional bind variables and return the result rows.',
  },
  schema: querySchema,
  handler: runQuery,
});

export const explainQueryTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_explain_query',
    description: 'Explain an AQL query: execution plans, warnings, stats and optional index suggestions.',
    annotations: { readOnlyHint: true },
  },
  schema: explainSchema,
  handler: explainQuery,
});

export const queryBuilderTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_query_builder',
    description: 'Build and run a simple AQL query from structured filters, sort, limit and projection.',
    annotations: { readOnlyHint: true },
  },
  schema: queryBuilderSchema,
  handler: queryBuilder,
});

export const queryProfileTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_query_profile',
    description: 'Return explain plans and stats for a query, for profiling.',
    annotations: { readOnlyHint: true },
  },
  schema: profileSchema,
  handler: profileQuery,
});
