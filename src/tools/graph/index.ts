// ============================================================================
// Graph Domain Tools
// ============================================================================
// Named graph management, edges, traversal and shortest path.
// ============================================================================

import { z } from 'zod';
import type { DbHandle, DocumentMeta, EdgeDefinitionSpec, GraphSummary } from '../../arango.js';
import { InvalidArgumentError } from '../../errors.js';
import { assertCollectionName } from '../shared/index.js';
import { defineTool, type ToolSpec } from '../types.js';
import { insertDocument, insertSchema } from '../documents/index.js';

// ============================================================================
// Schemas
// ============================================================================

const direction = z.enum(['OUTBOUND', 'INBOUND', 'ANY']).default('OUTBOUND').describe('Edge direction to follow');

export const edgeDefinitionSchema = z.object({
  edge_collection: z.string(),
  from_collections: z.array(z.string()),
  to_collections: z.array(z.string()),
});

export const createGraphSchema = z.object({
  name: z.string().describe('Graph name'),
  edge_definitions: z.array(edgeDefinitionSchema).describe('Edge collections and the vertex collections they connect'),
  create_collections: z.boolean().default(true).describe('Create missing edge and vertex collections'),
});

export const addEdgeSchema = z.object({
  collection: z.string().describe('Edge collection'),
  from_id: z.string().describe('_from document id, e.g. users/123'),
  to_id: z.string().describe('_to document id, e.g. orders/456'),
  attributes: z.record(z.unknown()).default({}).describe('Additional edge attributes'),
});

export const traverseSchema = z.object({
  start_vertex: z.string().describe('Start vertex id, e.g. users/123'),
  direction,
  min_depth: z.number().int().min(0).default(1),
  max_depth: z.number().int().min(0).default(1),
  graph: z.string().optional().describe('Named graph to traverse'),
  edge_collections: z.array(z.string()).optional().describe('Edge collections to traverse when no graph is given'),
  return_paths: z.boolean().default(false).describe('Return full paths instead of { vertex, edge } pairs'),
  limit: z.number().int().min(1).optional(),
});

export const shortestPathSchema = z.object({
  start_vertex: z.string(),
  end_vertex: z.string(),
  direction,
  graph: z.string().optional(),
  edge_collections: z.array(z.string()).optional(),
  return_paths: z.boolean().default(true).describe('Include vertices and edges; otherwise only the path length'),
});

export const listGraphsSchema = z.object({});

export const addVertexCollectionSchema = z.object({
  graph: z.string(),
  collection: z.string(),
});

export const addEdgeDefinitionSchema = z.object({
  graph: z.string(),
  edge_collection: z.string(),
  from_collections: z.array(z.string()),
  to_collections: z.array(z.string()),
});

export type CreateGraphArgs = z.infer<typeof createGraphSchema>;
export type AddEdgeArgs = z.infer<typeof addEdgeSchema>;
export type TraverseArgs = z.infer<typeof traverseSchema>;
export type ShortestPathArgs = z.infer<typeof shortestPathSchema>;
export type AddVertexCollectionArgs = z.infer<typeof addVertexCollectionSchema>;
export type AddEdgeDefinitionArgs = z.infer<typeof addEdgeDefinitionSchema>;

// ============================================================================
// AQL
// ============================================================================

/**
 * `GRAPH @graph` for a named graph, otherwise the edge collection list.
 * Edge collection names can't be bind parameters in this position.
 */
function traversalSource(
  graph: string | undefined,
  edgeCollections: string[] | undefined,
  bindVars: Record<string, unknown>
): string {
  if (graph) {
    bindVars.graph = graph;
    return 'GRAPH @graph';
  }
  if (!edgeCollections || edgeCollections.length === 0) {
    throw new InvalidArgumentError('edge_collections must be provided when graph is not specified');
  }
  return edgeCollections.map(c => assertCollectionName(c, 'edge collection')).join(', ');
}

export function buildTraversal(args: TraverseArgs): { query: string; bindVars: Record<string, unknown> } {
  if (args.min_depth > args.max_depth) {
    throw new InvalidArgumentError(`min_depth (${args.min_depth}) must not exceed max_depth (${args.max_depth})`);
  }
  const bindVars: Record<string, unknown> = { start: args.start_vertex };
  const source = traversalSource(args.graph, args.edge_collections, bindVars);
  const lines = [`FOR v, e, p IN ${args.min_depth}..${args.max_depth} ${args.direction} @start ${source}`];
  if (args.limit !== undefined) {
    bindVars.limit = args.limit;
    lines.push('  LIMIT @limit');
  }
  lines.push(args.return_paths ? '  RETURN p' : '  RETURN { vertex: v, edge: e }');
  return { query: lines.join('\n'), bindVars };
}

export function buildShortestPath(args: ShortestPathArgs): { query: string; bindVars: Record<string, unknown> } {
  const bindVars: Record<string, unknown> = { start: args.start_vertex, end: args.end_vertex };
  const source = traversalSource(args.graph, args.edge_collections, bindVars);
  const query = [
    `LET steps = (FOR v, e IN ${args.direction} SHORTEST_PATH @start TO @end ${source} RETURN { v, e })`,
    'RETURN LENGTH(steps) > 0',
    '  ? { vertices: steps[*].v, edges: steps[* FILTER CURRENT.e != null].e }',
    '  : null',
  ].join('\n');
  return { query, bindVars };
}

// ============================================================================
// Handlers
// ============================================================================

export async function createGraph(
  db: DbHandle,
  args: CreateGraphArgs
): Promise<{ name: string; edge_definitions: EdgeDefinitionSpec[]; vertex_collections: string[] }> {
  const vertexCollections = [
    ...new Set(args.edge_definitions.flatMap(ed => [...ed.from_collections, ...ed.to_collections])),
  ].sort();

  if (args.create_collections) {
    for (const ed of args.edge_definitions) {
      if (!(await db.hasCollection(ed.edge_collection))) {
        await db.createCollection(ed.edge_collection, { edge: true });
      }
    }
    for (const name of vertexCollections) {
      if (!(await db.hasCollection(name))) {
        await db.createCollection(name, { edge: false });
      }
    }
  }

  if (!(await db.hasGraph(args.name))) {
    await db.graph(args.name).create(args.edge_definitions);
  }

  return {
    name: args.name,
    edge_definitions: args.edge_definitions,
    vertex_collections: vertexCollections,
  };
}

export async function addEdge(db: DbHandle, args: AddEdgeArgs): Promise<DocumentMeta> {
  return db.collection(args.collection).insert({
    ...args.attributes,
    _from: args.from_id,
    _to: args.to_id,
  });
}

export async function traverse(db: DbHandle, args: TraverseArgs): Promise<unknown[]> {
  const { query, bindVars } = buildTraversal(args);
  return db.query(query, bindVars);
}

export async function shortestPath(db: DbHandle, args: ShortestPathArgs): Promise<Record<string, unknown>> {
  const { query, bindVars } = buildShortestPath(args);
  const [path] = await db.query(query, bindVars);
  if (typeof path !== 'object' || path === null) {
    return { found: false };
  }

  const vertices = 'vertices' in path && Array.isArray(path.vertices) ? path.vertices : [];
  const edges = 'edges' in path && Array.isArray(path.edges) ? path.edges : [];
  if (!args.return_paths) {
    return { found: true, length: edges.length };
  }
  return { found: true, vertices, edges };
}

export async function listGraphs(db: DbHandle): Promise<GraphSummary[]> {
  return db.listGraphs();
}

export async function addVertexCollection(
  db: DbHandle,
  args: AddVertexCollectionArgs
): Promise<{ graph: string; collection_added: string }> {
  await db.graph(args.graph).addVertexCollection(args.collection);
  return { graph: args.graph, collection_added: args.collection };
}

export async function addEdgeDefinition(
  db: DbHandle,
  args: AddEdgeDefinitionArgs
): Promise<{ graph: string; edge_definition: EdgeDefinitionSpec }> {
  const definition: EdgeDefinitionSpec = {
    edge_collection: args.edge_collection,
    from_collections: args.from_collections,
    to_collections: args.to_collections,
  };
  await db.graph(args.graph).addEdgeDefinition(definition);
  return { graph: args.graph, edge_definition: definition };
}

// ============================================================================
// Tool Specs
// ============================================================================

export const createGraphTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_create_graph',
    description: 'Create a named graph from edge definitions, optionally creating missing collections.',
    annotations: { idempotentHint: true },
  },
  schema: createGraphSchema,
  handler: createGraph,
});

export const addEdgeTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_add_edge',
    description: 'Insert an edge document with _from, _to and optional attributes.',
  },
  schema: addEdgeSchema,
  handler: addEdge,
});

const TRAVERSE_DESCRIPTION = 'Traverse from a start vertex over a named graph or explicit edge collections, within depth bounds.';

export const traverseTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_traverse',
    description: TRAVERSE_DESCRIPTION,
    annotations: { readOnlyHint: true },
  },
  schema: traverseSchema,
  handler: traverse,
});

export const shortestPathTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_shortest_path',
    description: 'Find the shortest path between two vertices.',
    annotations: { readOnlyHint: true },
  },
  schema: shortestPathSchema,
  handler: shortestPath,
});

export const listGraphsTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_list_graphs',
    description: 'List named graphs with their edge definitions and orphan collections.',
    annotations: { readOnlyHint: true },
  },
  schema: listGraphsSchema,
  handler: listGraphs,
});

export const addVertexCollectionTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_add_vertex_collection',
    description: 'Add a vertex collection to a named graph.',
  },
  schema: addVertexCollectionSchema,
  handler: addVertexCollection,
});

export const addEdgeDefinitionTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_add_edge_definition',
    description: 'Add an edge definition to a named graph.',
  },
  schema: addEdgeDefinitionSchema,
  handler: addEdgeDefinition,
});

// Alternate names kept for clients written against older tool sets

export const graphTraversalTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_graph_traversal',
    description: `${TRAVERSE_DESCRIPTION} Same as arango_traverse.`,
    annotations: { readOnlyHint: true },
  },
  schema: traverseSchema,
  handler: traverse,
});

export const addVertexTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_add_vertex',
    description: 'Insert a vertex document into a collection. Same as arango_insert.',
  },
  schema: insertSchema,
  handler: insertDocument,
});
