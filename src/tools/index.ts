// ============================================================================
// Tools Aggregator
// ============================================================================
// The fixed tool list, in registration (and listing) order. The first seven
// entries form the baseline toolset.
// ============================================================================

import type { ToolSpec } from './types.js';
import { insertTool, updateTool, removeTool } from './documents/index.js';
import { listCollectionsTool, createCollectionTool, backupTool } from './collections/index.js';
import { listIndexesTool, createIndexTool, deleteIndexTool } from './indexes/index.js';
import { queryTool, explainQueryTool, queryBuilderTool, queryProfileTool } from './query/index.js';
import {
  validateReferencesTool,
  insertWithValidationTool,
  bulkInsertTool,
  bulkUpdateTool,
} from './bulk/index.js';
import {
  createGraphTool,
  addEdgeTool,
  traverseTool,
  shortestPathTool,
  listGraphsTool,
  addVertexCollectionTool,
  addEdgeDefinitionTool,
  graphTraversalTool,
  addVertexTool,
} from './graph/index.js';
import { createSchemaTool, validateDocumentTool } from './schema/index.js';

// ============================================================================
// Aggregate All Tools
// ============================================================================

export const allTools: readonly ToolSpec[] = [
  // Core data
  queryTool,
  listCollectionsTool,
  insertTool,
  updateTool,
  removeTool,
  createCollectionTool,
  backupTool,
  // Indexing & query analysis
  listIndexesTool,
  createIndexTool,
  deleteIndexTool,
  explainQueryTool,
  // Validation & bulk
  validateReferencesTool,
  insertWithValidationTool,
  bulkInsertTool,
  bulkUpdateTool,
  // Graph
  createGraphTool,
  addEdgeTool,
  traverseTool,
  shortestPathTool,
  listGraphsTool,
  addVertexCollectionTool,
  addEdgeDefinitionTool,
  graphTraversalTool,
  addVertexTool,
  // Schema management
  createSchemaTool,
  validateDocumentTool,
  // Enhanced query
  queryBuilderTool,
  queryProfileTool,
];

export function getToolNames(tools: readonly ToolSpec[] = allTools): string[] {
  return tools.map(t => t.definition.name);
}
