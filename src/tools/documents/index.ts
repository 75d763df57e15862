// ============================================================================
// Document Domain Tools
// ============================================================================
// Single-document CRUD: insert, update, remove.
// ============================================================================

import { z } from 'zod';
import type { DbHandle, DocumentMeta } from '../../arango.js';
import { NotFoundError } from '../../errors.js';
import { defineTool, type ToolSpec } from '../types.js';

// ============================================================================
// Schemas
// ============================================================================

const documentBody = z.record(z.unknown());

export const insertSchema = z.object({
  collection: z.string().describe('Name of the target collection'),
  document: documentBody.describe('Document to insert'),
});

export const updateSchema = z.object({
  collection: z.string().describe('Name of the collection containing the document'),
  key: z.string().describe('Document key to update'),
  update: documentBody.describe('Fields to update in the document'),
});

export const removeSchema = z.object({
  collection: z.string().describe('Name of the collection containing the document'),
  key: z.string().describe('Document key to remove'),
});

export type InsertArgs = z.infer<typeof insertSchema>;
export type UpdateArgs = z.infer<typeof updateSchema>;
export type RemoveArgs = z.infer<typeof removeSchema>;

// ============================================================================
// Handlers
// ============================================================================

export async function requireCollection(db: DbHandle, name: string): Promise<void> {
  if (!(await db.hasCollection(name))) {
    throw new NotFoundError(`Collection '${name}' does not exist`);
  }
}

export async function insertDocument(db: DbHandle, args: InsertArgs): Promise<DocumentMeta> {
  await requireCollection(db, args.collection);
  return db.collection(args.collection).insert(args.document);
}

export async function updateDocument(db: DbHandle, args: UpdateArgs): Promise<DocumentMeta> {
  await requireCollection(db, args.collection);
  return db.collection(args.collection).update(args.key, args.update);
}

export async function removeDocument(db: DbHandle, args: RemoveArgs): Promise<DocumentMeta> {
  await requireCollection(db, args.collection);
  return db.collection(args.collection).remove(args.key);
}

// ============================================================================
// Tool Specs
// ============================================================================

export const insertTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_insert',
    description: 'Insert a document into a collection. Returns the new document\'s _id, _key and _rev.',
  },
  schema: insertSchema,
  handler: insertDocument,
});

export const updateTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_update',
    description: 'Update (merge) fields of a document identified by key.',
  },
  schema: updateSchema,
  handler: updateDocument,
});

export const removeTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_remove',
    description: 'Remove a document by key from a collection.',
    annotations: { destructiveHint: true },
  },
  schema: removeSchema,
  handler: removeDocument,
});
