// ============================================================================
// Collection Domain Tools
// ============================================================================
// Listing, creating and backing up collections.
// ============================================================================

import { z } from 'zod';
import type { CollectionProperties, DbHandle } from '../../arango.js';
import { backupCollectionsToDir, type BackupReport } from '../../backup.js';
import { defineTool, type ToolSpec } from '../types.js';

// ============================================================================
// Schemas
// ============================================================================

export const listCollectionsSchema = z.object({});

export const createCollectionSchema = z.object({
  name: z.string().describe('Name of the collection to create'),
  type: z.enum(['document', 'edge']).default('document').describe('Type of collection (document or edge)'),
  waitForSync: z.boolean().optional().describe('Whether to wait for sync to disk'),
});

export const backupSchema = z.object({
  output_dir: z.string().optional()
    .describe('Directory to write backup files (defaults to a timestamped backups/ folder)'),
  collection: z.string().optional().describe('Single collection to back up'),
  collections: z.array(z.string()).optional()
    .describe('Collections to back up (default: all non-system collections)'),
  doc_limit: z.number().int().min(1).optional().describe('Maximum number of documents per collection'),
});

export type CreateCollectionArgs = z.infer<typeof createCollectionSchema>;
export type BackupArgs = z.infer<typeof backupSchema>;

// ============================================================================
// Handlers
// ============================================================================

export async function listCollections(db: DbHandle): Promise<string[]> {
  const collections = await db.listCollections();
  return collections.filter(c => !c.isSystem).map(c => c.name);
}

/** Create the collection unless it exists; either way report its properties. */
export async function createCollection(db: DbHandle, args: CreateCollectionArgs): Promise<CollectionProperties> {
  const collection = (await db.hasCollection(args.name))
    ? db.collection(args.name)
    : await db.createCollection(args.name, { edge: args.type === 'edge', waitForSync: args.waitForSync });

  const props = await collection.properties();
  return {
    name: props.name || args.name,
    type: props.type,
    waitForSync: props.waitForSync,
  };
}

export async function backupCollections(db: DbHandle, args: BackupArgs): Promise<BackupReport> {
  const collections = args.collections && args.collections.length > 0
    ? args.collections
    : args.collection ? [args.collection] : undefined;

  return backupCollectionsToDir(db, {
    outputDir: args.output_dir,
    collections,
    docLimit: args.doc_limit,
  });
}

// ============================================================================
// Tool Specs
// ============================================================================

export const listCollectionsTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_list_collections',
    description: 'List the names of all non-system collections.',
    annotations: { readOnlyHint: true },
  },
  schema: listCollectionsSchema,
  handler: listCollections,
});

export const createCollectionTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_create_collection',
    description: 'Create a document or edge collection, or return the existing one\'s properties.',
    annotations: { idempotentHint: true },
  },
  schema: createCollectionSchema,
  handler: createCollection,
});

export const backupTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_backup',
    description: 'Back up collections to JSON files, one <collection>.json per collection.',
    annotations: { readOnlyHint: true },
  },
  schema: backupSchema,
  aliases: { outputDir: 'output_dir', docLimit: 'doc_limit' },
  handler: backupCollections,
});
