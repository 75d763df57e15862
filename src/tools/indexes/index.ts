// ============================================================================
// Index Domain Tools
// ============================================================================
// List, create and delete collection indexes.
// ============================================================================

import { z } from 'zod';
import type { DbHandle, IndexDescription, IndexSpec } from '../../arango.js';
import { InvalidArgumentError, MissingParameterError, NotFoundError } from '../../errors.js';
import { defineTool, type ToolSpec } from '../types.js';

// ============================================================================
// Schemas
// ============================================================================

export const INDEX_TYPES = ['persistent', 'hash', 'skiplist', 'ttl', 'fulltext', 'geo'] as const;

export const listIndexesSchema = z.object({
  collection: z.string().describe('Collection name to list indexes for'),
});

export const createIndexSchema = z.object({
  collection: z.string().describe('Name of the collection to create the index on'),
  type: z.enum(INDEX_TYPES).default('persistent').describe('Type of index to create'),
  fields: z.array(z.string()).describe('Field paths to index'),
  unique: z.boolean().default(false).describe('Whether the index should enforce uniqueness'),
  sparse: z.boolean().default(false).describe('Whether the index should be sparse (ignore null values)'),
  deduplicate: z.boolean().default(true).describe('Whether to deduplicate array index entries'),
  name: z.string().optional().describe('Custom name for the index'),
  inBackground: z.boolean().optional().describe('Whether to create the index in the background'),
  ttl: z.number().int().optional().describe('TTL seconds (expireAfter) for a ttl index'),
  minLength: z.number().int().optional().describe('Minimum word length for a fulltext index'),
  geoJson: z.boolean().optional().describe('If true, fields are in GeoJSON format (geo index)'),
});

export const deleteIndexSchema = z.object({
  collection: z.string().describe('Name of the collection containing the index'),
  id_or_name: z.string().describe('Index id (e.g. collection/12345) or name'),
});

export type ListIndexesArgs = z.infer<typeof listIndexesSchema>;
export type CreateIndexArgs = z.infer<typeof createIndexSchema>;
export type DeleteIndexArgs = z.infer<typeof deleteIndexSchema>;

// ============================================================================
// Handlers
// ============================================================================

export async function listIndexes(db: DbHandle, args: ListIndexesArgs): Promise<IndexDescription[]> {
  const indexes = await db.collection(args.collection).indexes();
  return indexes.map(ix => ({
    id: ix.id,
    type: ix.type,
    fields: ix.fields,
    unique: ix.unique,
    sparse: ix.sparse,
    name: ix.name,
    selectivityEstimate: ix.selectivityEstimate,
  }));
}

/**
 * Map tool arguments to an index definition. hash and skiplist are
 * persistent indexes under another name.
 */
export function toIndexSpec(args: CreateIndexArgs): IndexSpec {
  const { fields, name, inBackground } = args;

  switch (args.type) {
    case 'persistent':
    case 'hash':
    case 'skiplist':
      if (fields.length === 0) {
        throw new InvalidArgumentError(`${args.type} index requires at least one field in 'fields'`);
      }
      return {
        type: 'persistent',
        fields,
        unique: args.unique,
        sparse: args.sparse,
        deduplicate: args.deduplicate,
        name,
        inBackground,
      };
    case 'ttl':
      if (fields.length !== 1) {
        throw new InvalidArgumentError("TTL index requires exactly one field in 'fields'");
      }
      if (args.ttl === undefined) {
        throw new MissingParameterError('ttl');
      }
      return { type: 'ttl', field: fields[0], expireAfter: args.ttl, name, inBackground };
    case 'fulltext':
      if (fields.length !== 1) {
        throw new InvalidArgumentError("Fulltext index requires exactly one field in 'fields'");
      }
      return { type: 'fulltext', field: fields[0], minLength: args.minLength, name, inBackground };
    case 'geo': {
      const [first, second] = fields;
      if (first === undefined || fields.length > 2) {
        throw new InvalidArgumentError("Geo index requires one or two fields in 'fields'");
      }
      const geoFields: [string] | [string, string] = second === undefined ? [first] : [first, second];
      return { type: 'geo', fields: geoFields, geoJson: args.geoJson, name, inBackground };
    }
  }
}

export async function createIndex(db: DbHandle, args: CreateIndexArgs): Promise<Omit<IndexDescription, 'selectivityEstimate'>> {
  const created = await db.collection(args.collection).ensureIndex(toIndexSpec(args));
  return {
    id: created.id,
    type: created.type,
    fields: created.fields,
    unique: created.unique,
    sparse: created.sparse,
    name: created.name,
  };
}

/**
 * Resolve an index name to its id. Ids contain a slash; a bare id is
 * qualified with the collection name.
 */
export async function resolveIndexId(db: DbHandle, collection: string, idOrName: string): Promise<string> {
  let id = idOrName;
  if (!idOrName.includes('/')) {
    const indexes = await db.collection(collection).indexes();
    const match = indexes.find(ix => ix.name === idOrName);
    if (!match) {
      throw new NotFoundError(`Index with name '${idOrName}' not found in collection '${collection}'`);
    }
    id = match.id;
  }
  return id.includes('/') ? id : `${collection}/${id}`;
}

export async function deleteIndex(
  db: DbHandle,
  args: DeleteIndexArgs
): Promise<{ deleted: true; id: string; result: unknown }> {
  const id = await resolveIndexId(db, args.collection, args.id_or_name);
  const result = await db.collection(args.collection).dropIndex(id);
  return { deleted: true, id, result };
}

// ============================================================================
// Tool Specs
// ============================================================================

export const listIndexesTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_list_indexes',
    description: 'List indexes of a collection (id, type, fields, unique, sparse, name, selectivityEstimate).',
    annotations: { readOnlyHint: true },
  },
  schema: listIndexesSchema,
  handler: listIndexes,
});

export const createIndexTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_create_index',
    description: 'Create an index on a collection: persistent (hash, skiplist), ttl, fulltext or geo.',
  },
  schema: createIndexSchema,
  aliases: { in_background: 'inBackground', expireAfter: 'ttl' },
  handler: createIndex,
});

export const deleteIndexTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_delete_index',
    description: 'Delete an index by id (collection/12345) or by name.',
    annotations: { destructiveHint: true },
  },
  schema: deleteIndexSchema,
  handler: deleteIndex,
});
