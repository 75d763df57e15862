// ============================================================================
// Validation & Bulk Domain Tools
// ============================================================================
// Reference checks (fields holding document ids) and batched writes.
// ============================================================================

import { z } from 'zod';
import type { BatchItemResult, DbHandle, Document, DocumentMeta, OperationFailure } from '../../arango.js';
import { errorMessage, MissingParameterError } from '../../errors.js';
import { logger } from '../../config.js';
import { isRecord } from '../shared/index.js';
import { defineTool, type ToolSpec } from '../types.js';

// ============================================================================
// Schemas
// ============================================================================

const onError = z.enum(['stop', 'continue', 'ignore']).default('stop')
  .describe("'stop' ends at the first failing batch; 'continue' and 'ignore' go on");
const batchSize = z.number().int().min(1).default(1000).describe('Documents per batch');

export const validateReferencesSchema = z.object({
  collection: z.string().describe('Collection whose documents are checked'),
  reference_fields: z.array(z.string()).describe('Fields holding document ids (e.g. users/123)'),
  fix_invalid: z.boolean().default(false).describe('Remove documents with invalid references'),
});

export const insertWithValidationSchema = z.object({
  collection: z.string().describe('Target collection'),
  document: z.record(z.unknown()).describe('Document to insert'),
  reference_fields: z.array(z.string()).default([]).describe('Fields that must reference existing documents'),
});

export const bulkInsertSchema = z.object({
  collection: z.string().describe('Target collection'),
  documents: z.array(z.record(z.unknown())).describe('Documents to insert'),
  validate_refs: z.boolean().default(false).describe('Check every *_id field references an existing document'),
  batch_size: batchSize,
  on_error: onError,
});

export const bulkUpdateSchema = z.object({
  collection: z.string().describe('Target collection'),
  updates: z.array(z.record(z.unknown()))
    .describe("Items of { key | _key, update } or { key | _key, ...fields }"),
  batch_size: batchSize,
  on_error: onError,
});

export type ValidateReferencesArgs = z.infer<typeof validateReferencesSchema>;
export type InsertWithValidationArgs = z.infer<typeof insertWithValidationSchema>;
export type BulkInsertArgs = z.infer<typeof bulkInsertSchema>;
export type BulkUpdateArgs = z.infer<typeof bulkUpdateSchema>;

// ============================================================================
// Types
// ============================================================================

export interface InvalidReference {
  field: string;
  value: unknown;
}

export interface ReferenceReport {
  total_checked: number;
  invalid_count: number;
  invalid_documents: unknown[];
  validation_passed: boolean;
  removed_count?: number;
}

export interface BatchError {
  batch_start: number;
  batch_size: number;
  error: string;
}

export interface DocumentError {
  index: number;
  error: string;
  invalid_references?: InvalidReference[];
}

export interface BulkInsertReport {
  total_documents: number;
  inserted_count: number;
  error_count: number;
  errors: Array<BatchError | DocumentError>;
  inserted_ids: string[];
  success_rate: number;
}

export interface BulkUpdateReport {
  total_updates: number;
  updated_count: number;
  error_count: number;
  errors: Array<BatchError | DocumentError>;
}

const MAX_REPORTED_DOCUMENTS = 100;

// ============================================================================
// AQL
// ============================================================================

const COLLECTION_REFERENCES_AQL = `FOR doc IN @@collection
  LET invalid_refs = (
    FOR field IN @fields
      LET ref = DOCUMENT(doc[field])
      FILTER ref == null AND doc[field] != null
      RETURN { field: field, value: doc[field] }
  )
  FILTER LENGTH(invalid_refs) > 0
  RETURN { _id: doc._id, _key: doc._key, invalid_references: invalid_refs }`;

// One row per item, aligned with @items
const ITEM_REFERENCES_AQL = `FOR item IN @items
  RETURN (
    FOR field IN item.fields
      LET ref = DOCUMENT(item.doc[field])
      FILTER ref == null AND item.doc[field] != null
      RETURN { field: field, value: item.doc[field] }
  )`;

// ============================================================================
// Helpers
// ============================================================================

function isFailure(result: BatchItemResult): result is OperationFailure {
  return 'error' in result;
}

function toInvalidReferences(row: unknown): InvalidReference[] {
  if (!Array.isArray(row)) return [];
  return row.filter(isRecord).map(r => ({ field: String(r.field), value: r.value }));
}

/** `*_id` fields holding strings, other than the document's own `_id` */
export function referenceFieldsOf(document: Document): string[] {
  return Object.keys(document).filter(
    key => key !== '_id' && key.endsWith('_id') && typeof document[key] === 'string'
  );
}

/**
 * Check reference fields of several documents in one query. Returns the
 * invalid references per document, in input order.
 */
export async function findInvalidReferences(
  db: DbHandle,
  items: Array<{ doc: Document; fields: string[] }>
): Promise<InvalidReference[][]> {
  if (items.every(item => item.fields.length === 0)) {
    return items.map(() => []);
  }
  const rows = await db.query(ITEM_REFERENCES_AQL, { items });
  return items.map((_, i) => toInvalidReferences(rows[i]));
}

function chunk<T>(items: T[], size: number): Array<{ start: number; items: T[] }> {
  const chunks: Array<{ start: number; items: T[] }> = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push({ start, items: items.slice(start, start + size) });
  }
  return chunks;
}

// ============================================================================
// Handlers
// ============================================================================

export async function validateReferences(db: DbHandle, args: ValidateReferencesArgs): Promise<ReferenceReport> {
  const collection = db.collection(args.collection);
  const invalid = await db.query(COLLECTION_REFERENCES_AQL, {
    '@collection': args.collection,
    fields: args.reference_fields,
  });

  const report: ReferenceReport = {
    total_checked: await collection.count(),
    invalid_count: invalid.length,
    invalid_documents: invalid.slice(0, MAX_REPORTED_DOCUMENTS),
    validation_passed: invalid.length === 0,
  };

  if (args.fix_invalid && invalid.length > 0) {
    const keys = invalid.filter(isRecord).map(doc => String(doc._key));
    try {
      const results = await collection.removeMany(keys);
      report.removed_count = results.filter(r => !isFailure(r)).length;
    } catch (err) {
      logger.warn(`validate_references: removing invalid documents failed: ${errorMessage(err)}`);
      report.removed_count = 0;
    }
  }
  return report;
}

export async function insertWithValidation(
  db: DbHandle,
  args: InsertWithValidationArgs
): Promise<DocumentMeta | { error: string; invalid_references: InvalidReference[] }> {
  if (args.reference_fields.length > 0) {
    const [invalid] = await findInvalidReferences(db, [{ doc: args.document, fields: args.reference_fields }]);
    if (invalid.length > 0) {
      return { error: 'Invalid references', invalid_references: invalid };
    }
  }
  return db.collection(args.collection).insert(args.document);
}

export async function bulkInsert(db: DbHandle, args: BulkInsertArgs): Promise<BulkInsertReport> {
  const collection = db.collection(args.collection);
  const report: BulkInsertReport = {
    total_documents: args.documents.length,
    inserted_count: 0,
    error_count: 0,
    errors: [],
    inserted_ids: [],
    success_rate: 0,
  };

  for (const batch of chunk(args.documents, args.batch_size)) {
    let failed = false;
    try {
      let pending = batch.items.map((doc, i) => ({ doc, index: batch.start + i }));

      if (args.validate_refs) {
        const invalid = await findInvalidReferences(
          db,
          pending.map(p => ({ doc: p.doc, fields: referenceFieldsOf(p.doc) }))
        );
        pending = pending.filter((p, i) => {
          if (invalid[i].length === 0) return true;
          report.error_count++;
          report.errors.push({ index: p.index, error: 'Invalid references', invalid_references: invalid[i] });
          failed = true;
          return false;
        });
      }

      if (pending.length > 0) {
        const results = await collection.insertMany(pending.map(p => p.doc));
        results.forEach((result, i) => {
          if (isFailure(result)) {
            report.error_count++;
            report.errors.push({ index: pending[i].index, error: result.message });
            failed = true;
          } else {
            report.inserted_count++;
            report.inserted_ids.push(result._id);
          }
        });
      }
    } catch (err) {
      report.error_count += batch.items.length;
      report.errors.push({ batch_start: batch.start, batch_size: batch.items.length, error: errorMessage(err) });
      failed = true;
    }
    if (failed && args.on_error === 'stop') break;
  }

  report.success_rate = report.total_documents > 0 ? report.inserted_count / report.total_documents : 0;
  return report;
}

/**
 * Normalize update items to `{ _key, ...fields }`. Each item names its
 * document with `key` or `_key`, and carries either an `update` object or
 * the fields themselves.
 */
export function normalizeUpdates(updates: Document[]): Array<Document & { _key: string }> {
  return updates.map(item => {
    const { key, _key, update, ...rest } = item;
    const target = key ?? _key;
    if (typeof target !== 'string' && typeof target !== 'number') {
      throw new MissingParameterError('key');
    }
    const fields = isRecord(update) && Object.keys(update).length > 0 ? update : rest;
    return { ...fields, _key: String(target) };
  });
}

export async function bulkUpdate(db: DbHandle, args: BulkUpdateArgs): Promise<BulkUpdateReport> {
  const collection = db.collection(args.collection);
  const normalized = normalizeUpdates(args.updates);
  const report: BulkUpdateReport = {
    total_updates: normalized.length,
    updated_count: 0,
    error_count: 0,
    errors: [],
  };

  for (const batch of chunk(normalized, args.batch_size)) {
    let failed = false;
    try {
      const results = await collection.updateMany(batch.items);
      results.forEach((result, i) => {
        if (isFailure(result)) {
          report.error_count++;
          report.errors.push({ index: batch.start + i, error: result.message });
          failed = true;
        } else {
          report.updated_count++;
        }
      });
    } catch (err) {
      report.error_count += batch.items.length;
      report.errors.push({ batch_start: batch.start, batch_size: batch.items.length, error: errorMessage(err) });
      failed = true;
    }
    if (failed && args.on_error === 'stop') break;
  }
  return report;
}

// ============================================================================
// Tool Specs
// ============================================================================

export const validateReferencesTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_validate_references',
    description: 'Report documents whose reference fields point at missing documents; optionally remove them.',
  },
  schema: validateReferencesSchema,
  handler: validateReferences,
});

export const insertWithValidationTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_insert_with_validation',
    description: 'Insert a document only if all of its reference fields point at existing documents.',
  },
  schema: insertWithValidationSchema,
  handler: insertWithValidation,
});

export const bulkInsertTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_bulk_insert',
    description: 'Insert many documents in batches, with optional reference validation.',
  },
  schema: bulkInsertSchema,
  handler: bulkInsert,
});

export const bulkUpdateTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_bulk_update',
    description: 'Update many documents by key in batches.',
  },
  schema: bulkUpdateSchema,
  handler: bulkUpdate,
});
