// ============================================================================
// Schema Domain Tools
// ============================================================================
// Named JSON Schemas (draft-07) stored in the `mcp_schemas` collection under
// the key `<collection>:<name>`, and document validation against them.
// ============================================================================

import { z } from 'zod';
import AjvModule, { type ErrorObject, type ValidateFunction } from 'ajv';
import addFormatsModule from 'ajv-formats';
import type { DbHandle, Document } from '../../arango.js';
import { errorMessage, InvalidArgumentError, NotFoundError } from '../../errors.js';
import { isRecord } from '../shared/index.js';
import { defineTool, type ToolSpec } from '../types.js';

export const SCHEMA_COLLECTION = 'mcp_schemas';

// ============================================================================
// Validator
// ============================================================================

// Both packages are CommonJS with the export on .default
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

// Schemas are compiled one at a time and never referenced by $id from another
// schema, so ajv keeps no $id registry: a changed schema may reuse its $id.
const ajv = new Ajv({ allErrors: true, strict: false, addUsedSchema: false });
addFormats(ajv);

const MAX_SCHEMA_CACHE = 200;
const schemaCache = new Map<string, { schema: Record<string, unknown>; validate: ValidateFunction }>();

/**
 * Compile a schema, reusing the compiled validator for identical schemas.
 * Throws InvalidArgumentError for a schema ajv rejects.
 */
export function compileSchema(schema: Record<string, unknown>): ValidateFunction {
  const key = JSON.stringify(schema);
  const cached = schemaCache.get(key);
  if (cached) return cached.validate;

  let validate: ValidateFunction;
  try {
    validate = ajv.compile(schema);
  } catch (err) {
    ajv.removeSchema(schema);
    throw new InvalidArgumentError(`Invalid JSON Schema: ${errorMessage(err)}`);
  }

  if (schemaCache.size >= MAX_SCHEMA_CACHE) {
    for (const [oldestKey, oldest] of schemaCache) {
      schemaCache.delete(oldestKey);
      ajv.removeSchema(oldest.schema);
      break;
    }
  }
  schemaCache.set(key, { schema, validate });
  return validate;
}

export interface SchemaViolation {
  message: string;
  /** Location in the document: property names and array indexes */
  path: Array<string | number>;
  /** The schema keyword that failed, e.g. "required" or "type" */
  validator: string;
}

/** `/items/0/name` -> ['items', 0, 'name'] */
export function toPath(instancePath: string): Array<string | number> {
  if (instancePath === '') return [];
  return instancePath
    .slice(1)
    .split('/')
    .map(segment => segment.replace(/~1/g, '/').replace(/~0/g, '~'))
    .map(segment => (/^\d+$/.test(segment) ? Number(segment) : segment));
}

function toViolation(error: ErrorObject): SchemaViolation {
  return {
    message: error.message ?? 'validation failed',
    path: toPath(error.instancePath),
    validator: error.keyword,
  };
}

export function validateAgainst(
  schema: Record<string, unknown>,
  document: unknown
): { valid: true } | { valid: false; errors: SchemaViolation[] } {
  const validate = compileSchema(schema);
  if (validate(document)) return { valid: true };
  return { valid: false, errors: (validate.errors ?? []).map(toViolation) };
}

// ============================================================================
// Schemas
// ============================================================================

export const createSchemaSchema = z.object({
  name: z.string().describe('Schema name'),
  collection: z.string().describe('Collection the schema applies to'),
  schema: z.record(z.unknown()).describe('JSON Schema draft-07 document'),
});

export const validateDocumentSchema = z.object({
  collection: z.string().describe('Collection the stored schema belongs to'),
  document: z.record(z.unknown()).describe('Document to validate'),
  schema_name: z.string().optional().describe('Name of a stored schema to use'),
  schema: z.record(z.unknown()).optional().describe('Inline JSON Schema; wins over schema_name'),
});

export type CreateSchemaArgs = z.infer<typeof createSchemaSchema>;
export type ValidateDocumentArgs = z.infer<typeof validateDocumentSchema>;

export function schemaKey(collection: string, name: string): string {
  return `${collection}:${name}`;
}

// ============================================================================
// Handlers
// ============================================================================

export async function createSchema(db: DbHandle, args: CreateSchemaArgs): Promise<{ created: true; key: string }> {
  compileSchema(args.schema);

  const key = schemaKey(args.collection, args.name);
  if (!(await db.hasCollection(SCHEMA_COLLECTION))) {
    await db.createCollection(SCHEMA_COLLECTION, { edge: false });
  }

  const col = db.collection(SCHEMA_COLLECTION);
  const doc: Document = { _key: key, collection: args.collection, name: args.name, schema: args.schema };
  if (await col.get(key)) {
    await col.replace(key, doc);
  } else {
    await col.insert(doc);
  }
  return { created: true, key };
}

async function loadStoredSchema(db: DbHandle, collection: string, name: string): Promise<Record<string, unknown>> {
  if (!(await db.hasCollection(SCHEMA_COLLECTION))) {
    throw new NotFoundError(`No stored schemas found (collection '${SCHEMA_COLLECTION}' missing)`);
  }
  const key = schemaKey(collection, name);
  const stored = await db.collection(SCHEMA_COLLECTION).get(key);
  if (!stored) {
    throw new NotFoundError(`Stored schema not found: ${key}`);
  }
  if (!isRecord(stored.schema)) {
    throw new InvalidArgumentError(`Stored schema '${key}' is not a JSON Schema object`);
  }
  return stored.schema;
}

export async function validateDocument(db: DbHandle, args: ValidateDocumentArgs) {
  let schema = args.schema;
  if (!schema) {
    if (!args.schema_name) {
      throw new InvalidArgumentError("Either 'schema' or 'schema_name' must be provided");
    }
    schema = await loadStoredSchema(db, args.collection, args.schema_name);
  }
  return validateAgainst(schema, args.document);
}

// ============================================================================
// Tool Specs
// ============================================================================

export const createSchemaTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_create_schema',
    description: `Create or replace a named JSON Schema for a collection (stored in '${SCHEMA_COLLECTION}').`,
    annotations: { idempotentHint: true },
  },
  schema: createSchemaSchema,
  aliases: { schema_def: 'schema' },
  handler: createSchema,
});

export const validateDocumentTool: ToolSpec = defineTool({
  definition: {
    name: 'arango_validate_document',
    description: 'Validate a document against an inline or stored JSON Schema.',
    annotations: { readOnlyHint: true },
  },
  schema: validateDocumentSchema,
  aliases: { schema_def: 'schema' },
  handler: validateDocument,
});
