// ============================================================================
// ArangoDB Client
// ============================================================================
// DbHandle is the only database surface tool handlers see. ArangoHandle
// implements it on arangojs; tests implement it in memory.
//
// Every driver call goes through guard(), so a driver, network or timeout
// failure always reaches the kernel as a DatabaseOperationError.
// ============================================================================

import { Database } from 'arangojs';
import type { Config } from './config.js';
import { log } from './config.js';
import { DatabaseOperationError, errorMessage } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export type Document = Record<string, unknown>;

export interface DocumentMeta {
  _id: string;
  _key: string;
  _rev: string;
}

/** Per-document failure inside a batch operation */
export interface OperationFailure {
  error: true;
  message: string;
  code?: number;
}

export type BatchItemResult = DocumentMeta | OperationFailure;

export interface CollectionSummary {
  name: string;
  isSystem: boolean;
}

export interface CollectionProperties {
  name: string;
  type: 'document' | 'edge';
  waitForSync?: boolean;
}

export interface IndexDescription {
  id: string;
  type: string;
  name?: string;
  fields?: unknown;
  unique?: boolean;
  sparse?: boolean;
  selectivityEstimate?: number;
}

interface IndexOptionsBase {
  name?: string;
  inBackground?: boolean;
}

export type IndexSpec =
  | (IndexOptionsBase & {
      type: 'persistent';
      fields: string[];
      unique: boolean;
      sparse: boolean;
      deduplicate: boolean;
    })
  | (IndexOptionsBase & { type: 'ttl'; field: string; expireAfter: number })
  | (IndexOptionsBase & { type: 'fulltext'; field: string; minLength?: number })
  | (IndexOptionsBase & { type: 'geo'; fields: [string] | [string, string]; geoJson?: boolean });

export interface ExplainResult {
  plans: unknown[];
  warnings: unknown[];
  stats: unknown;
}

export interface EdgeDefinitionSpec {
  edge_collection: string;
  from_collections: string[];
  to_collections: string[];
}

export interface GraphSummary {
  name: string;
  edge_definitions: EdgeDefinitionSpec[];
  orphan_collections: string[];
}

export interface CollectionHandle {
  readonly name: string;
  exists(): Promise<boolean>;
  insert(document: Document): Promise<DocumentMeta>;
  update(key: string, patch: Document): Promise<DocumentMeta>;
  replace(key: string, document: Document): Promise<DocumentMeta>;
  remove(key: string): Promise<DocumentMeta>;
  /** Fetch a document by key; null when it doesn't exist */
  get(key: string): Promise<Document | null>;
  count(): Promise<number>;
  properties(): Promise<CollectionProperties>;
  indexes(): Promise<IndexDescription[]>;
  ensureIndex(spec: IndexSpec): Promise<IndexDescription>;
  dropIndex(id: string): Promise<unknown>;
  insertMany(documents: Document[]): Promise<BatchItemResult[]>;
  /** Each patch carries its target `_key` */
  updateMany(patches: Array<Document & { _key: string }>): Promise<BatchItemResult[]>;
  removeMany(keys: string[]): Promise<BatchItemResult[]>;
}

export interface GraphHandle {
  readonly name: string;
  create(edgeDefinitions: EdgeDefinitionSpec[]): Promise<void>;
  addVertexCollection(collection: string): Promise<void>;
  addEdgeDefinition(definition: EdgeDefinitionSpec): Promise<void>;
}

export interface DbHandle {
  query(aql: string, bindVars?: Record<string, unknown>): Promise<unknown[]>;
  explain(aql: string, bindVars: Record<string, unknown>, maxPlans: number): Promise<ExplainResult>;
  /** Non-system collections only */
  listCollections(): Promise<CollectionSummary[]>;
  hasCollection(name: string): Promise<boolean>;
  collection(name: string): CollectionHandle;
  createCollection(name: string, options: { edge: boolean; waitForSync?: boolean }): Promise<CollectionHandle>;
  hasGraph(name: string): Promise<boolean>;
  graph(name: string): GraphHandle;
  listGraphs(): Promise<GraphSummary[]>;
  close(): Promise<void>;
}

/** Produces a live handle or throws. */
export type Connector = () => Promise<DbHandle>;

// ============================================================================
// Helpers
// ============================================================================

async function guard<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (err) {
    throw new DatabaseOperationError(errorMessage(err), { cause: err });
  }
}

function toRecord(value: object): Record<string, unknown> {
  return { ...value };
}

function toMeta(result: object): DocumentMeta {
  const raw = toRecord(result);
  return {
    _id: String(raw._id ?? ''),
    _key: String(raw._key ?? ''),
    _rev: String(raw._rev ?? ''),
  };
}

function toBatchItem(result: object): BatchItemResult {
  const raw = toRecord(result);
  if (raw.error === true) {
    return {
      error: true,
      message: typeof raw.errorMessage === 'string' ? raw.errorMessage : 'Unknown error',
      code: typeof raw.errorNum === 'number' ? raw.errorNum : undefined,
    };
  }
  return toMeta(result);
}

function toIndexDescription(index: object): IndexDescription {
  const raw = toRecord(index);
  return {
    id: String(raw.id ?? ''),
    type: String(raw.type ?? ''),
    name: typeof raw.name === 'string' ? raw.name : undefined,
    fields: raw.fields,
    unique: typeof raw.unique === 'boolean' ? raw.unique : undefined,
    sparse: typeof raw.sparse === 'boolean' ? raw.sparse : undefined,
    selectivityEstimate: typeof raw.selectivityEstimate === 'number' ? raw.selectivityEstimate : undefined,
  };
}

function toEdgeDefinitionOptions(definition: EdgeDefinitionSpec) {
  return {
    collection: definition.edge_collection,
    from: definition.from_collections,
    to: definition.to_collections,
  };
}

// ============================================================================
// arangojs Adapter
// ============================================================================

class ArangoCollection implements CollectionHandle {
  constructor(private readonly db: Database, readonly name: string) {}

  private get col() {
    return this.db.collection(this.name);
  }

  exists(): Promise<boolean> {
    return guard(() => this.col.exists());
  }

  insert(document: Document): Promise<DocumentMeta> {
    return guard(async () => toMeta(await this.col.save(document)));
  }

  update(key: string, patch: Document): Promise<DocumentMeta> {
    return guard(async () => toMeta(await this.col.update(key, patch)));
  }

  replace(key: string, document: Document): Promise<DocumentMeta> {
    return guard(async () => toMeta(await this.col.replace(key, document)));
  }

  remove(key: string): Promise<DocumentMeta> {
    return guard(async () => toMeta(await this.col.remove(key)));
  }

  get(key: string): Promise<Document | null> {
    return guard(async () => {
      if (!(await this.col.documentExists(key))) return null;
      return toRecord(await this.col.document(key));
    });
  }

  count(): Promise<number> {
    return guard(async () => (await this.col.count()).count);
  }

  properties(): Promise<CollectionProperties> {
    return guard(async () => {
      const props = await this.col.properties();
      return {
        name: props.name,
        // 2 = document collection, 3 = edge collection
        type: Number(props.type) === 3 ? 'edge' : 'document',
        waitForSync: props.waitForSync,
      };
    });
  }

  indexes(): Promise<IndexDescription[]> {
    return guard(async () => (await this.col.indexes()).map(toIndexDescription));
  }

  ensureIndex(spec: IndexSpec): Promise<IndexDescription> {
    return guard(async () => {
      const { name, inBackground } = spec;
      switch (spec.type) {
        case 'persistent':
          return toIndexDescription(await this.col.ensureIndex({
            type: 'persistent',
            fields: spec.fields,
            unique: spec.unique,
            sparse: spec.sparse,
            deduplicate: spec.deduplicate,
            name,
            inBackground,
          }));
        case 'ttl':
          return toIndexDescription(await this.col.ensureIndex({
            type: 'ttl',
            fields: [spec.field],
            expireAfter: spec.expireAfter,
            name,
            inBackground,
          }));
        case 'fulltext':
          return toIndexDescription(await this.col.ensureIndex({
            type: 'fulltext',
            fields: [spec.field],
            minLength: spec.minLength,
            name,
            inBackground,
          }));
        case 'geo':
          return toIndexDescription(await this.col.ensureIndex({
            type: 'geo',
            fields: spec.fields,
            geoJson: spec.geoJson,
            name,
            inBackground,
          }));
      }
    });
  }

  dropIndex(id: string): Promise<unknown> {
    return guard(() => this.col.dropIndex(id));
  }

  insertMany(documents: Document[]): Promise<BatchItemResult[]> {
    return guard(async () => (await this.col.saveAll(documents, { waitForSync: true })).map(toBatchItem));
  }

  updateMany(patches: Array<Document & { _key: string }>): Promise<BatchItemResult[]> {
    return guard(async () => {
      const results = await this.col.updateAll(patches, {
        keepNull: true,
        mergeObjects: true,
        waitForSync: true,
      });
      return results.map(toBatchItem);
    });
  }

  removeMany(keys: string[]): Promise<BatchItemResult[]> {
    return guard(async () => (await this.col.removeAll(keys)).map(toBatchItem));
  }
}

class ArangoGraph implements GraphHandle {
  constructor(private readonly db: Database, readonly name: string) {}

  create(edgeDefinitions: EdgeDefinitionSpec[]): Promise<void> {
    return guard(async () => {
      await this.db.graph(this.name).create(edgeDefinitions.map(toEdgeDefinitionOptions));
    });
  }

  addVertexCollection(collection: string): Promise<void> {
    return guard(async () => {
      await this.db.graph(this.name).addVertexCollection(collection);
    });
  }

  addEdgeDefinition(definition: EdgeDefinitionSpec): Promise<void> {
    return guard(async () => {
      await this.db.graph(this.name).addEdgeDefinition(toEdgeDefinitionOptions(definition));
    });
  }
}

export class ArangoHandle implements DbHandle {
  constructor(private readonly db: Database, private readonly maxRuntimeSec?: number) {}

  query(aql: string, bindVars: Record<string, unknown> = {}): Promise<unknown[]> {
    return guard(async () => {
      const options = this.maxRuntimeSec ? { maxRuntime: this.maxRuntimeSec } : {};
      const cursor = await this.db.query(aql, bindVars, options);
      return cursor.all();
    });
  }

  explain(aql: string, bindVars: Record<string, unknown>, maxPlans: number): Promise<ExplainResult> {
    return guard(async () => {
      const explained = await this.db.explain(aql, bindVars, {
        allPlans: true,
        maxNumberOfPlans: maxPlans,
      });
      return {
        plans: explained.plans ?? [],
        warnings: explained.warnings ?? [],
        stats: explained.stats ?? {},
      };
    });
  }

  listCollections(): Promise<CollectionSummary[]> {
    return guard(async () => {
      const collections = await this.db.listCollections(true);
      return collections.map(c => ({ name: c.name, isSystem: c.isSystem }));
    });
  }

  hasCollection(name: string): Promise<boolean> {
    return guard(() => this.db.collection(name).exists());
  }

  collection(name: string): CollectionHandle {
    return new ArangoCollection(this.db, name);
  }

  createCollection(name: string, options: { edge: boolean; waitForSync?: boolean }): Promise<CollectionHandle> {
    return guard(async () => {
      const createOptions = options.waitForSync !== undefined ? { waitForSync: options.waitForSync } : {};
      if (options.edge) {
        await this.db.createEdgeCollection(name, createOptions);
      } else {
        await this.db.createCollection(name, createOptions);
      }
      return this.collection(name);
    });
  }

  hasGraph(name: string): Promise<boolean> {
    return guard(() => this.db.graph(name).exists());
  }

  graph(name: string): GraphHandle {
    return new ArangoGraph(this.db, name);
  }

  listGraphs(): Promise<GraphSummary[]> {
    return guard(async () => {
      const graphs = await this.db.listGraphs();
      return graphs.map(g => ({
        name: g.name,
        edge_definitions: g.edgeDefinitions.map(ed => ({
          edge_collection: ed.collection,
          from_collections: ed.from,
          to_collections: ed.to,
        })),
        orphan_collections: g.orphanCollections,
      }));
    });
  }

  async close(): Promise<void> {
    this.db.close();
  }
}

// ============================================================================
// Connector
// ============================================================================

/**
 * Build a connector for the configured server. A Database object connects
 * lazily, so each attempt probes the server with version() before handing
 * the handle out.
 */
export function createArangoConnector(config: Config): Connector {
  return async () => {
    const db = new Database({
      url: config.arangoUrl,
      databaseName: config.database,
      auth: { username: config.username, password: config.password },
    });
    try {
      const info = await db.version();
      log(`Connected to ArangoDB ${info.version} at ${config.arangoUrl} db=${config.database}`);
    } catch (err) {
      db.close();
      throw err;
    }
    const maxRuntimeSec = config.requestTimeoutMs > 0 ? config.requestTimeoutMs / 1000 : undefined;
    return new ArangoHandle(db, maxRuntimeSec);
  };
}
