import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { backupCollections, createCollection, listCollections } from '../../src/tools/collections/index.js';
import { createTestContext, cleanupTestContext, type TestContext } from '../utils/test-context.js';
import { dumpQueries, FakeDb } from '../utils/fake-db.js';

describe('Collection tools', () => {
  describe('listCollections', () => {
    it('should list non-system collection names', async () => {
      const db = new FakeDb().addCollection('users').addCollection('_graphs').addCollection('orders');

      await expect(listCollections(db)).resolves.toEqual(['users', 'orders']);
    });
  });

  describe('createCollection', () => {
    it('should create a document collection', async () => {
      const db = new FakeDb();

      const props = await createCollection(db, { name: 'users', type: 'document' });

      expect(props).toEqual({ name: 'users', type: 'document', waitForSync: false });
      expect(db.collections.has('users')).toBe(true);
    });

    it('should create an edge collection with waitForSync', async () => {
      const db = new FakeDb();

      const props = await createCollection(db, { name: 'follows', type: 'edge', waitForSync: true });

      expect(props).toEqual({ name: 'follows', type: 'edge', waitForSync: true });
    });

    it('should return the existing collection unchanged', async () => {
      const db = new FakeDb().addCollection('follows', [], 'edge');

      const props = await createCollection(db, { name: 'follows', type: 'document' });

      expect(props.type).toBe('edge');
    });
  });

  describe('backupCollections', () => {
    let ctx: TestContext;

    beforeEach(async () => {
      ctx = await createTestContext();
    });

    afterEach(async () => {
      await cleanupTestContext(ctx);
    });

    it('should back up a single named collection', async () => {
      const db = new FakeDb().addCollection('users', [{ _key: 'a' }]).addCollection('orders', [{ _key: 'o' }]);
      db.onQuery = dumpQueries(db);

      const report = await backupCollections(db, { output_dir: ctx.rootDir, collection: 'orders' });

      expect(report.written.map(w => w.collection)).toEqual(['orders']);
      const files = await fs.readdir(ctx.rootDir);
      expect(files).toEqual(['orders.json']);
    });

    it('should prefer the collections list over a single collection', async () => {
      const db = new FakeDb().addCollection('users').addCollection('orders');
      db.onQuery = dumpQueries(db);

      const report = await backupCollections(db, {
        output_dir: ctx.rootDir,
        collection: 'orders',
        collections: ['users'],
      });

      expect(report.written.map(w => w.collection)).toEqual(['users']);
    });

    it('should pass the document limit through', async () => {
      const db = new FakeDb().addCollection('users', [{ _key: 'a' }, { _key: 'b' }, { _key: 'c' }]);
      db.onQuery = dumpQueries(db);

      const report = await backupCollections(db, { output_dir: path.join(ctx.rootDir, 'out'), doc_limit: 2 });

      expect(report.total_documents).toBe(2);
      expect(db.queries[0]).toEqual({
        aql: 'FOR d IN @@collection LIMIT @limit RETURN d',
        bindVars: { '@collection': 'users', limit: 2 },
      });
    });
  });
});
