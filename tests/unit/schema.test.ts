import { describe, it, expect } from 'vitest';
import { InvalidArgumentError, NotFoundError } from '../../src/errors.js';
import {
  compileSchema,
  createSchema,
  SCHEMA_COLLECTION,
  toPath,
  validateAgainst,
  validateDocument,
} from '../../src/tools/schema/index.js';
import { FakeDb } from '../utils/fake-db.js';

const userSchema = {
  type: 'object',
  required: ['name'],
  properties: {
    name: { type: 'string' },
    tags: { type: 'array', items: { type: 'string' } },
  },
};

describe('Schema tools', () => {
  describe('toPath', () => {
    it('should split a JSON pointer into keys and indexes', () => {
      expect(toPath('')).toEqual([]);
      expect(toPath('/items/0/a~1b')).toEqual(['items', 0, 'a/b']);
    });
  });

  describe('compileSchema', () => {
    it('should reuse compiled validators for identical schemas', () => {
      expect(compileSchema({ type: 'string' })).toBe(compileSchema({ type: 'string' }));
    });

    it('should reject an invalid schema', () => {
      expect(() => compileSchema({ type: 'nonsense' })).toThrow(InvalidArgumentError);
      expect(() => compileSchema({ type: 'nonsense' })).toThrow(/^Invalid JSON Schema: /);
    });
  });

  describe('validateAgainst', () => {
    it('should accept a valid document', () => {
      expect(validateAgainst(userSchema, { name: 'Ada', tags: ['x'] })).toEqual({ valid: true });
    });

    it('should report every violation with its path', () => {
      const result = validateAgainst(userSchema, { tags: ['a', 3] });

      expect(result.valid).toBe(false);
      if (result.valid) return;
      expect(result.errors).toHaveLength(2);
      expect(result.errors).toEqual(expect.arrayContaining([
        { message: "must have required property 'name'", path: [], validator: 'required' },
        { message: 'must be string', path: ['tags', 1], validator: 'type' },
      ]));
    });

    it('should check formats', () => {
      expect(validateAgainst({ type: 'string', format: 'email' }, 'nope')).toEqual({
        valid: false,
        errors: [{ message: 'must match format "email"', path: [], validator: 'format' }],
      });
    });
  });

  describe('createSchema', () => {
    it('should store the schema under collection:name', async () => {
      const db = new FakeDb();

      const result = await createSchema(db, { name: 'user', collection: 'users', schema: userSchema });

      expect(result).toEqual({ created: true, key: 'users:user' });
      expect(db.docs(SCHEMA_COLLECTION)).toEqual([
        {
          _id: 'mcp_schemas/users:user',
          _key: 'users:user',
          _rev: '_r1',
          collection: 'users',
          name: 'user',
          schema: userSchema,
        },
      ]);
    });

    it('should replace an existing schema', async () => {
      const db = new FakeDb();
      await createSchema(db, { name: 'user', collection: 'users', schema: userSchema });

      await createSchema(db, { name: 'user', collection: 'users', schema: { type: 'object' } });

      expect(db.docs(SCHEMA_COLLECTION)).toHaveLength(1);
      expect(db.docs(SCHEMA_COLLECTION)[0]?.schema).toEqual({ type: 'object' });
    });

    it('should replace a schema that keeps its $id but changes its body', async () => {
      const db = new FakeDb();
      const first = { $id: 'https://example.test/user.json', type: 'object', required: ['name'] };
      const second = { $id: 'https://example.test/user.json', type: 'object', required: ['name', 'email'] };
      await createSchema(db, { name: 'user', collection: 'users', schema: first });

      await expect(createSchema(db, { name: 'user', collection: 'users', schema: second })).resolves.toEqual({
        created: true,
        key: 'users:user',
      });
      await expect(
        validateDocument(db, { collection: 'users', schema_name: 'user', document: { name: 'Ada' } })
      ).resolves.toEqual({
        valid: false,
        errors: [{ message: "must have required property 'email'", path: [], validator: 'required' }],
      });
    });

    it('should not store a schema that does not compile', async () => {
      const db = new FakeDb();

      await expect(
        createSchema(db, { name: 'bad', collection: 'users', schema: { type: 'nonsense' } })
      ).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(db.collections.has(SCHEMA_COLLECTION)).toBe(false);
    });
  });

  describe('validateDocument', () => {
    it('should validate against a stored schema', async () => {
      const db = new FakeDb();
      await createSchema(db, { name: 'user', collection: 'users', schema: userSchema });

      await expect(
        validateDocument(db, { collection: 'users', schema_name: 'user', document: { name: 'Ada' } })
      ).resolves.toEqual({ valid: true });
    });

    it('should prefer an inline schema', async () => {
      const db = new FakeDb();

      const result = await validateDocument(db, {
        collection: 'users',
        schema_name: 'user',
        schema: { type: 'object', required: ['email'] },
        document: { name: 'Ada' },
      });

      expect(result).toEqual({
        valid: false,
        errors: [{ message: "must have required property 'email'", path: [], validator: 'required' }],
      });
    });

    it('should accept inline schemas that share an $id', async () => {
      const db = new FakeDb();
      const loose = { $id: 'https://example.test/order.json', type: 'object' };
      const strict = { $id: 'https://example.test/order.json', type: 'object', required: ['total'] };

      await expect(validateDocument(db, { collection: 'orders', schema: loose, document: {} })).resolves.toEqual({
        valid: true,
      });
      await expect(validateDocument(db, { collection: 'orders', schema: strict, document: {} })).resolves.toEqual({
        valid: false,
        errors: [{ message: "must have required property 'total'", path: [], validator: 'required' }],
      });
    });

    it('should require a schema or a schema name', async () => {
      await expect(validateDocument(new FakeDb(), { collection: 'users', document: {} })).rejects.toThrow(
        new InvalidArgumentError("Either 'schema' or 'schema_name' must be provided")
      );
    });

    it('should fail when no schemas are stored', async () => {
      await expect(
        validateDocument(new FakeDb(), { collection: 'users', schema_name: 'user', document: {} })
      ).rejects.toThrow(new NotFoundError("No stored schemas found (collection 'mcp_schemas' missing)"));
    });

    it('should fail for an unknown schema name', async () => {
      const db = new FakeDb().addCollection(SCHEMA_COLLECTION);

      await expect(
        validateDocument(db, { collection: 'users', schema_name: 'nope', document: {} })
      ).rejects.toThrow('Stored schema not found: users:nope');
    });
  });
});
