import mongoose from 'mongoose';
import { describe, expect, it } from 'vitest';
import { decodeCursor } from './cursor';
import {
  MongoDocumentStore,
  afterPosition,
  conditionFilter,
  failedOperations,
  type ItemCollection,
  type ReplaceOperation,
} from './mongoStore';
import { ConditionalCheckFailedError, type StoreItem } from './types';

type Filter = Parameters<ItemCollection['find']>[0];
type Row = Record<string, unknown>;

// Records what the store asks of the collection and answers with canned results.
class FakeCollection implements ItemCollection {
  readonly calls: Array<{ method: string; args: unknown[] }> = [];
  matchedCount = 1;
  deletedCount = 1;
  insertFailure: Error | undefined;
  bulkFailure: Error | undefined;
  rows: Row[] = [];

  async replaceOne(filter: Filter, replacement: StoreItem, options?: { upsert?: boolean }) {
    this.calls.push({ method: 'replaceOne', args: [filter, replacement, options] });
    return { matchedCount: this.matchedCount };
  }

  async insertOne(document: StoreItem) {
    this.calls.push({ method: 'insertOne', args: [document] });
    if (this.insertFailure) throw this.insertFailure;
    return { acknowledged: true };
  }

  async findOne(filter: Filter) {
    this.calls.push({ method: 'findOne', args: [filter] });
    return this.rows[0] ?? null;
  }

  async deleteOne(filter: Filter) {
    this.calls.push({ method: 'deleteOne', args: [filter] });
    return { deletedCount: this.deletedCount };
  }

  find(filter: Filter) {
    const rows = this.rows;
    const calls = this.calls;
    return {
      sort(spec: Record<string, 1 | -1>) {
        return {
          limit(count: number) {
            calls.push({ method: 'find', args: [filter, spec, count] });
            return { toArray: async () => rows.slice(0, count) };
          },
        };
      },
    };
  }

  async bulkWrite(operations: ReplaceOperation[], options: { ordered: boolean }) {
    this.calls.push({ method: 'bulkWrite', args: [operations, options] });
    if (this.bulkFailure) throw this.bulkFailure;
    return { ok: 1 };
  }
}

function storeOver(collection: FakeCollection): MongoDocumentStore {
  return new MongoDocumentStore({ collection, syncIndexes: async () => undefined });
}

const key = { PK: 'USER#u1', SK: 'TX#0001705276800#t1' };
const item: StoreItem = { ...key, id: 't1', version: 2 };

describe('mongo filters', () => {
  it('guards replacements on the stored version', () => {
    expect(conditionFilter(key, { kind: 'versionEquals', version: 3 })).toEqual({ ...key, version: 3 });
    expect(conditionFilter(key, { kind: 'attributeExists' })).toEqual(key);
  });

  it('lets version 1 match records stored without a version', () => {
    expect(conditionFilter(key, { kind: 'versionEquals', version: 1 })).toEqual({
      ...key,
      $or: [{ version: 1 }, { version: { $exists: false } }],
    });
  });

  it('selects rows strictly after a cursor position', () => {
    const position = { GSI1SK: 'TX#5', PK: 'USER#u1', SK: 'TX#5#b' };
    expect(afterPosition(position, ['GSI1SK', 'PK', 'SK'], false)).toEqual({
      $or: [
        { GSI1SK: { $lt: 'TX#5' } },
        { GSI1SK: 'TX#5', PK: { $lt: 'USER#u1' } },
        { GSI1SK: 'TX#5', PK: 'USER#u1', SK: { $lt: 'TX#5#b' } },
      ],
    });
  });
});

describe('MongoDocumentStore', () => {
  describe('put', () => {
    it('upserts when there is no condition', async () => {
      const collection = new FakeCollection();
      await storeOver(collection).put(item);
      expect(collection.calls).toEqual([{ method: 'replaceOne', args: [key, item, { upsert: true }] }]);
    });

    it('turns a duplicate key into a failed condition', async () => {
      const collection = new FakeCollection();
      collection.insertFailure = new mongoose.mongo.MongoServerError({ message: 'E11000 duplicate key', code: 11000 });

      await expect(storeOver(collection).put(item, { kind: 'attributeNotExists' })).rejects.toThrow(
        ConditionalCheckFailedError,
      );
    });

    it('passes other insert failures through', async () => {
      const collection = new FakeCollection();
      collection.insertFailure = new Error('socket closed');

      await expect(storeOver(collection).put(item, { kind: 'attributeNotExists' })).rejects.toThrow('socket closed');
    });

    it('fails the condition when no stored version matches', async () => {
      const collection = new FakeCollection();
      collection.matchedCount = 0;

      await expect(storeOver(collection).put(item, { kind: 'versionEquals', version: 2 })).rejects.toThrow(
        new ConditionalCheckFailedError(key, { kind: 'versionEquals', version: 2 }),
      );
      expect(collection.calls[0].args[0]).toEqual({ ...key, version: 2 });
    });
  });

  describe('delete', () => {
    it('fails a conditional delete that removed nothing', async () => {
      const collection = new FakeCollection();
      collection.deletedCount = 0;

      await expect(storeOver(collection).delete(key, { kind: 'attributeExists' })).rejects.toThrow(
        ConditionalCheckFailedError,
      );
    });

    it('ignores a missing row without a condition', async () => {
      const collection = new FakeCollection();
      collection.deletedCount = 0;

      await storeOver(collection).delete(key);
      expect(collection.calls).toEqual([{ method: 'deleteOne', args: [key] }]);
    });
  });

  describe('get', () => {
    it('drops the mongo id from the returned item', async () => {
      const collection = new FakeCollection();
      collection.rows = [{ _id: 'abc', ...item }];

      expect(await storeOver(collection).get(key)).toEqual(item);
    });
  });

  describe('query', () => {
    const rows = ['c', 'b', 'a'].map((id) => ({
      _id: `oid-${id}`,
      PK: 'USER#u1',
      SK: `TX#000000000${id === 'c' ? 3 : id === 'b' ? 2 : 1}#${id}`,
      id,
    }));

    it('fetches one extra row and emits a cursor at the last returned item', async () => {
      const collection = new FakeCollection();
      collection.rows = rows;

      const page = await storeOver(collection).query({
        partitionKey: 'USER#u1',
        sortKey: { beginsWith: 'TX#' },
        limit: 2,
        scanForward: false,
      });

      expect(page.items.map((row) => row.id)).toEqual(['c', 'b']);
      expect(page.items[0]).not.toHaveProperty('_id');
      expect(page.cursor).toBeDefined();
      expect(decodeCursor(page.cursor ?? '', ['SK', 'PK'])).toEqual({ SK: 'TX#0000000002#b', PK: 'USER#u1' });
      expect(collection.calls).toEqual([
        {
          method: 'find',
          args: [{ $and: [{ PK: 'USER#u1' }, { SK: { $regex: '^TX#' } }] }, { SK: -1, PK: -1 }, 3],
        },
      ]);
    });

    it('emits no cursor on the last page', async () => {
      const collection = new FakeCollection();
      collection.rows = rows;

      const page = await storeOver(collection).query({ partitionKey: 'USER#u1', limit: 3, scanForward: true });
      expect(page.items).toHaveLength(3);
      expect(page.cursor).toBeUndefined();
    });
  });

  describe('batchWrite', () => {
    const items: StoreItem[] = ['a', 'b', 'c', 'd'].map((id) => ({ PK: 'USER#u1', SK: `TX#1#${id}`, id }));

    it('writes every item as an unordered upsert', async () => {
      const collection = new FakeCollection();
      expect(await storeOver(collection).batchWrite(items)).toEqual({ unprocessed: [] });

      const [operations, options] = collection.calls[0].args;
      expect(options).toEqual({ ordered: false });
      expect(operations).toHaveLength(4);
      expect(operations).toContainEqual({
        replaceOne: { filter: { PK: 'USER#u1', SK: 'TX#1#b' }, replacement: items[1], upsert: true },
      });
    });

    it('reports the operations that failed as unprocessed', async () => {
      const collection = new FakeCollection();
      collection.bulkFailure = new mongoose.mongo.MongoServerError({
        message: 'bulk write failed',
        code: 11000,
        writeErrors: [{ index: 1 }, { index: 3 }],
      });

      expect(await storeOver(collection).batchWrite(items)).toEqual({ unprocessed: [items[1], items[3]] });
    });

    it('rethrows errors that are not bulk write errors', async () => {
      const collection = new FakeCollection();
      collection.bulkFailure = new Error('timed out');

      await expect(storeOver(collection).batchWrite(items)).rejects.toThrow('timed out');
    });

    it('skips the call for an empty batch', async () => {
      const collection = new FakeCollection();
      expect(await storeOver(collection).batchWrite([])).toEqual({ unprocessed: [] });
      expect(collection.calls).toEqual([]);
    });
  });

  it('reads a single write error as well as a list', () => {
    const single = new mongoose.mongo.MongoServerError({ message: 'failed', writeErrors: { index: 2 } });
    expect(failedOperations(single)).toEqual(new Set([2]));
    expect(failedOperations(new mongoose.mongo.MongoServerError({ message: 'E11000', code: 11000 }))).toBeUndefined();
  });
});
