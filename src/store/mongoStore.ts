import mongoose, { Schema } from 'mongoose';
import { decodeCursor, encodeCursor, positionOf, type CursorPosition } from './cursor';
import {
  ConditionalCheckFailedError,
  INDEXES,
  orderingAttributes,
  primaryKeyOf,
  type AttributeValue,
  type BatchWriteOutput,
  type DocumentStore,
  type IndexName,
  type PrimaryKey,
  type QueryInput,
  type QueryOutput,
  type StoreItem,
  type WriteCondition,
} from './types';

type MongoFilter = mongoose.mongo.Filter<mongoose.mongo.Document>;

type Document = Record<string, unknown>;

export interface ReplaceOperation {
  replaceOne: { filter: MongoFilter; replacement: StoreItem; upsert: boolean };
}

/** The collection calls the store makes; a mongoose model's `collection` satisfies it. */
export interface ItemCollection {
  replaceOne(filter: MongoFilter, replacement: StoreItem, options?: { upsert?: boolean }): Promise<{ matchedCount: number }>;
  insertOne(document: StoreItem): Promise<unknown>;
  findOne(filter: MongoFilter): Promise<Document | null>;
  deleteOne(filter: MongoFilter): Promise<{ deletedCount: number }>;
  find(filter: MongoFilter): {
    sort(spec: Record<string, 1 | -1>): { limit(count: number): { toArray(): Promise<Document[]> } };
  };
  bulkWrite(operations: ReplaceOperation[], options: { ordered: boolean }): Promise<unknown>;
}

/** The slice of a mongoose model the store works through. */
export interface ItemModel {
  collection: ItemCollection;
  syncIndexes(): Promise<unknown>;
}

const DUPLICATE_KEY = 11000;

// Only the key attributes are declared; everything else rides along untyped.
const itemSchema = new Schema(
  {
    PK: { type: String, required: true },
    SK: { type: String, required: true },
    GSI1PK: { type: String },
    GSI1SK: { type: String },
    GSI2PK: { type: String },
    GSI2SK: { type: String },
    GSI3PK: { type: String },
    GSI3SK: { type: String },
    version: { type: Number },
  },
  { strict: false, versionKey: false, minimize: false },
);

itemSchema.index({ PK: 1, SK: 1 }, { unique: true });
for (const name of ['GSI1', 'GSI2', 'GSI3'] as const) {
  const { partition, sort } = INDEXES[name];
  itemSchema.index(
    { [partition]: 1, [sort]: 1, PK: 1, SK: 1 },
    { name, partialFilterExpression: { [partition]: { $exists: true } } },
  );
}

export function getItemModel(collection: string): ItemModel {
  const modelName = `FinanceItem_${collection}`;
  const existing = mongoose.models[modelName];
  return existing ?? mongoose.model(modelName, itemSchema, collection);
}

/**
 * {@link DocumentStore} over a single MongoDB collection. Items are stored as
 * flat documents; the mongoose schema only pins the key attributes and the
 * indexes that emulate the secondary indexes.
 */
export class MongoDocumentStore implements DocumentStore {
  constructor(private readonly model: ItemModel) {}

  static forCollection(collection: string): MongoDocumentStore {
    return new MongoDocumentStore(getItemModel(collection));
  }

  async ensureIndexes(): Promise<void> {
    await this.model.syncIndexes();
  }

  async put(item: StoreItem, condition?: WriteCondition): Promise<void> {
    const key = primaryKeyOf(item);
    const collection = this.model.collection;

    if (condition === undefined) {
      await collection.replaceOne(keyFilter(key), { ...item }, { upsert: true });
      return;
    }

    if (condition.kind === 'attributeNotExists') {
      try {
        await collection.insertOne({ ...item });
      } catch (error) {
        if (isDuplicateKey(error)) throw new ConditionalCheckFailedError(key, condition);
        throw error;
      }
      return;
    }

    const result = await collection.replaceOne(conditionFilter(key, condition), { ...item });
    if (result.matchedCount === 0) throw new ConditionalCheckFailedError(key, condition);
  }

  async get(key: PrimaryKey): Promise<StoreItem | null> {
    const document = await this.model.collection.findOne(keyFilter(key));
    return document ? toStoreItem(document) : null;
  }

  async delete(key: PrimaryKey, condition?: WriteCondition): Promise<void> {
    if (condition?.kind === 'attributeNotExists') {
      throw new TypeError('attributeNotExists is not a valid delete condition');
    }

    const filter = condition ? conditionFilter(key, condition) : keyFilter(key);
    const result = await this.model.collection.deleteOne(filter);
    if (condition && result.deletedCount === 0) {
      throw new ConditionalCheckFailedError(key, condition);
    }
  }

  async query(input: QueryInput): Promise<QueryOutput> {
    const indexName: IndexName = input.indexName ?? 'primary';
    const index = INDEXES[indexName];
    const ordering = orderingAttributes(indexName);
    const direction = input.scanForward ? 1 : -1;

    const clauses: MongoFilter[] = [{ [index.partition]: input.partitionKey }];
    if (input.sortKey) {
      clauses.push({
        [index.sort]:
          'equals' in input.sortKey
            ? input.sortKey.equals
            : { $regex: `^${escapeRegExp(input.sortKey.beginsWith)}` },
      });
    }
    if (input.cursor) {
      clauses.push(afterPosition(decodeCursor(input.cursor, ordering), ordering, input.scanForward));
    }

    const sort: Record<string, 1 | -1> = {};
    for (const attribute of ordering) sort[attribute] = direction;

    // one extra row tells us whether another page exists
    const documents = await this.model.collection
      .find({ $and: clauses })
      .sort(sort)
      .limit(input.limit + 1)
      .toArray();

    const items = documents.slice(0, input.limit).map(toStoreItem);
    const hasMore = documents.length > input.limit;
    const last = items[items.length - 1];

    return {
      items,
      cursor: hasMore && last ? encodeCursor(positionOf(last, ordering)) : undefined,
    };
  }

  async batchWrite(items: StoreItem[]): Promise<BatchWriteOutput> {
    if (items.length === 0) return { unprocessed: [] };

    const operations: ReplaceOperation[] = items.map((item) => ({
      replaceOne: { filter: keyFilter(primaryKeyOf(item)), replacement: { ...item }, upsert: true },
    }));

    try {
      await this.model.collection.bulkWrite(operations, { ordered: false });
      return { unprocessed: [] };
    } catch (error) {
      // unordered: every operation without a write error went through
      const failed = failedOperations(error);
      if (!failed) throw error;
      return { unprocessed: items.filter((_, position) => failed.has(position)) };
    }
  }
}

function keyFilter(key: PrimaryKey): MongoFilter {
  return { PK: key.PK, SK: key.SK };
}

// Records written before versioning read back as version 1.
export function conditionFilter(key: PrimaryKey, condition: WriteCondition): MongoFilter {
  if (condition.kind !== 'versionEquals') return keyFilter(key);
  if (condition.version === 1) {
    return { ...keyFilter(key), $or: [{ version: 1 }, { version: { $exists: false } }] };
  }
  return { ...keyFilter(key), version: condition.version };
}

/** Strictly-after predicate over a lexicographic tuple of ordering attributes. */
export function afterPosition(position: CursorPosition, ordering: string[], forward: boolean): MongoFilter {
  const operator = forward ? '$gt' : '$lt';
  const alternatives: MongoFilter[] = ordering.map((attribute, depth) => {
    const clause: MongoFilter = {};
    for (const previous of ordering.slice(0, depth)) clause[previous] = position[previous];
    clause[attribute] = { [operator]: position[attribute] };
    return clause;
  });
  return { $or: alternatives };
}

/** Positions of the failed operations of a bulk write error, or undefined for any other error. */
export function failedOperations(error: unknown): Set<number> | undefined {
  if (!(error instanceof mongoose.mongo.MongoServerError)) return undefined;
  const writeErrors: unknown = error.writeErrors;
  if (writeErrors === undefined) return undefined;

  const failed = new Set<number>();
  for (const writeError of Array.isArray(writeErrors) ? writeErrors : [writeErrors]) {
    if (typeof writeError === 'object' && writeError !== null && 'index' in writeError) {
      const { index } = writeError;
      if (typeof index === 'number') failed.add(index);
    }
  }
  return failed;
}

function isDuplicateKey(error: unknown): boolean {
  return error instanceof mongoose.mongo.MongoServerError && error.code === DUPLICATE_KEY;
}

function isAttributeValue(value: unknown): value is AttributeValue {
  if (value === null) return true;
  if (['string', 'number', 'boolean'].includes(typeof value)) return true;
  if (typeof value !== 'object' || Array.isArray(value)) return false;
  return Object.values(value).every((entry) => typeof entry === 'string' || typeof entry === 'number');
}

function toStoreItem(document: Document): StoreItem {
  const item: StoreItem = {};
  for (const [name, value] of Object.entries(document)) {
    if (name === '_id') continue;
    if (isAttributeValue(value)) item[name] = value;
  }
  return item;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
