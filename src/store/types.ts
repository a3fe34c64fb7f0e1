export type ScalarAttribute = string | number | boolean | null;
export type AttributeValue = ScalarAttribute | Record<string, string | number>;
export type StoreItem = Record<string, AttributeValue>;

export interface PrimaryKey {
  PK: string;
  SK: string;
}

/**
 * One physical collection, four ways in. Every index is a (partition, sort)
 * pair of attribute names; an item appears in an index only when it carries
 * that index's partition attribute.
 */
export const INDEXES = {
  primary: { partition: 'PK', sort: 'SK' },
  // transactions of a user in one month
  GSI1: { partition: 'GSI1PK', sort: 'GSI1SK' },
  // transactions of a user in one category
  GSI2: { partition: 'GSI2PK', sort: 'GSI2SK' },
  // a single transaction by logical id
  GSI3: { partition: 'GSI3PK', sort: 'GSI3SK' },
} as const;

export type IndexName = keyof typeof INDEXES;

export type SortKeyCondition = { beginsWith: string } | { equals: string };

export type WriteCondition =
  | { kind: 'attributeNotExists' }
  | { kind: 'attributeExists' }
  | { kind: 'versionEquals'; version: number };

export interface QueryInput {
  indexName?: IndexName;
  partitionKey: string;
  sortKey?: SortKeyCondition;
  limit: number;
  cursor?: string;
  scanForward: boolean;
}

export interface QueryOutput {
  items: StoreItem[];
  // absent when the scanned range is exhausted
  cursor?: string;
}

export interface BatchWriteOutput {
  unprocessed: StoreItem[];
}

/**
 * The narrow surface the repository needs from a wide-column key/value store.
 * A failed write condition rejects with {@link ConditionalCheckFailedError};
 * any other rejection is a store error.
 */
export interface DocumentStore {
  put(item: StoreItem, condition?: WriteCondition): Promise<void>;
  get(key: PrimaryKey): Promise<StoreItem | null>;
  delete(key: PrimaryKey, condition?: WriteCondition): Promise<void>;
  query(input: QueryInput): Promise<QueryOutput>;
  // blind overwrites; returns the items the store did not get to
  batchWrite(items: StoreItem[]): Promise<BatchWriteOutput>;
}

export class ConditionalCheckFailedError extends Error {
  constructor(readonly key: PrimaryKey, readonly condition: WriteCondition) {
    super(`condition ${condition.kind} failed for ${key.PK} / ${key.SK}`);
    this.name = 'ConditionalCheckFailedError';
  }
}

export function primaryKeyOf(item: StoreItem): PrimaryKey {
  const { PK, SK } = item;
  if (typeof PK !== 'string' || typeof SK !== 'string') {
    throw new TypeError('store item is missing its PK/SK attributes');
  }
  return { PK, SK };
}

/** Attribute names that order an index: its sort key, then the primary key as tie-break. */
export function orderingAttributes(indexName: IndexName): string[] {
  const { sort } = INDEXES[indexName];
  return Array.from(new Set<string>([sort, INDEXES.primary.partition, INDEXES.primary.sort]));
}
