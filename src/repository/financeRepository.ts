import { setTimeout as delay } from 'node:timers/promises';
import {
  AlreadyExistsError,
  BatchWriteFailedError,
  ConflictError,
  DecodeError,
  FinanceError,
  NotFoundError,
  StoreError,
  ValidationError,
} from '../errors';
import type { Budget } from '../models/Budget';
import {
  decodeBudget,
  decodeTransaction,
  decodeUser,
  encodeBudget,
  encodeTransaction,
  encodeUser,
} from '../models/codec';
import {
  TX_PREFIX,
  budgetKeys,
  budgetSortPrefix,
  categoryPartitionKey,
  monthPartitionKey,
  transactionIdPartitionKey,
  transactionKeys,
  userKeys,
  userPartitionKey,
} from '../models/keys';
import { validateTransactionFields, type Transaction } from '../models/Transaction';
import type { User } from '../models/User';
import {
  ConditionalCheckFailedError,
  type DocumentStore,
  type QueryInput,
  type StoreItem,
  type WriteCondition,
} from '../store/types';
import { createLogger, type Logger } from '../utils/logger';

export const BATCH_SIZE = 25;
export const DEFAULT_LIST_LIMIT = 1000;
export const DEFAULT_PAGE_SIZE = 50;

export interface PageRequest {
  limit?: number;
  cursor?: string;
}

export interface Page<T> {
  items: T[];
  cursor?: string;
}

export interface BatchCreateResult {
  written: number;
  chunks: number;
}

export interface Repository {
  createTransaction(tx: Transaction): Promise<Transaction>;
  getTransaction(userId: string, id: string): Promise<Transaction>;
  updateTransaction(tx: Transaction, expectedVersion?: number): Promise<Transaction>;
  deleteTransaction(userId: string, id: string): Promise<void>;

  queryByUser(userId: string, page?: PageRequest): Promise<Page<Transaction>>;
  queryByMonth(userId: string, month: string, page?: PageRequest): Promise<Page<Transaction>>;
  queryByCategory(userId: string, category: string, page?: PageRequest): Promise<Page<Transaction>>;

  batchCreateTransactions(transactions: Transaction[]): Promise<BatchCreateResult>;

  upsertBudget(budget: Budget): Promise<Budget>;
  getBudget(userId: string, month: string, category: string): Promise<Budget>;
  getBudgetsByMonth(userId: string, month: string): Promise<Budget[]>;
  deleteBudget(userId: string, month: string, category: string): Promise<void>;

  createUser(user: User): Promise<User>;
  getUser(userId: string): Promise<User>;
}

export interface RepositoryOptions {
  // upper bound for any single list read
  listLimit?: number;
  batchSize?: number;
  maxBatchAttempts?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Single-table repository. All key derivation happens here, right before a
 * record is written, so secondary-index projections always match the
 * entity's current fields.
 */
export class FinanceRepository implements Repository {
  private readonly listLimit: number;
  private readonly batchSize: number;
  private readonly maxBatchAttempts: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(private readonly store: DocumentStore, options: RepositoryOptions = {}) {
    this.listLimit = options.listLimit ?? DEFAULT_LIST_LIMIT;
    this.batchSize = Math.min(options.batchSize ?? BATCH_SIZE, BATCH_SIZE);
    this.maxBatchAttempts = options.maxBatchAttempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 100;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger('repository');
  }

  // --- transactions -------------------------------------------------------

  async createTransaction(tx: Transaction): Promise<Transaction> {
    const item = this.transactionItem(tx);
    try {
      await this.store.put(item, { kind: 'attributeNotExists' });
    } catch (error) {
      if (error instanceof ConditionalCheckFailedError) {
        throw new AlreadyExistsError('transaction', tx.id);
      }
      throw new StoreError('create transaction', error);
    }

    this.logger.info(`Transaction created: ${tx.id} for user ${tx.userId}`);
    return tx;
  }

  async getTransaction(userId: string, id: string): Promise<Transaction> {
    const indexed = await this.runQuery('get transaction', {
      indexName: 'GSI3',
      partitionKey: transactionIdPartitionKey(userId, id),
      limit: 1,
      scanForward: false,
    });
    // the id index key is only a lookup hint; the record must belong to this user
    const found = this.decodeAll(indexed.items, decodeTransaction).find(
      (tx) => tx.userId === userId && tx.id === id,
    );
    if (found) return found;

    // Records written before the id index existed carry no GSI3 keys.
    const scanned = await this.runQuery('get transaction', {
      partitionKey: userPartitionKey(userId),
      sortKey: { beginsWith: TX_PREFIX },
      limit: this.listLimit,
      scanForward: false,
    });
    const match = this.decodeAll(scanned.items, decodeTransaction).find((tx) => tx.id === id);
    if (!match) throw new NotFoundError('transaction', id);
    return match;
  }

  async updateTransaction(tx: Transaction, expectedVersion?: number): Promise<Transaction> {
    const fields = validateTransactionFields(tx);

    const current = await this.getTransaction(tx.userId, tx.id);
    if (expectedVersion !== undefined && expectedVersion !== current.version) {
      throw new ConflictError('transaction', tx.id);
    }

    const next: Transaction = {
      ...tx,
      category: fields.category,
      description: fields.description,
      createdAt: current.createdAt,
      updatedAt: this.clock(),
      version: current.version + 1,
    };
    const item = this.transactionItem(next);
    const previousKey = transactionKeys(current);
    const guard: WriteCondition = { kind: 'versionEquals', version: current.version };

    try {
      if (previousKey.PK === item.PK && previousKey.SK === item.SK) {
        await this.store.put(item, guard);
      } else {
        // The date moved the record to a new sort key: retire the old one
        // under the same version guard, then claim the new slot.
        await this.store.delete({ PK: previousKey.PK, SK: previousKey.SK }, guard);
        await this.store.put(item, { kind: 'attributeNotExists' });
      }
    } catch (error) {
      if (error instanceof ConditionalCheckFailedError) {
        throw new ConflictError('transaction', tx.id);
      }
      throw new StoreError('update transaction', error);
    }

    return next;
  }

  async deleteTransaction(userId: string, id: string): Promise<void> {
    const current = await this.getTransaction(userId, id);
    const { PK, SK } = transactionKeys(current);

    try {
      await this.store.delete({ PK, SK }, { kind: 'attributeExists' });
    } catch (error) {
      if (error instanceof ConditionalCheckFailedError) {
        throw new NotFoundError('transaction', id);
      }
      throw new StoreError('delete transaction', error);
    }
  }

  queryByUser(userId: string, page: PageRequest = {}): Promise<Page<Transaction>> {
    return this.queryTransactions('query transactions', userId, page, {
      partitionKey: userPartitionKey(userId),
      sortKey: { beginsWith: TX_PREFIX },
    });
  }

  queryByMonth(userId: string, month: string, page: PageRequest = {}): Promise<Page<Transaction>> {
    return this.queryTransactions('query transactions by month', userId, page, {
      indexName: 'GSI1',
      partitionKey: monthPartitionKey(userId, month),
    });
  }

  queryByCategory(userId: string, category: string, page: PageRequest = {}): Promise<Page<Transaction>> {
    return this.queryTransactions('query transactions by category', userId, page, {
      indexName: 'GSI2',
      partitionKey: categoryPartitionKey(userId, category),
    });
  }

  /**
   * Bulk load in store-sized chunks. Only the unprocessed remainder of a chunk
   * is resubmitted. Writes are blind overwrites, so replaying a chunk is safe;
   * chunks are not atomic with each other.
   */
  async batchCreateTransactions(transactions: Transaction[]): Promise<BatchCreateResult> {
    let chunks = 0;

    for (let start = 0; start < transactions.length; start += this.batchSize) {
      const end = Math.min(start + this.batchSize, transactions.length);
      const chunk = transactions.slice(start, end);
      await this.writeChunk(chunk, start, end - 1);
      chunks++;
      this.logger.info(`Successfully wrote batch ${start}-${end - 1} (${chunk.length} transactions)`);
    }

    return { written: transactions.length, chunks };
  }

  // --- budgets ------------------------------------------------------------

  async upsertBudget(budget: Budget): Promise<Budget> {
    const item: StoreItem = {
      ...budgetKeys(budget.userId, budget.month, budget.category),
      ...encodeBudget(budget),
    };
    try {
      await this.store.put(item);
    } catch (error) {
      throw new StoreError('create/update budget', error);
    }
    return budget;
  }

  async getBudget(userId: string, month: string, category: string): Promise<Budget> {
    const key = budgetKeys(userId, month, category);
    let item: StoreItem | null;
    try {
      item = await this.store.get(key);
    } catch (error) {
      throw new StoreError('get budget', error);
    }
    if (!item) throw new NotFoundError('budget', `${month}/${category}`);
    return decodeBudget(item, this.clock());
  }

  async getBudgetsByMonth(userId: string, month: string): Promise<Budget[]> {
    const result = await this.runQuery('query budgets', {
      partitionKey: userPartitionKey(userId),
      sortKey: { beginsWith: budgetSortPrefix(month) },
      limit: this.listLimit,
      scanForward: true,
    });
    return this.decodeAll(result.items, decodeBudget);
  }

  async deleteBudget(userId: string, month: string, category: string): Promise<void> {
    try {
      await this.store.delete(budgetKeys(userId, month, category), { kind: 'attributeExists' });
    } catch (error) {
      if (error instanceof ConditionalCheckFailedError) {
        throw new NotFoundError('budget', `${month}/${category}`);
      }
      throw new StoreError('delete budget', error);
    }
  }

  // --- users --------------------------------------------------------------

  async createUser(user: User): Promise<User> {
    const item: StoreItem = { ...userKeys(user.id), ...encodeUser(user) };
    try {
      await this.store.put(item, { kind: 'attributeNotExists' });
    } catch (error) {
      if (error instanceof ConditionalCheckFailedError) {
        throw new AlreadyExistsError('user', user.id);
      }
      throw new StoreError('create user', error);
    }
    return user;
  }

  async getUser(userId: string): Promise<User> {
    let item: StoreItem | null;
    try {
      item = await this.store.get(userKeys(userId));
    } catch (error) {
      throw new StoreError('get user', error);
    }
    if (!item) throw new NotFoundError('user', userId);
    return decodeUser(item, this.clock());
  }

  // --- internals ----------------------------------------------------------

  private transactionItem(tx: Transaction): StoreItem {
    return { ...transactionKeys(tx), ...encodeTransaction(tx) };
  }

  private async queryTransactions(
    operation: string,
    userId: string,
    page: PageRequest,
    target: Pick<QueryInput, 'indexName' | 'partitionKey' | 'sortKey'>,
  ): Promise<Page<Transaction>> {
    const result = await this.runQuery(operation, {
      ...target,
      limit: this.clampLimit(page.limit),
      cursor: page.cursor,
      scanForward: false,
    });
    const items = this.decodeAll(result.items, decodeTransaction).filter((tx) => tx.userId === userId);
    return { items, cursor: result.cursor };
  }

  private async runQuery(operation: string, input: QueryInput) {
    try {
      return await this.store.query(input);
    } catch (error) {
      // a malformed cursor is the caller's mistake, not the store's
      if (error instanceof FinanceError) throw error;
      throw new StoreError(operation, error);
    }
  }

  private clampLimit(limit: number | undefined): number {
    if (limit === undefined) return Math.min(DEFAULT_PAGE_SIZE, this.listLimit);
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError(`limit must be a positive integer, got ${limit}`);
    }
    return Math.min(limit, this.listLimit);
  }

  // One bad record costs one record, not the page.
  private decodeAll<T>(items: StoreItem[], decode: (item: StoreItem, now: Date) => T): T[] {
    const now = this.clock();
    const decoded: T[] = [];
    for (const item of items) {
      try {
        decoded.push(decode(item, now));
      } catch (error) {
        if (!(error instanceof DecodeError)) throw error;
        this.logger.warn(`Skipping unreadable item ${String(item.PK)} / ${String(item.SK)}: ${error.message}`);
      }
    }
    return decoded;
  }

  private async writeChunk(chunk: Transaction[], start: number, end: number): Promise<void> {
    let pending = chunk.map((tx) => this.transactionItem(tx));
    let lastError: unknown;

    for (let attempt = 0; attempt < this.maxBatchAttempts; attempt++) {
      if (attempt > 0) {
        await this.sleep(attempt * this.retryDelayMs);
      }

      try {
        const { unprocessed } = await this.store.batchWrite(pending);
        pending = unprocessed;
        lastError = undefined;
      } catch (error) {
        // throttling or a timeout: resubmit the whole remainder
        lastError = error;
        this.logger.warn(`Batch ${start}-${end} attempt ${attempt + 1} failed: ${String(error)}`);
      }

      if (pending.length === 0) return;
    }

    const unprocessedIds = pending.map((item) => String(item.id));
    throw new BatchWriteFailedError(start, end, unprocessedIds, this.maxBatchAttempts, {
      cause: lastError,
    });
  }
}
