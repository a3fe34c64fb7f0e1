import { ValidationError } from '../errors';
import { assertValidMonth } from '../models/Budget';
import { newTransaction, type Transaction, type TransactionInput } from '../models/Transaction';
import type { BatchCreateResult, Page, PageRequest, Repository } from '../repository/financeRepository';

export interface TransactionUpdate extends Omit<TransactionInput, 'id'> {
  // version the caller last saw; a mismatch is a conflict
  version?: number;
}

function requireValue(value: string, name: string): string {
  const trimmed = value.trim();
  if (!trimmed) throw new ValidationError(`${name} is required`);
  return trimmed;
}

export class TransactionService {
  constructor(private readonly repo: Repository) {}

  async createTransaction(input: TransactionInput): Promise<Transaction> {
    return await this.repo.createTransaction(newTransaction(input));
  }

  async getTransaction(userId: string, id: string): Promise<Transaction> {
    return await this.repo.getTransaction(requireValue(userId, 'userId'), requireValue(id, 'transaction id'));
  }

  async updateTransaction(id: string, update: TransactionUpdate): Promise<Transaction> {
    // re-run the constructor checks on the new field values
    const draft = newTransaction({ ...update, id: requireValue(id, 'transaction id') });
    return await this.repo.updateTransaction(draft, update.version);
  }

  async deleteTransaction(userId: string, id: string): Promise<void> {
    await this.repo.deleteTransaction(requireValue(userId, 'userId'), requireValue(id, 'transaction id'));
  }

  async listByUser(userId: string, page?: PageRequest): Promise<Page<Transaction>> {
    return await this.repo.queryByUser(requireValue(userId, 'userId'), page);
  }

  async listByMonth(userId: string, month: string, page?: PageRequest): Promise<Page<Transaction>> {
    assertValidMonth(month);
    return await this.repo.queryByMonth(requireValue(userId, 'userId'), month, page);
  }

  async listByCategory(userId: string, category: string, page?: PageRequest): Promise<Page<Transaction>> {
    return await this.repo.queryByCategory(requireValue(userId, 'userId'), requireValue(category, 'category'), page);
  }

  /** Validates every input before anything is written. */
  async importTransactions(inputs: TransactionInput[]): Promise<BatchCreateResult> {
    if (inputs.length === 0) {
      throw new ValidationError('at least one transaction is required');
    }
    const transactions = inputs.map((input, position) => {
      try {
        return newTransaction(input);
      } catch (error) {
        if (error instanceof ValidationError) {
          throw new ValidationError(`transaction ${position}: ${error.message}`);
        }
        throw error;
      }
    });
    return await this.repo.batchCreateTransactions(transactions);
  }
}
