import { v4 as uuidv4 } from 'uuid';
import { ValidationError } from '../errors';
import { KEY_SEPARATOR, hasKeySeparator } from './keys';

export const TRANSACTION_TYPES = ['income', 'expense'] as const;
export type TransactionType = (typeof TRANSACTION_TYPES)[number];

export interface Transaction {
  id: string;
  userId: string;
  date: Date;
  // signed; expenses are usually recorded negative
  amount: number;
  description: string;
  category: string;
  type: TransactionType;
  createdAt: Date;
  updatedAt: Date;
  version: number;
}

export interface TransactionInput {
  id?: string;
  userId: string;
  date: Date;
  amount: number;
  description: string;
  category: string;
  type: string;
}

export function assertKeySafe(field: string, value: string): void {
  if (hasKeySeparator(value)) {
    throw new ValidationError(`${field} cannot contain "${KEY_SEPARATOR}"`);
  }
}

export function isTransactionType(value: unknown): value is TransactionType {
  return value === 'income' || value === 'expense';
}

/**
 * Checks the fields every stored transaction must satisfy and returns the
 * narrowed type. Category and description are trimmed.
 */
export function validateTransactionFields(input: TransactionInput): Omit<TransactionInput, 'type'> & { type: TransactionType } {
  if (!input.userId.trim()) {
    throw new ValidationError('userId is required');
  }
  assertKeySafe('userId', input.userId);
  if (input.id !== undefined) assertKeySafe('id', input.id);
  if (!Number.isFinite(input.amount) || input.amount === 0) {
    throw new ValidationError('amount must be a non-zero number');
  }
  if (!isTransactionType(input.type)) {
    throw new ValidationError(`type must be either income or expense, got "${input.type}"`);
  }
  const category = input.category.trim();
  if (!category) {
    throw new ValidationError('category is required');
  }
  assertKeySafe('category', category);
  const description = input.description.trim();
  if (!description) {
    throw new ValidationError('description is required');
  }
  if (Number.isNaN(input.date.getTime()) || input.date.getTime() <= 0) {
    throw new ValidationError('date is required');
  }

  return { ...input, category, description, type: input.type };
}

/** A brand-new transaction at version 1, with a generated id when none is given. */
export function newTransaction(input: TransactionInput, now: Date = new Date()): Transaction {
  const fields = validateTransactionFields(input);
  return {
    id: fields.id?.trim() || uuidv4(),
    userId: fields.userId,
    date: fields.date,
    amount: fields.amount,
    description: fields.description,
    category: fields.category,
    type: fields.type,
    createdAt: now,
    updatedAt: now,
    version: 1,
  };
}
