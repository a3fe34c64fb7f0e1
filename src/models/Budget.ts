import { isMatch } from 'date-fns';
import { v4 as uuidv4 } from 'uuid';
import { ValidationError } from '../errors';
import { assertKeySafe } from './Transaction';

export interface Budget {
  id: string;
  userId: string;
  month: string; // YYYY-MM
  category: string;
  amount: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface BudgetInput {
  userId: string;
  month: string;
  category: string;
  amount: number;
}

const MONTH_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;

export function isValidMonth(month: string): boolean {
  return MONTH_PATTERN.test(month) && isMatch(month, 'yyyy-MM');
}

export function assertValidMonth(month: string): void {
  if (!isValidMonth(month)) {
    throw new ValidationError(`invalid month format, expected YYYY-MM, got "${month}"`);
  }
}

export function newBudget(input: BudgetInput, now: Date = new Date()): Budget {
  if (!input.userId.trim()) {
    throw new ValidationError('userId is required');
  }
  assertKeySafe('userId', input.userId);
  assertValidMonth(input.month);
  const category = input.category.trim();
  if (!category) {
    throw new ValidationError('category is required');
  }
  assertKeySafe('category', category);
  if (!Number.isFinite(input.amount) || input.amount < 0) {
    throw new ValidationError('budget amount cannot be negative');
  }

  return {
    id: uuidv4(),
    userId: input.userId,
    month: input.month,
    category,
    amount: input.amount,
    createdAt: now,
    updatedAt: now,
  };
}
