import { isValid, parseISO } from 'date-fns';
import { DecodeError } from '../errors';
import type { AttributeValue, StoreItem } from '../store/types';
import type { Budget } from './Budget';
import { isTransactionType, type Transaction } from './Transaction';
import type { User } from './User';

export type EntityType = 'transaction' | 'budget' | 'user';

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Reads a wire date: a full RFC3339 timestamp or a bare `YYYY-MM-DD`, which
 * is taken as UTC midnight. Returns null for anything else.
 */
export function parseWireDate(value: string): Date | null {
  const text = value.trim();
  if (DATE_ONLY.test(text)) {
    const date = new Date(`${text}T00:00:00.000Z`);
    return isValid(date) && date.toISOString().startsWith(text) ? date : null;
  }
  const date = parseISO(text);
  return isValid(date) ? date : null;
}

export function formatDateOnly(date: Date): string {
  return date.toISOString().slice(0, 10);
}

// --- store attribute bags -------------------------------------------------

export function encodeTransaction(tx: Transaction): StoreItem {
  return {
    entity_type: 'transaction',
    id: tx.id,
    user_id: tx.userId,
    date: tx.date.toISOString(),
    amount: tx.amount,
    description: tx.description,
    category: tx.category,
    type: tx.type,
    created_at: tx.createdAt.toISOString(),
    updated_at: tx.updatedAt.toISOString(),
    version: tx.version,
  };
}

export function decodeTransaction(item: StoreItem, now: Date = new Date()): Transaction {
  const type = item.type;
  if (!isTransactionType(type)) {
    throw new DecodeError('type', `expected income or expense, got ${describe(type)}`);
  }
  const amount = readNumber(item, 'amount');
  if (amount === 0) {
    throw new DecodeError('amount', 'must be non-zero');
  }

  return {
    id: readString(item, 'id'),
    userId: readString(item, 'user_id'),
    date: readDate(item, 'date', now),
    amount,
    description: readString(item, 'description'),
    category: readString(item, 'category'),
    type,
    createdAt: readDate(item, 'created_at', now),
    updatedAt: readDate(item, 'updated_at', now),
    version: readVersion(item),
  };
}

export function encodeBudget(budget: Budget): StoreItem {
  return {
    entity_type: 'budget',
    id: budget.id,
    user_id: budget.userId,
    month: budget.month,
    category: budget.category,
    amount: budget.amount,
    created_at: budget.createdAt.toISOString(),
    updated_at: budget.updatedAt.toISOString(),
  };
}

export function decodeBudget(item: StoreItem, now: Date = new Date()): Budget {
  const amount = readNumber(item, 'amount');
  if (amount < 0) {
    throw new DecodeError('amount', 'must not be negative');
  }

  return {
    id: readString(item, 'id'),
    userId: readString(item, 'user_id'),
    month: readString(item, 'month'),
    category: readString(item, 'category'),
    amount,
    createdAt: readDate(item, 'created_at', now),
    updatedAt: readDate(item, 'updated_at', now),
  };
}

export function encodeUser(user: User): StoreItem {
  return {
    entity_type: 'user',
    id: user.id,
    email: user.email,
    name: user.name,
    created_at: user.createdAt.toISOString(),
    updated_at: user.updatedAt.toISOString(),
  };
}

export function decodeUser(item: StoreItem, now: Date = new Date()): User {
  return {
    id: readString(item, 'id'),
    email: readString(item, 'email'),
    name: readString(item, 'name'),
    createdAt: readDate(item, 'created_at', now),
    updatedAt: readDate(item, 'updated_at', now),
  };
}

// --- HTTP wire ------------------------------------------------------------

export interface TransactionJSON {
  id: string;
  user_id: string;
  date: string;
  amount: number;
  description: string;
  category: string;
  type: string;
  created_at: string;
  updated_at: string;
  version: number;
}

export function serializeTransaction(tx: Transaction): TransactionJSON {
  return {
    id: tx.id,
    user_id: tx.userId,
    date: formatDateOnly(tx.date),
    amount: tx.amount,
    description: tx.description,
    category: tx.category,
    type: tx.type,
    created_at: tx.createdAt.toISOString(),
    updated_at: tx.updatedAt.toISOString(),
    version: tx.version,
  };
}

export function serializeBudget(budget: Budget) {
  return {
    id: budget.id,
    user_id: budget.userId,
    month: budget.month,
    category: budget.category,
    amount: budget.amount,
    created_at: budget.createdAt.toISOString(),
    updated_at: budget.updatedAt.toISOString(),
  };
}

export function serializeUser(user: User) {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    created_at: user.createdAt.toISOString(),
    updated_at: user.updatedAt.toISOString(),
  };
}

// --- readers --------------------------------------------------------------

function describe(value: AttributeValue | undefined): string {
  return value === undefined ? 'nothing' : JSON.stringify(value);
}

function readString(item: StoreItem, field: string): string {
  const value = item[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw new DecodeError(field, `expected a non-empty string, got ${describe(value)}`);
  }
  return value;
}

function readNumber(item: StoreItem, field: string): number {
  const value = item[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new DecodeError(field, `expected a number, got ${describe(value)}`);
  }
  return value;
}

// Absent means "now"; present but unreadable is an error.
function readDate(item: StoreItem, field: string, now: Date): Date {
  const value = item[field];
  if (value === undefined || value === null) return now;
  if (typeof value !== 'string') {
    throw new DecodeError(field, `expected a timestamp string, got ${describe(value)}`);
  }
  const date = parseWireDate(value);
  if (!date) {
    throw new DecodeError(field, `unreadable timestamp "${value}"`);
  }
  return date;
}

function readVersion(item: StoreItem): number {
  const value = item.version;
  if (value === undefined) return 1;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new DecodeError('version', `expected a positive integer, got ${describe(value)}`);
  }
  return value;
}
