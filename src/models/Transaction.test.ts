import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors';
import { isValidMonth, newBudget } from './Budget';
import { newTransaction, type TransactionInput } from './Transaction';
import { newUser } from './User';

const now = new Date('2024-03-01T12:00:00Z');

const input: TransactionInput = {
  userId: 'u1',
  date: new Date('2024-01-15T00:00:00Z'),
  amount: -50,
  description: '  Lunch ',
  category: ' food ',
  type: 'expense',
};

describe('newTransaction', () => {
  it('starts at version 1 with trimmed text fields', () => {
    const tx = newTransaction({ ...input, id: 't1' }, now);
    expect(tx).toEqual({
      id: 't1',
      userId: 'u1',
      date: input.date,
      amount: -50,
      description: 'Lunch',
      category: 'food',
      type: 'expense',
      createdAt: now,
      updatedAt: now,
      version: 1,
    });
  });

  it('generates an id when none is given', () => {
    expect(newTransaction(input, now).id).toMatch(/^[0-9a-f-]{36}$/);
  });

  const invalid: Array<[Partial<TransactionInput>, string]> = [
    [{ amount: 0 }, 'amount must be a non-zero number'],
    [{ amount: Number.NaN }, 'amount must be a non-zero number'],
    [{ type: 'transfer' }, 'type must be either income or expense, got "transfer"'],
    [{ category: '   ' }, 'category is required'],
    [{ description: '' }, 'description is required'],
    [{ userId: ' ' }, 'userId is required'],
    [{ date: new Date(0) }, 'date is required'],
    [{ date: new Date('garbage') }, 'date is required'],
    [{ userId: 'a#b' }, 'userId cannot contain "#"'],
    [{ id: 'b#c' }, 'id cannot contain "#"'],
    [{ category: 'A#y' }, 'category cannot contain "#"'],
  ];

  it.each(invalid)('rejects %o', (override, message) => {
    expect(() => newTransaction({ ...input, ...override }, now)).toThrow(new ValidationError(message));
  });
});

describe('newBudget', () => {
  it('accepts a zero amount', () => {
    const budget = newBudget({ userId: 'u1', month: '2024-01', category: ' food ', amount: 0 }, now);
    expect(budget.category).toBe('food');
    expect(budget.amount).toBe(0);
  });

  it('rejects negative amounts and bad months', () => {
    expect(() => newBudget({ userId: 'u1', month: '2024-01', category: 'food', amount: -5 }, now)).toThrow(
      'budget amount cannot be negative',
    );
    expect(() => newBudget({ userId: 'u1', month: '2024-13', category: 'food', amount: 5 }, now)).toThrow(
      'invalid month format, expected YYYY-MM, got "2024-13"',
    );
  });

  it('rejects the key separator in user ids and categories', () => {
    expect(() => newBudget({ userId: 'u1#x', month: '2024-01', category: 'food', amount: 5 }, now)).toThrow(
      'userId cannot contain "#"',
    );
    expect(() => newBudget({ userId: 'u1', month: '2024-01', category: 'food#2', amount: 5 }, now)).toThrow(
      'category cannot contain "#"',
    );
  });

  it('validates months', () => {
    expect(isValidMonth('2024-01')).toBe(true);
    expect(isValidMonth('2024-1')).toBe(false);
    expect(isValidMonth('24-01')).toBe(false);
  });
});

describe('newUser', () => {
  it('lowercases the email', () => {
    expect(newUser({ id: 'u1', email: ' Ana@Example.COM ', name: 'Ana' }, now).email).toBe('ana@example.com');
  });

  it('rejects the key separator in the id', () => {
    expect(() => newUser({ id: 'u#1', email: 'ana@example.com', name: 'Ana' }, now)).toThrow('id cannot contain "#"');
  });

  it('rejects an invalid email', () => {
    expect(() => newUser({ email: 'nope', name: 'Ana' }, now)).toThrow('a valid email is required');
  });
});
