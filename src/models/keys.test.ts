import { describe, expect, it } from 'vitest';
import {
  budgetKeys,
  budgetSortPrefix,
  categoryPartitionKey,
  monthOf,
  transactionKeys,
  unixSeconds,
  userKeys,
} from './keys';

const jan15 = new Date('2024-01-15T00:00:00Z');

describe('keys', () => {
  it('pads unix seconds so string order is time order', () => {
    expect(unixSeconds(jan15)).toBe('1705276800');
    expect(unixSeconds(new Date(5000))).toBe('0000000005');
    expect(unixSeconds(new Date(5000)) < unixSeconds(new Date(40_000))).toBe(true);
  });

  it('takes the month in UTC', () => {
    expect(monthOf(new Date('2024-01-31T23:30:00-05:00'))).toBe('2024-02');
    expect(monthOf(jan15)).toBe('2024-01');
  });

  it('derives every index key of a transaction', () => {
    expect(transactionKeys({ id: 't1', userId: 'u1', date: jan15, category: ' food ' })).toEqual({
      PK: 'USER#u1',
      SK: 'TX#1705276800#t1',
      GSI1PK: 'MONTH#2024-01#u1',
      GSI1SK: 'TX#1705276800',
      GSI2PK: 'CATEGORY#FOOD#u1',
      GSI2SK: 'TX#1705276800',
      GSI3PK: 'TXID#u1#t1',
      GSI3SK: 'TX#1705276800',
    });
  });

  it('is deterministic', () => {
    const fields = { id: 't1', userId: 'u1', date: jan15, category: 'Food' };
    expect(transactionKeys(fields)).toEqual(transactionKeys({ ...fields }));
  });

  it('keys categories case-insensitively', () => {
    expect(categoryPartitionKey('u1', 'Food')).toBe(categoryPartitionKey('u1', 'FOOD'));
    expect(budgetKeys('u1', '2024-01', 'food')).toEqual(budgetKeys('u1', '2024-01', 'Food'));
  });

  it('builds budget and profile keys', () => {
    expect(budgetKeys('u1', '2024-01', 'food')).toEqual({ PK: 'USER#u1', SK: 'BUDGET#2024-01#FOOD' });
    expect(budgetSortPrefix('2024-01')).toBe('BUDGET#2024-01#');
    expect(userKeys('u1')).toEqual({ PK: 'USER#u1', SK: 'PROFILE' });
  });
});
