// Key layout of the single finance table. Secondary-index keys are projections
// of the entity's current fields and are rebuilt before every write.

export const TX_PREFIX = 'TX#';
export const BUDGET_PREFIX = 'BUDGET#';
export const PROFILE_SORT_KEY = 'PROFILE';
export const KEY_SEPARATOR = '#';

const UNIX_WIDTH = 10;

export interface TransactionKeyFields {
  id: string;
  userId: string;
  date: Date;
  category: string;
}

export interface TransactionKeys {
  PK: string;
  SK: string;
  GSI1PK: string;
  GSI1SK: string;
  GSI2PK: string;
  GSI2SK: string;
  GSI3PK: string;
  GSI3SK: string;
}

export interface BudgetKeys {
  PK: string;
  SK: string;
}

export type UserKeys = BudgetKeys;

/** Whole seconds since the epoch, zero-padded so string order is time order. */
export function unixSeconds(date: Date): string {
  return String(Math.floor(date.getTime() / 1000)).padStart(UNIX_WIDTH, '0');
}

/** `YYYY-MM` of the date in UTC. */
export function monthOf(date: Date): string {
  return date.toISOString().slice(0, 7);
}

/** Values joined into a key must not contain the separator, or two users' keys could coincide. */
export function hasKeySeparator(value: string): boolean {
  return value.includes(KEY_SEPARATOR);
}

export function normalizeCategoryKey(category: string): string {
  return category.trim().toUpperCase();
}

export function userPartitionKey(userId: string): string {
  return `USER#${userId}`;
}

export function transactionSortKey(date: Date, id: string): string {
  return `${TX_PREFIX}${unixSeconds(date)}#${id}`;
}

export function monthPartitionKey(userId: string, month: string): string {
  return `MONTH#${month}#${userId}`;
}

export function categoryPartitionKey(userId: string, category: string): string {
  return `CATEGORY#${normalizeCategoryKey(category)}#${userId}`;
}

export function transactionIdPartitionKey(userId: string, id: string): string {
  return `TXID#${userId}#${id}`;
}

export function transactionKeys(fields: TransactionKeyFields): TransactionKeys {
  const { id, userId, date, category } = fields;
  const timeKey = `${TX_PREFIX}${unixSeconds(date)}`;

  return {
    PK: userPartitionKey(userId),
    SK: transactionSortKey(date, id),
    GSI1PK: monthPartitionKey(userId, monthOf(date)),
    GSI1SK: timeKey,
    GSI2PK: categoryPartitionKey(userId, category),
    GSI2SK: timeKey,
    GSI3PK: transactionIdPartitionKey(userId, id),
    GSI3SK: timeKey,
  };
}

export function budgetSortPrefix(month: string): string {
  return `${BUDGET_PREFIX}${month}#`;
}

export function budgetKeys(userId: string, month: string, category: string): BudgetKeys {
  return {
    PK: userPartitionKey(userId),
    SK: `${budgetSortPrefix(month)}${normalizeCategoryKey(category)}`,
  };
}

export function userKeys(userId: string): UserKeys {
  return { PK: userPartitionKey(userId), SK: PROFILE_SORT_KEY };
}
