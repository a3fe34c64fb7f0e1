import { DEFAULT_LIST_LIMIT, type Page, type PageRequest, type Repository } from '../repository/financeRepository';
import type { Transaction } from '../models/Transaction';

type PageFetcher = (page: PageRequest) => Promise<Page<Transaction>>;

/** Follows cursors until the listing ends or `max` items have been read. */
export async function collectPages(fetch: PageFetcher, max: number = DEFAULT_LIST_LIMIT): Promise<Transaction[]> {
  const collected: Transaction[] = [];
  let cursor: string | undefined;

  do {
    const page = await fetch({ limit: max - collected.length, cursor });
    collected.push(...page.items);
    cursor = page.cursor;
  } while (cursor && collected.length < max);

  return collected.slice(0, max);
}

export function collectMonth(repo: Repository, userId: string, month: string, max?: number): Promise<Transaction[]> {
  return collectPages((page) => repo.queryByMonth(userId, month, page), max);
}

export function collectUser(repo: Repository, userId: string, max?: number): Promise<Transaction[]> {
  return collectPages((page) => repo.queryByUser(userId, page), max);
}
