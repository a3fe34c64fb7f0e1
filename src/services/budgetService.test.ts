import { describe, expect, it } from 'vitest';
import { MemoryDocumentStore } from '../../tests/support/memoryStore';
import { NotFoundError } from '../errors';
import { newTransaction } from '../models/Transaction';
import { FinanceRepository } from '../repository/financeRepository';
import { BudgetService } from './budgetService';

describe('BudgetService', () => {
  it('reports utilization per budget for the month', async () => {
    const repo = new FinanceRepository(new MemoryDocumentStore());
    const budgets = new BudgetService(repo);

    await budgets.upsertBudget({ userId: 'u1', month: '2024-01', category: 'food', amount: 100 });
    await budgets.upsertBudget({ userId: 'u1', month: '2024-01', category: 'rent', amount: 500 });
    await repo.createTransaction(
      newTransaction({
        userId: 'u1',
        date: new Date('2024-01-15T00:00:00Z'),
        amount: -50,
        description: 'Groceries',
        category: 'Food',
        type: 'expense',
      }),
    );

    expect(await budgets.getBudgetUtilization('u1', '2024-01')).toEqual([
      { category: 'food', budgetAmount: 100, spentAmount: 50, remaining: 50, percentage: 50 },
      { category: 'rent', budgetAmount: 500, spentAmount: 0, remaining: 500, percentage: 0 },
    ]);
  });

  it('deletes budgets', async () => {
    const budgets = new BudgetService(new FinanceRepository(new MemoryDocumentStore()));
    await budgets.upsertBudget({ userId: 'u1', month: '2024-01', category: 'food', amount: 100 });

    await budgets.deleteBudget('u1', '2024-01', 'FOOD');
    await expect(budgets.getBudget('u1', '2024-01', 'food')).rejects.toThrow(NotFoundError);
  });

  it('rejects malformed months', async () => {
    const budgets = new BudgetService(new FinanceRepository(new MemoryDocumentStore()));
    await expect(budgets.getBudgetsByMonth('u1', 'January')).rejects.toThrow(
      'invalid month format, expected YYYY-MM, got "January"',
    );
  });
});
