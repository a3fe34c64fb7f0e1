import { assertValidMonth, newBudget, type Budget, type BudgetInput } from '../models/Budget';
import type { Repository } from '../repository/financeRepository';
import { collectMonth } from './collect';
import { buildBudgetUtilization, type BudgetUtilization } from './aggregation';

export class BudgetService {
  constructor(
    private readonly repo: Repository,
    private readonly listLimit?: number,
  ) {}

  // Last write wins; a budget is identified by user, month and category.
  async upsertBudget(input: BudgetInput): Promise<Budget> {
    return await this.repo.upsertBudget(newBudget(input));
  }

  async getBudgetsByMonth(userId: string, month: string): Promise<Budget[]> {
    assertValidMonth(month);
    return await this.repo.getBudgetsByMonth(userId, month);
  }

  async getBudget(userId: string, month: string, category: string): Promise<Budget> {
    assertValidMonth(month);
    return await this.repo.getBudget(userId, month, category);
  }

  async deleteBudget(userId: string, month: string, category: string): Promise<void> {
    assertValidMonth(month);
    await this.repo.deleteBudget(userId, month, category);
  }

  async getBudgetUtilization(userId: string, month: string): Promise<BudgetUtilization[]> {
    const budgets = await this.getBudgetsByMonth(userId, month);
    const transactions = await collectMonth(this.repo, userId, month, this.listLimit);
    return buildBudgetUtilization(transactions, budgets);
  }
}
