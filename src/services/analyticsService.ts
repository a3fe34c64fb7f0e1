import { assertValidMonth } from '../models/Budget';
import { monthOf } from '../models/keys';
import type { Transaction } from '../models/Transaction';
import type { Repository } from '../repository/financeRepository';
import {
  buildCategoryBreakdown,
  buildFinancialSummary,
  buildMonthlyAnalytics,
  buildMonthlyAnalyticsWithBudget,
  distinctCategories,
  generateInsights,
  monthsWithTransactions,
  toCategoryOptions,
  type CategoryBreakdown,
  type CategoryOption,
  type FinancialSummary,
  type MonthlyAnalytics,
  type MonthlyAnalyticsWithBudget,
} from './aggregation';
import { collectMonth, collectUser } from './collect';

export interface AnalyticsOptions {
  // cap on the transactions folded into any one view
  listLimit?: number;
  clock?: () => Date;
}

export class AnalyticsService {
  private readonly listLimit: number | undefined;
  private readonly clock: () => Date;

  constructor(
    private readonly repo: Repository,
    options: AnalyticsOptions = {},
  ) {
    this.listLimit = options.listLimit;
    this.clock = options.clock ?? (() => new Date());
  }

  currentMonth(): string {
    return monthOf(this.clock());
  }

  async getMonthlyAnalytics(userId: string, month: string): Promise<MonthlyAnalytics> {
    assertValidMonth(month);
    return buildMonthlyAnalytics(month, await this.monthTransactions(userId, month));
  }

  /**
   * All-time totals over the user's history. The trend compares `referenceMonth`
   * (the current month by default) with the month before it.
   */
  async getFinancialSummary(userId: string, referenceMonth: string = this.currentMonth()): Promise<FinancialSummary> {
    assertValidMonth(referenceMonth);
    return buildFinancialSummary(await this.history(userId), referenceMonth);
  }

  async getFinancialSummaryWithBudgets(userId: string, month: string): Promise<MonthlyAnalyticsWithBudget> {
    assertValidMonth(month);
    const [transactions, budgets] = await Promise.all([
      this.monthTransactions(userId, month),
      this.repo.getBudgetsByMonth(userId, month),
    ]);
    return buildMonthlyAnalyticsWithBudget(month, transactions, budgets);
  }

  // Without a month the breakdown spans the whole history.
  async getCategoryBreakdown(userId: string, month?: string): Promise<CategoryBreakdown[]> {
    if (month === undefined) {
      return buildCategoryBreakdown(await this.history(userId));
    }
    assertValidMonth(month);
    return buildCategoryBreakdown(await this.monthTransactions(userId, month));
  }

  async getFinancialInsights(userId: string, month: string): Promise<string[]> {
    return generateInsights(await this.getMonthlyAnalytics(userId, month));
  }

  async getUniqueCategories(userId: string): Promise<string[]> {
    return distinctCategories(await this.history(userId));
  }

  async getCategoryOptions(userId: string): Promise<CategoryOption[]> {
    return toCategoryOptions(await this.getUniqueCategories(userId));
  }

  async getMonthsWithTransactions(userId: string): Promise<string[]> {
    return monthsWithTransactions(await this.history(userId));
  }

  private history(userId: string): Promise<Transaction[]> {
    return collectUser(this.repo, userId, this.listLimit);
  }

  private monthTransactions(userId: string, month: string): Promise<Transaction[]> {
    return collectMonth(this.repo, userId, month, this.listLimit);
  }
}
