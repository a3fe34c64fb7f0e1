import { format, parse, subMonths } from 'date-fns';
import type { Budget } from '../models/Budget';
import { formatDateOnly } from '../models/codec';
import { normalizeCategoryKey } from '../models/keys';
import type { Transaction } from '../models/Transaction';
import { formatCategoryLabel } from '../utils/categoryUtils';

export interface TransactionSummary {
  totalIncome: number;
  totalExpense: number;
  balance: number;
  count: number;
}

export interface CategoryBreakdown {
  category: string;
  amount: number;
  count: number;
  percentage: number;
  averageAmount: number;
}

export interface FinancialSummary {
  totalBalance: number;
  totalIncome: number;
  totalExpenses: number;
  availableMoney: number;
  savingsRate: number;
  categoryBreakdown: CategoryBreakdown[];
  // expense change of the reference month against the month before, in percent
  monthlyTrend: number;
  transactionCount: number;
}

export interface MonthlyAnalytics {
  month: string;
  totalIncome: number;
  totalExpense: number;
  balance: number;
  categoryBreakdown: CategoryBreakdown[];
  transactionCount: number;
}

export interface CategoryBudgetBreakdown {
  category: string;
  spent: number;
  budget: number;
  // negative once the budget is overrun
  remaining: number;
}

export interface MonthlyAnalyticsWithBudget {
  month: string;
  totalIncome: number;
  totalExpense: number;
  balance: number;
  categoryBreakdown: CategoryBudgetBreakdown[];
  transactionCount: number;
}

export interface BudgetUtilization {
  category: string;
  budgetAmount: number;
  spentAmount: number;
  remaining: number;
  percentage: number;
}

export interface CategoryOption {
  label: string;
  value: string;
}

export function expenseAmount(tx: Transaction): number {
  return Math.abs(tx.amount);
}

export function percentageOf(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}

export function summarizeTransactions(transactions: Transaction[]): TransactionSummary {
  let totalIncome = 0;
  let totalExpense = 0;

  for (const tx of transactions) {
    if (tx.type === 'income') totalIncome += tx.amount;
    else totalExpense += expenseAmount(tx);
  }

  return {
    totalIncome,
    totalExpense,
    balance: totalIncome - totalExpense,
    count: transactions.length,
  };
}

/**
 * Expense totals per category, sorted by category name. Categories group
 * case-insensitively; the first spelling seen is shown.
 */
export function buildCategoryBreakdown(transactions: Transaction[]): CategoryBreakdown[] {
  const totals = new Map<string, { category: string; amount: number; count: number }>();
  let totalExpense = 0;

  for (const tx of transactions) {
    if (tx.type !== 'expense') continue;
    const amount = expenseAmount(tx);
    totalExpense += amount;
    const key = normalizeCategoryKey(tx.category);
    const entry = totals.get(key) ?? { category: tx.category, amount: 0, count: 0 };
    entry.amount += amount;
    entry.count++;
    totals.set(key, entry);
  }

  return [...totals.values()]
    .map(({ category, amount, count }) => ({
      category,
      amount,
      count,
      percentage: percentageOf(amount, totalExpense),
      averageAmount: amount / count,
    }))
    .sort((a, b) => a.category.localeCompare(b.category));
}

function monthOfTransaction(tx: Transaction): string {
  return formatDateOnly(tx.date).slice(0, 7);
}

export function previousMonth(month: string): string {
  return format(subMonths(parse(month, 'yyyy-MM', new Date()), 1), 'yyyy-MM');
}

/** Percent change of expenses in `month` against the month before; 0 without a baseline. */
export function monthlyExpenseTrend(transactions: Transaction[], month: string): number {
  const before = previousMonth(month);
  let current = 0;
  let baseline = 0;

  for (const tx of transactions) {
    if (tx.type !== 'expense') continue;
    const txMonth = monthOfTransaction(tx);
    if (txMonth === month) current += expenseAmount(tx);
    else if (txMonth === before) baseline += expenseAmount(tx);
  }

  return baseline > 0 ? ((current - baseline) / baseline) * 100 : 0;
}

/** All-time view over whatever history the caller fetched. */
export function buildFinancialSummary(transactions: Transaction[], referenceMonth: string): FinancialSummary {
  const { totalIncome, totalExpense, balance, count } = summarizeTransactions(transactions);

  return {
    totalBalance: balance,
    totalIncome,
    totalExpenses: totalExpense,
    availableMoney: balance,
    savingsRate: percentageOf(balance, totalIncome),
    categoryBreakdown: buildCategoryBreakdown(transactions),
    monthlyTrend: monthlyExpenseTrend(transactions, referenceMonth),
    transactionCount: count,
  };
}

export function buildMonthlyAnalytics(month: string, transactions: Transaction[]): MonthlyAnalytics {
  const { totalIncome, totalExpense, balance, count } = summarizeTransactions(transactions);
  return {
    month,
    totalIncome,
    totalExpense,
    balance,
    categoryBreakdown: buildCategoryBreakdown(transactions),
    transactionCount: count,
  };
}

/**
 * Spending joined with the month's budgets. Categories match case-insensitively,
 * the same way the category index keys them; a budget's spelling wins for display.
 */
export function buildBudgetBreakdown(transactions: Transaction[], budgets: Budget[]): CategoryBudgetBreakdown[] {
  const rows = new Map<string, CategoryBudgetBreakdown>();
  const rowFor = (category: string): CategoryBudgetBreakdown => {
    const key = normalizeCategoryKey(category);
    let row = rows.get(key);
    if (!row) {
      row = { category, spent: 0, budget: 0, remaining: 0 };
      rows.set(key, row);
    }
    return row;
  };

  for (const budget of budgets) {
    const row = rowFor(budget.category);
    row.category = budget.category;
    row.budget += budget.amount;
  }
  for (const tx of transactions) {
    if (tx.type === 'expense') rowFor(tx.category).spent += expenseAmount(tx);
  }

  return [...rows.values()]
    .map((row) => ({ ...row, remaining: row.budget - row.spent }))
    .sort((a, b) => a.category.localeCompare(b.category));
}

export function buildMonthlyAnalyticsWithBudget(
  month: string,
  transactions: Transaction[],
  budgets: Budget[],
): MonthlyAnalyticsWithBudget {
  const { totalIncome, totalExpense, balance, count } = summarizeTransactions(transactions);
  return {
    month,
    totalIncome,
    totalExpense,
    balance,
    categoryBreakdown: buildBudgetBreakdown(transactions, budgets),
    transactionCount: count,
  };
}

export function buildBudgetUtilization(transactions: Transaction[], budgets: Budget[]): BudgetUtilization[] {
  const spent = new Map<string, number>();
  for (const tx of transactions) {
    if (tx.type !== 'expense') continue;
    const key = normalizeCategoryKey(tx.category);
    spent.set(key, (spent.get(key) ?? 0) + expenseAmount(tx));
  }

  return budgets
    .map((budget) => {
      const spentAmount = spent.get(normalizeCategoryKey(budget.category)) ?? 0;
      return {
        category: budget.category,
        budgetAmount: budget.amount,
        spentAmount,
        remaining: budget.amount - spentAmount,
        percentage: percentageOf(spentAmount, budget.amount),
      };
    })
    .sort((a, b) => a.category.localeCompare(b.category));
}

function money(value: number): string {
  return `$${value.toFixed(2)}`;
}

/** Largest expense category; ties go to the alphabetically first name. */
export function largestCategory(breakdown: CategoryBreakdown[]): CategoryBreakdown | undefined {
  let top: CategoryBreakdown | undefined;
  for (const entry of breakdown) {
    if (
      !top ||
      entry.amount > top.amount ||
      (entry.amount === top.amount && entry.category.localeCompare(top.category) < 0)
    ) {
      top = entry;
    }
  }
  return top;
}

export function generateInsights(analytics: MonthlyAnalytics): string[] {
  const insights: string[] = [];

  if (analytics.balance >= 0) {
    insights.push(`Great! You saved ${money(analytics.balance)} this month`);
  } else {
    insights.push(`You spent ${money(-analytics.balance)} more than you earned this month`);
  }

  const top = largestCategory(analytics.categoryBreakdown);
  if (top) {
    insights.push(
      `Your highest spending category was ${top.category} with ${money(top.amount)} (${top.percentage.toFixed(1)}% of expenses)`,
    );
  }

  const categories = analytics.categoryBreakdown.length;
  if (categories >= 3) {
    insights.push(`Your spending is spread across ${categories} categories`);
  } else if (categories === 1) {
    insights.push('All of your spending is in a single category');
  }

  if (analytics.totalIncome > 0) {
    const ratio = percentageOf(analytics.totalExpense, analytics.totalIncome);
    if (ratio > 80) {
      insights.push(`You are spending ${ratio.toFixed(1)}% of your income, consider cutting back`);
    } else if (ratio < 50) {
      insights.push(`You only spend ${ratio.toFixed(1)}% of your income`);
    }
  }

  return insights;
}

export function distinctCategories(transactions: Transaction[]): string[] {
  const byKey = new Map<string, string>();
  for (const tx of transactions) {
    const key = normalizeCategoryKey(tx.category);
    if (!byKey.has(key)) byKey.set(key, tx.category);
  }
  return [...byKey.values()].sort((a, b) => a.localeCompare(b));
}

/** Months that have at least one transaction, newest first. */
export function monthsWithTransactions(transactions: Transaction[]): string[] {
  return [...new Set(transactions.map(monthOfTransaction))].sort().reverse();
}

export function toCategoryOptions(categories: string[]): CategoryOption[] {
  return categories.map((category) => ({ label: formatCategoryLabel(category), value: category }));
}
