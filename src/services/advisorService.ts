import axios, { type AxiosInstance } from 'axios';
import type { AppConfig } from '../config';
import { AdvisorError, ValidationError, describeError } from '../errors';
import type { Repository } from '../repository/financeRepository';
import { createLogger } from '../utils/logger';
import { buildCategoryBreakdown, percentageOf, summarizeTransactions, type CategoryBreakdown } from './aggregation';
import { collectUser } from './collect';

const MIN_QUESTION_LENGTH = 10;
const MAX_QUESTION_LENGTH = 500;
const PROMPT_CATEGORY_LIMIT = 10;

const SYSTEM_PROMPT = `You are a professional financial advisor.
Your role is to give practical financial advice based on the user's transaction history.

Guidelines:
1. Give specific, actionable advice
2. Focus on realistic budget adjustments
3. Point out spending patterns and opportunities to save
4. Be encouraging but honest about spending habits
5. Keep the answer to 3-4 key points

End your answer with a numbered list of recommendations.`;

const FALLBACK_SUGGESTIONS = [
  'Track your expenses regularly',
  'Create a monthly budget',
  'Save at least 20% of your income',
  'Reduce unnecessary expenses',
];

export interface FinancialContext {
  totalIncome: number;
  totalExpenses: number;
  balance: number;
  savingsRate: number;
  // largest expense categories first
  topCategories: CategoryBreakdown[];
}

export interface AdviceResponse {
  advice: string;
  suggestions: string[];
  context?: FinancialContext;
  timestamp: string;
  provider: string;
  model?: string;
  mock?: boolean;
}

interface ChatCompletion {
  choices?: Array<{ message?: { content?: string | null } }>;
}

const logger = createLogger('advisor');

/** Pulls the items of numbered or bulleted lists out of a completion. */
export function extractSuggestions(advice: string): string[] {
  const suggestions: string[] = [];
  for (const raw of advice.split('\n')) {
    const line = raw.trim();
    const match = /^(?:\d+[.)]|[-•*])\s+(.+)$/.exec(line);
    if (match) suggestions.push(match[1].trim());
  }
  return suggestions;
}

export function buildAdvicePrompt(question: string, context: FinancialContext): string {
  const lines = [
    `User question: ${question}`,
    '',
    'Financial history:',
    `- Total income: $${context.totalIncome.toFixed(2)}`,
    `- Total expenses: $${context.totalExpenses.toFixed(2)}`,
    `- Current balance: $${context.balance.toFixed(2)}`,
    `- Savings rate: ${context.savingsRate.toFixed(1)}%`,
  ];

  if (context.topCategories.length > 0) {
    lines.push('', 'Spending by category:');
    for (const category of context.topCategories.slice(0, PROMPT_CATEGORY_LIMIT)) {
      lines.push(
        `- ${category.category}: $${category.amount.toFixed(2)} (${category.percentage.toFixed(1)}% of expenses, ${category.count} transactions)`,
      );
    }
  }

  lines.push('', 'Based on this history, give specific and actionable advice.');
  return lines.join('\n');
}

export class AdvisorService {
  private readonly http: AxiosInstance;
  private readonly listLimit: number | undefined;

  constructor(
    private readonly repo: Repository,
    private readonly ai: AppConfig['ai'],
    options: { http?: AxiosInstance; listLimit?: number } = {},
  ) {
    this.http = options.http ?? axios.create({ timeout: 30_000 });
    this.listLimit = options.listLimit;
  }

  get configured(): boolean {
    return this.ai.apiKey !== undefined;
  }

  async buildFinancialContext(userId: string): Promise<FinancialContext> {
    const transactions = await collectUser(this.repo, userId, this.listLimit);
    const { totalIncome, totalExpense, balance } = summarizeTransactions(transactions);
    const topCategories = buildCategoryBreakdown(transactions).sort((a, b) => b.amount - a.amount);

    return {
      totalIncome,
      totalExpenses: totalExpense,
      balance,
      savingsRate: percentageOf(balance, totalIncome),
      topCategories,
    };
  }

  async getAdvice(userId: string, question: string): Promise<AdviceResponse> {
    const trimmed = question.trim();
    if (trimmed.length < MIN_QUESTION_LENGTH || trimmed.length > MAX_QUESTION_LENGTH) {
      throw new ValidationError(
        `question must be between ${MIN_QUESTION_LENGTH} and ${MAX_QUESTION_LENGTH} characters`,
      );
    }
    if (!this.configured) return this.fallback();

    const context = await this.buildFinancialContext(userId);
    const advice = await this.complete(buildAdvicePrompt(trimmed, context));
    return this.response(advice, context);
  }

  async getPersonalizedAdvice(userId: string): Promise<AdviceResponse> {
    if (!this.configured) return this.fallback();

    const context = await this.buildFinancialContext(userId);
    const prompt = buildAdvicePrompt(
      'Give me 3-4 personalized recommendations to improve my financial situation.',
      context,
    );
    return this.response(await this.complete(prompt), context);
  }

  private async complete(prompt: string): Promise<string> {
    let completion: ChatCompletion;
    try {
      const { data } = await this.http.post<ChatCompletion>(
        `${this.ai.baseURL}/chat/completions`,
        {
          model: this.ai.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: prompt },
          ],
          max_tokens: 500,
          temperature: 0.7,
        },
        {
          headers: {
            Authorization: `Bearer ${this.ai.apiKey ?? ''}`,
            'Content-Type': 'application/json',
          },
        },
      );
      completion = data;
    } catch (error) {
      logger.error(`Completion request to ${this.ai.provider} failed`, describeError(error));
      throw new AdvisorError(`failed to get advice: ${describeError(error)}`, { cause: error });
    }

    const content = completion.choices?.[0]?.message?.content?.trim();
    if (!content) {
      throw new AdvisorError(`no response from ${this.ai.provider}`);
    }
    return content;
  }

  private response(advice: string, context: FinancialContext): AdviceResponse {
    return {
      advice,
      suggestions: extractSuggestions(advice),
      context,
      timestamp: new Date().toISOString(),
      provider: this.ai.provider,
      model: this.ai.model,
    };
  }

  private fallback(): AdviceResponse {
    return {
      advice: 'The advice service is not configured. Set AI_API_KEY to enable personalized advice.',
      suggestions: [...FALLBACK_SUGGESTIONS],
      timestamp: new Date().toISOString(),
      provider: 'mock',
      mock: true,
    };
  }
}
