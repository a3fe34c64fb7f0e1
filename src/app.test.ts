import { once } from 'node:events';
import type { Server } from 'node:http';
import axios, { type AxiosInstance } from 'axios';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { MemoryDocumentStore } from '../tests/support/memoryStore';
import { createApp } from './app';
import { FinanceRepository } from './repository/financeRepository';
import { AdvisorService } from './services/advisorService';
import { AnalyticsService } from './services/analyticsService';
import { BudgetService } from './services/budgetService';
import { TransactionService } from './services/transactionService';
import { UserService } from './services/userService';

describe('HTTP API', () => {
  let server: Server;
  let client: AxiosInstance;

  beforeAll(async () => {
    const repo = new FinanceRepository(new MemoryDocumentStore());
    const app = createApp({
      transactions: new TransactionService(repo),
      budgets: new BudgetService(repo),
      analytics: new AnalyticsService(repo),
      users: new UserService(repo),
      advisor: new AdvisorService(repo, {
        provider: 'groq',
        apiKey: undefined,
        model: 'llama3-8b-8192',
        baseURL: 'https://llm.test/v1',
      }),
    });

    server = app.listen(0, '127.0.0.1');
    await once(server, 'listening');
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server has no port');

    client = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
  });

  afterAll(async () => {
    server.close();
    server.closeAllConnections();
    await once(server, 'close');
  });

  it('reports health', async () => {
    const res = await client.get('/health');
    expect(res.status).toBe(200);
    expect(res.data).toMatchObject({ status: 'ok' });
  });

  it('creates, reads and updates a transaction', async () => {
    const created = await client.post('/api/transactions', {
      user_id: 'u1',
      id: 'coffee-1',
      amount: -12.5,
      description: 'Coffee at the cafe',
      type: 'expense',
      date: '2024-01-15',
    });
    expect(created.status).toBe(201);
    expect(created.data).toMatchObject({ id: 'coffee-1', category: 'dining', date: '2024-01-15', version: 1 });

    const fetched = await client.get('/api/transactions/coffee-1', { params: { user_id: 'u1' } });
    expect(fetched.status).toBe(200);
    expect(fetched.data).toEqual(created.data);

    const month = await client.get('/api/transactions/month/2024-01', { params: { user_id: 'u1' } });
    expect(month.data).toMatchObject({ count: 1, next_cursor: null });

    const update = {
      user_id: 'u1',
      amount: -14,
      description: 'Coffee at the cafe',
      category: 'dining',
      type: 'expense',
      date: '2024-01-15',
      version: 1,
    };
    const updated = await client.put('/api/transactions/coffee-1', update);
    expect(updated.status).toBe(200);
    expect(updated.data).toMatchObject({ amount: -14, version: 2 });

    const stale = await client.put('/api/transactions/coffee-1', update);
    expect(stale.status).toBe(409);
    expect(stale.data).toEqual({
      message: 'transaction coffee-1 was modified by another process, please retry',
      code: 'CONFLICT',
    });
  });

  it('maps errors to status codes', async () => {
    const missing = await client.get('/api/transactions/nope', { params: { user_id: 'u1' } });
    expect(missing.status).toBe(404);
    expect(missing.data).toEqual({ message: 'transaction not found: nope', code: 'NOT_FOUND' });

    const anonymous = await client.get('/api/transactions');
    expect(anonymous.status).toBe(400);
    expect(anonymous.data).toEqual({ message: 'user_id is required', code: 'VALIDATION_ERROR' });

    const unknown = await client.get('/api/nothing-here');
    expect(unknown.status).toBe(404);
  });

  it('rejects unreadable JSON', async () => {
    const res = await client.post('/api/transactions', '{bad', {
      headers: { 'Content-Type': 'application/json' },
      transformRequest: [(data: unknown) => data],
    });
    expect(res.status).toBe(400);
    expect(res.data).toEqual({ message: 'request body is not valid JSON', code: 'VALIDATION_ERROR' });
  });

  it('serves budgets and analytics', async () => {
    await client.post('/api/transactions', {
      user_id: 'u2',
      amount: 1000,
      description: 'Monthly salary',
      type: 'income',
      date: '2024-03-01',
    });
    await client.post('/api/transactions', {
      user_id: 'u2',
      amount: -40,
      description: 'Supermarket',
      type: 'expense',
      date: '2024-03-02',
    });
    const budget = await client.post('/api/budgets', { user_id: 'u2', month: '2024-03', category: 'groceries', amount: 200 });
    expect(budget.status).toBe(200);

    const utilization = await client.get('/api/budgets/2024-03/utilization', { params: { user_id: 'u2' } });
    expect(utilization.data).toEqual({
      month: '2024-03',
      utilization: [{ category: 'groceries', budgetAmount: 200, spentAmount: 40, remaining: 160, percentage: 20 }],
    });

    const summary = await client.get('/api/analytics/summary', { params: { user_id: 'u2', month: '2024-03' } });
    expect(summary.data).toMatchObject({ month: '2024-03', totalIncome: 1000, totalExpense: 40, balance: 960 });

    const options = await client.get('/api/analytics/categories', { params: { user_id: 'u2', simple: 'true' } });
    expect(options.data).toEqual({
      categories: [
        { label: 'Groceries', value: 'groceries' },
        { label: 'Salary', value: 'salary' },
      ],
    });
  });

  it('answers advice requests without a configured provider', async () => {
    const res = await client.post('/api/advice', { user_id: 'u1', question: 'How can I save more money?' });
    expect(res.status).toBe(200);
    expect(res.data).toMatchObject({ provider: 'mock', mock: true });
  });
});
