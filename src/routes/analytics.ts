import { Router, type Request, type Response } from 'express';
import type { AnalyticsService } from '../services/analyticsService';
import { queryFlag, queryString, userIdOf } from './request';
import { handle } from './respond';

export default function analyticsRoutes(service: AnalyticsService): Router {
  const router = Router();

  // Month-scoped; `month` defaults to the current one.
  router.get(
    '/analytics/summary',
    handle(async (req: Request, res: Response) => {
      const userId = userIdOf(req);
      const month = queryString(req, 'month') ?? service.currentMonth();
      const summary = queryFlag(req, 'include_budgets')
        ? await service.getFinancialSummaryWithBudgets(userId, month)
        : await service.getMonthlyAnalytics(userId, month);
      res.status(200).json(summary);
    }),
  );

  router.get(
    '/analytics/monthly/:month',
    handle(async (req: Request, res: Response) => {
      res.status(200).json(await service.getMonthlyAnalytics(userIdOf(req), req.params.month));
    }),
  );

  router.get(
    '/analytics/categories',
    handle(async (req: Request, res: Response) => {
      const userId = userIdOf(req);
      if (queryFlag(req, 'simple')) {
        res.status(200).json({ categories: await service.getCategoryOptions(userId) });
        return;
      }
      const breakdown = await service.getCategoryBreakdown(userId, queryString(req, 'month'));
      res.status(200).json({ categories: breakdown });
    }),
  );

  router.get(
    '/analytics/dashboard',
    handle(async (req: Request, res: Response) => {
      const summary = await service.getFinancialSummary(userIdOf(req), queryString(req, 'month'));
      res.status(200).json(summary);
    }),
  );

  router.get(
    '/analytics/months',
    handle(async (req: Request, res: Response) => {
      res.status(200).json({ months: await service.getMonthsWithTransactions(userIdOf(req)) });
    }),
  );

  router.get(
    '/analytics/insights',
    handle(async (req: Request, res: Response) => {
      const month = queryString(req, 'month') ?? service.currentMonth();
      const insights = await service.getFinancialInsights(userIdOf(req), month);
      res.status(200).json({ month, insights });
    }),
  );

  return router;
}
