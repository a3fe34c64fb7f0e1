import { Router, type Request, type Response } from 'express';
import { serializeBudget } from '../models/codec';
import type { BudgetService } from '../services/budgetService';
import { bodyOf, requireNumber, requireString, userIdOf } from './request';
import { handle } from './respond';

export default function budgetRoutes(service: BudgetService): Router {
  const router = Router();

  router.post(
    '/budgets',
    handle(async (req: Request, res: Response) => {
      const body = bodyOf(req);
      const budget = await service.upsertBudget({
        userId: userIdOf(req),
        month: requireString(body, 'month'),
        category: requireString(body, 'category'),
        amount: requireNumber(body, 'amount'),
      });
      res.status(200).json(serializeBudget(budget));
    }),
  );

  router.get(
    '/budgets/:month',
    handle(async (req: Request, res: Response) => {
      const budgets = await service.getBudgetsByMonth(userIdOf(req), req.params.month);
      res.status(200).json({ month: req.params.month, budgets: budgets.map(serializeBudget) });
    }),
  );

  // registered before /:category so "utilization" is never read as a category
  router.get(
    '/budgets/:month/utilization',
    handle(async (req: Request, res: Response) => {
      const utilization = await service.getBudgetUtilization(userIdOf(req), req.params.month);
      res.status(200).json({ month: req.params.month, utilization });
    }),
  );

  router.get(
    '/budgets/:month/:category',
    handle(async (req: Request, res: Response) => {
      const budget = await service.getBudget(userIdOf(req), req.params.month, req.params.category);
      res.status(200).json(serializeBudget(budget));
    }),
  );

  router.delete(
    '/budgets/:month/:category',
    handle(async (req: Request, res: Response) => {
      await service.deleteBudget(userIdOf(req), req.params.month, req.params.category);
      res.status(200).json({ message: 'Budget deleted.' });
    }),
  );

  return router;
}
