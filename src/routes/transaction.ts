import { Router, type Request, type Response } from 'express';
import { serializeTransaction } from '../models/codec';
import type { Transaction, TransactionInput } from '../models/Transaction';
import type { Page } from '../repository/financeRepository';
import type { TransactionService } from '../services/transactionService';
import { getCategoryFromDescription } from '../utils/categoryUtils';
import {
  bodyList,
  bodyOf,
  optionalNumber,
  optionalString,
  pageOf,
  requireDate,
  requireNumber,
  requireString,
  userIdOf,
  type Body,
} from './request';
import { handle } from './respond';

// A missing category is guessed from the description. On create a missing date is today.
function transactionInput(body: Body, userId: string, dateRequired = false): TransactionInput {
  const description = requireString(body, 'description');
  const category = optionalString(body, 'category')?.trim();

  return {
    id: optionalString(body, 'id'),
    userId,
    date: body.date === undefined && !dateRequired ? new Date() : requireDate(body, 'date'),
    amount: requireNumber(body, 'amount'),
    description,
    category: category || getCategoryFromDescription(description),
    type: requireString(body, 'type'),
  };
}

function pageResponse(page: Page<Transaction>) {
  return {
    transactions: page.items.map(serializeTransaction),
    count: page.items.length,
    next_cursor: page.cursor ?? null,
  };
}

export default function transactionRoutes(service: TransactionService): Router {
  const router = Router();

  router.post(
    '/transactions',
    handle(async (req: Request, res: Response) => {
      const created = await service.createTransaction(transactionInput(bodyOf(req), userIdOf(req)));
      res.status(201).json(serializeTransaction(created));
    }),
  );

  router.post(
    '/transactions/batch',
    handle(async (req: Request, res: Response) => {
      const entries = bodyList(req, 'transactions');
      const inputs = entries.map((entry) => {
        const owner = optionalString(entry, 'user_id')?.trim();
        return transactionInput(entry, owner || userIdOf(req));
      });
      const result = await service.importTransactions(inputs);
      res.status(201).json({ message: `Imported ${result.written} transactions.`, ...result });
    }),
  );

  router.get(
    '/transactions',
    handle(async (req: Request, res: Response) => {
      res.status(200).json(pageResponse(await service.listByUser(userIdOf(req), pageOf(req))));
    }),
  );

  router.get(
    '/transactions/month/:month',
    handle(async (req: Request, res: Response) => {
      const page = await service.listByMonth(userIdOf(req), req.params.month, pageOf(req));
      res.status(200).json(pageResponse(page));
    }),
  );

  router.get(
    '/transactions/category/:category',
    handle(async (req: Request, res: Response) => {
      const page = await service.listByCategory(userIdOf(req), req.params.category, pageOf(req));
      res.status(200).json(pageResponse(page));
    }),
  );

  router.get(
    '/transactions/:id',
    handle(async (req: Request, res: Response) => {
      const tx = await service.getTransaction(userIdOf(req), req.params.id);
      res.status(200).json(serializeTransaction(tx));
    }),
  );

  router.put(
    '/transactions/:id',
    handle(async (req: Request, res: Response) => {
      const body = bodyOf(req);
      const updated = await service.updateTransaction(req.params.id, {
        ...transactionInput(body, userIdOf(req), true),
        version: optionalNumber(body, 'version'),
      });
      res.status(200).json(serializeTransaction(updated));
    }),
  );

  router.delete(
    '/transactions/:id',
    handle(async (req: Request, res: Response) => {
      await service.deleteTransaction(userIdOf(req), req.params.id);
      res.status(200).json({ message: 'Transaction deleted.', id: req.params.id });
    }),
  );

  return router;
}
