import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { ValidationError } from './errors';
import adviceRoutes from './routes/advice';
import analyticsRoutes from './routes/analytics';
import budgetRoutes from './routes/budget';
import { sendError } from './routes/respond';
import transactionRoutes from './routes/transaction';
import userRoutes from './routes/user';
import type { AdvisorService } from './services/advisorService';
import type { AnalyticsService } from './services/analyticsService';
import type { BudgetService } from './services/budgetService';
import type { TransactionService } from './services/transactionService';
import type { UserService } from './services/userService';

export interface AppServices {
  transactions: TransactionService;
  budgets: BudgetService;
  analytics: AnalyticsService;
  users: UserService;
  advisor: AdvisorService;
}

export function createApp(services: AppServices, corsOrigins: string[] = []) {
  const app = express();

  app.use(cors(corsOrigins.length > 0 ? { origin: corsOrigins } : undefined));
  app.use(express.json());

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API routes go before the catch-all
  app.use('/api', transactionRoutes(services.transactions));
  app.use('/api', budgetRoutes(services.budgets));
  app.use('/api', analyticsRoutes(services.analytics));
  app.use('/api', userRoutes(services.users));
  app.use('/api', adviceRoutes(services.advisor));

  app.use('*', (req: Request, res: Response) => {
    res.status(404).json({ message: 'Route not found.', path: req.originalUrl });
  });

  // express.json() reports unreadable bodies here
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      sendError(res, new ValidationError('request body is not valid JSON'));
      return;
    }
    sendError(res, error);
  });

  return app;
}
