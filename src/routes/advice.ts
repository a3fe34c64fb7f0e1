import { Router, type Request, type Response } from 'express';
import type { AdvisorService } from '../services/advisorService';
import { bodyOf, requireString, userIdOf } from './request';
import { handle } from './respond';

export default function adviceRoutes(service: AdvisorService): Router {
  const router = Router();

  router.post(
    '/advice',
    handle(async (req: Request, res: Response) => {
      const question = requireString(bodyOf(req), 'question');
      res.status(200).json(await service.getAdvice(userIdOf(req), question));
    }),
  );

  router.get(
    '/advice/personalized',
    handle(async (req: Request, res: Response) => {
      res.status(200).json(await service.getPersonalizedAdvice(userIdOf(req)));
    }),
  );

  return router;
}
