import { Router, type Request, type Response } from 'express';
import { serializeUser } from '../models/codec';
import type { UserService } from '../services/userService';
import { bodyOf, optionalString, requireString } from './request';
import { handle } from './respond';

export default function userRoutes(service: UserService): Router {
  const router = Router();

  router.post(
    '/users',
    handle(async (req: Request, res: Response) => {
      const body = bodyOf(req);
      const user = await service.createUser({
        id: optionalString(body, 'id'),
        email: requireString(body, 'email'),
        name: requireString(body, 'name'),
      });
      res.status(201).json(serializeUser(user));
    }),
  );

  router.get(
    '/users/:id',
    handle(async (req: Request, res: Response) => {
      res.status(200).json(serializeUser(await service.getUser(req.params.id)));
    }),
  );

  return router;
}
