import { Router } from 'express';
import { Services } from '../container';
import { createFeedController } from '../controllers/feedController';
import { authorize, createAuthenticate } from '../middleware/auth';
import { Action } from '../services/permissionGuard';

export const createFeedRoutes = (services: Services): Router => {
  const router = Router();
  const authenticate = createAuthenticate(services.accounts);
  const feedController = createFeedController(services);

  // GET /feed - Latest items visible to the caller
  router.get('/feed', authenticate, feedController.combined);

  // GET /browse - Every approved item, for readers
  router.get(
    '/browse',
    authenticate,
    authorize(Action.BROWSE_APPROVED),
    feedController.browse
  );

  return router;
};
