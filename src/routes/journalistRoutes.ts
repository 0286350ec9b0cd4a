import { Router } from 'express';
import { Services } from '../container';
import { createJournalistController } from '../controllers/journalistController';
import { createAuthenticate } from '../middleware/auth';

export const createJournalistRoutes = (services: Services): Router => {
  const router = Router();
  const authenticate = createAuthenticate(services.accounts);
  const journalistController = createJournalistController(services);

  router.get('/', authenticate, journalistController.list);
  router.get('/:id', authenticate, journalistController.detail);

  return router;
};
