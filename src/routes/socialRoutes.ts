import { Router } from 'express';
import { Services } from '../container';
import { createSocialController } from '../controllers/socialController';
import { authorize, createAuthenticate } from '../middleware/auth';
import { Action } from '../services/permissionGuard';

export const createSocialRoutes = (services: Services): Router => {
  const router = Router();
  const authenticate = createAuthenticate(services.accounts);
  const socialController = createSocialController(services);

  router.use(authenticate, authorize(Action.MANAGE_SOCIAL));

  router.get('/connection', socialController.show);
  router.put('/connection', socialController.connect);
  router.delete('/connection', socialController.disconnect);

  return router;
};
