import { Router } from 'express';
import { Services } from '../container';
import { createSubscriptionController } from '../controllers/subscriptionController';
import { authorize, createAuthenticate } from '../middleware/auth';
import { Action } from '../services/permissionGuard';

export const createSubscriptionRoutes = (services: Services): Router => {
  const router = Router();
  const authenticate = createAuthenticate(services.accounts);
  const subscriptionController = createSubscriptionController(services);

  router.use(authenticate, authorize(Action.MANAGE_SUBSCRIPTIONS));

  router.get('/', subscriptionController.list);
  router.post('/', subscriptionController.subscribe);
  router.delete('/', subscriptionController.unsubscribe);

  return router;
};
