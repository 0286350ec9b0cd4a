import { Router } from 'express';
import { Services } from '../container';
import { createPublisherController } from '../controllers/publisherController';
import { authorize, createAuthenticate } from '../middleware/auth';
import { Action } from '../services/permissionGuard';

export const createPublisherRoutes = (services: Services): Router => {
  const router = Router();
  const authenticate = createAuthenticate(services.accounts);
  const publisherController = createPublisherController(services);

  router.get('/', authenticate, publisherController.list);

  router.post(
    '/',
    authenticate,
    authorize(Action.CREATE_PUBLISHER),
    publisherController.create
  );

  router.get('/:id', authenticate, publisherController.detail);

  return router;
};
