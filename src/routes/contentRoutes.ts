import { Router } from 'express';
import { Services } from '../container';
import { createContentController } from '../controllers/contentController';
import { authorize, createAuthenticate } from '../middleware/auth';
import { ContentKind } from '../models/Content';
import { Action } from '../services/permissionGuard';

export const createContentRoutes = (services: Services, kind: ContentKind): Router => {
  const router = Router();
  const authenticate = createAuthenticate(services.accounts);
  const contentController = createContentController(services, kind);

  router.get('/', authenticate, contentController.list);

  router.post(
    '/',
    authenticate,
    authorize(Action.CREATE_CONTENT),
    contentController.create
  );

  router.get('/:id', authenticate, contentController.detail);

  router.patch('/:id', authenticate, authorize(Action.EDIT_CONTENT), contentController.update);

  router.delete('/:id', authenticate, authorize(Action.EDIT_CONTENT), contentController.remove);

  router.post(
    '/:id/approve',
    authenticate,
    authorize(Action.REVIEW_CONTENT),
    contentController.approve
  );

  router.post(
    '/:id/reject',
    authenticate,
    authorize(Action.REVIEW_CONTENT),
    contentController.reject
  );

  router.post(
    '/:id/image',
    authenticate,
    authorize(Action.ATTACH_MEDIA),
    contentController.uploadMiddleware,
    contentController.uploadImage
  );

  return router;
};
