import { Router } from 'express';
import { Services } from '../container';
import { createFileController } from '../controllers/fileController';

export const createFileRoutes = (services: Services): Router => {
  const router = Router();
  const fileController = createFileController(services);

  // GET /files/:id/download - Signed, expiring link; no bearer token
  router.get('/:id/download', fileController.download);

  return router;
};
