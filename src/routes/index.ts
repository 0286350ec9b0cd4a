import { Router } from 'express';
import { Services } from '../container';
import { getInfo } from '../controllers/infoController';
import { ContentKind } from '../models/Content';
import { createAuthRoutes } from './authRoutes';
import { createContentRoutes } from './contentRoutes';
import { createFeedRoutes } from './feedRoutes';
import { createFileRoutes } from './fileRoutes';
import { createJournalistRoutes } from './journalistRoutes';
import { createPublisherRoutes } from './publisherRoutes';
import { createSocialRoutes } from './socialRoutes';
import { createSubscriptionRoutes } from './subscriptionRoutes';

export const createApiRoutes = (services: Services): Router => {
  const router = Router();

  router.get('/info', getInfo);
  router.use('/auth', createAuthRoutes(services));
  router.use('/articles', createContentRoutes(services, ContentKind.ARTICLE));
  router.use('/newsletters', createContentRoutes(services, ContentKind.NEWSLETTER));
  router.use('/publishers', createPublisherRoutes(services));
  router.use('/journalists', createJournalistRoutes(services));
  router.use('/subscriptions', createSubscriptionRoutes(services));
  router.use('/social', createSocialRoutes(services));
  router.use('/files', createFileRoutes(services));
  router.use('/', createFeedRoutes(services));

  return router;
};
