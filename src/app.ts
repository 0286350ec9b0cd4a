import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { Services } from './container';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createApiRoutes } from './routes';

export const createApp = (services: Services): Express => {
  const app: Express = express();

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Routes
  app.use('/api', createApiRoutes(services));

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      queue: services.queue.getStatus()
    });
  });

  // 404 handler
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
