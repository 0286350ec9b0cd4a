import { Router } from 'express';
import { Services } from '../container';
import { createAuthController } from '../controllers/authController';
import { createAuthenticate } from '../middleware/auth';

export const createAuthRoutes = (services: Services): Router => {
  const router = Router();
  const authenticate = createAuthenticate(services.accounts);
  const authController = createAuthController(services);

  // POST /auth/register - Register a new user
  router.post('/register', authController.register);

  // POST /auth/login - Login
  router.post('/login', authController.login);

  // POST /auth/token - Exchange credentials for a token
  router.post('/token', authController.token);

  // Account recovery
  router.post('/password-reset', authController.requestPasswordReset);
  router.get('/password-reset/:token', authController.checkResetToken);
  router.post('/password-reset/:token', authController.resetPassword);
  router.post('/forgot-username', authController.forgotUsername);

  router.get('/me', authenticate, authController.me);
  router.patch('/me', authenticate, authController.updateMe);

  return router;
};
