import { Request, Response } from 'express';
import { Services } from '../container';
import { requireUser } from '../middleware/auth';
import {
  credentialsSchema,
  forgotUsernameSchema,
  passwordResetRequestSchema,
  passwordResetSchema,
  registerSchema,
  updateProfileSchema
} from '../schemas';
import { serializeAccount } from '../serializers/user';
import { invalidResetToken } from '../services/accountService';
import { sendError } from '../utils/http';
import { parseWith } from '../utils/validation';

export const createAuthController = ({ accounts, store }: Services) => {
  const register = async (req: Request, res: Response) => {
    try {
      const body = parseWith(registerSchema, req.body);

      const { user, token } = await accounts.register({
        username: body.username,
        password: body.password,
        email: body.email,
        role: body.role,
        firstName: body.first_name,
        lastName: body.last_name,
        affiliatedPublisherId: body.affiliated_publisher_id
      });

      res.status(201).json({ user: serializeAccount(store, user), token });
    } catch (error) {
      sendError(res, error, 'Failed to register user');
    }
  };

  const login = async (req: Request, res: Response) => {
    try {
      const { username, password } = parseWith(credentialsSchema, req.body);
      const { user, token } = await accounts.login(username, password);

      res.json({ user: serializeAccount(store, user), token });
    } catch (error) {
      sendError(res, error, 'Failed to login');
    }
  };

  // Token-only variant of login for API clients.
  const token = async (req: Request, res: Response) => {
    try {
      const { username, password } = parseWith(credentialsSchema, req.body);
      const result = await accounts.login(username, password);

      res.json({ token: result.token });
    } catch (error) {
      sendError(res, error, 'Failed to issue token');
    }
  };

  const me = (req: Request, res: Response) => {
    try {
      res.json(serializeAccount(store, requireUser(req)));
    } catch (error) {
      sendError(res, error, 'Failed to fetch profile');
    }
  };

  const updateMe = (req: Request, res: Response) => {
    try {
      const user = requireUser(req);
      const body = parseWith(updateProfileSchema, req.body);

      const updated = store.transaction((tx) =>
        accounts.updateProfile(tx, user, {
          email: body.email,
          firstName: body.first_name,
          lastName: body.last_name,
          affiliatedPublisherId: body.affiliated_publisher_id
        })
      );

      res.json(serializeAccount(store, updated));
    } catch (error) {
      sendError(res, error, 'Failed to update profile');
    }
  };

  // Same answer whether or not the account exists.
  const requestPasswordReset = (req: Request, res: Response) => {
    try {
      const { username, email } = parseWith(passwordResetRequestSchema, req.body);
      accounts.requestPasswordReset(username, email);

      res.status(202).json({ message: 'If that account exists, a reset link has been sent.' });
    } catch (error) {
      sendError(res, error, 'Failed to request password reset');
    }
  };

  const checkResetToken = (req: Request, res: Response) => {
    try {
      if (!accounts.checkResetToken(req.params.token)) {
        throw invalidResetToken();
      }
      res.json({ valid: true });
    } catch (error) {
      sendError(res, error, 'Failed to check reset link');
    }
  };

  const resetPassword = async (req: Request, res: Response) => {
    try {
      const { password } = parseWith(passwordResetSchema, req.body);
      await accounts.resetPassword(req.params.token, password);

      res.json({ message: 'Your password has been reset. Please log in.' });
    } catch (error) {
      sendError(res, error, 'Failed to reset password');
    }
  };

  const forgotUsername = (req: Request, res: Response) => {
    try {
      const { email } = parseWith(forgotUsernameSchema, req.body);
      accounts.remindUsername(email);

      res.status(202).json({ message: 'If an account uses that email, its username has been sent.' });
    } catch (error) {
      sendError(res, error, 'Failed to send username reminder');
    }
  };

  return {
    register,
    login,
    token,
    me,
    updateMe,
    requestPasswordReset,
    checkResetToken,
    resetPassword,
    forgotUsername
  };
};
