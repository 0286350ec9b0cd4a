import { Request, Response, NextFunction } from 'express';
import { User } from '../models/User';
import { AccountService } from '../services/accountService';
import { Action, assertAllowed } from '../services/permissionGuard';
import { UnauthorizedError } from '../utils/errors';
import { sendError } from '../utils/http';

// Extend Express Request type
declare global {
  namespace Express {
    interface Request {
      user?: User;
    }
  }
}

export const createAuthenticate = (accounts: AccountService) => {
  return (req: Request, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      return res.status(401).json({
        error: {
          code: 'UNAUTHORIZED',
          message: 'No token provided'
        }
      });
    }

    const token = authHeader.substring(7);
    const user = accounts.resolveToken(token);

    if (!user) {
      return res.status(401).json({
        error: {
          code: 'INVALID_TOKEN',
          message: 'Invalid or expired token'
        }
      });
    }

    req.user = user;
    next();
  };
};

export const authorize = (...allowedActions: Action[]) => {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!req.user) {
      return res.status(401).json({
        error: {
          code: 'UNAUTHORIZED',
          message: 'Not authenticated'
        }
      });
    }

    const user = req.user;
    try {
      for (const action of allowedActions) {
        assertAllowed(user, action);
      }
    } catch (error) {
      return sendError(res, error, 'Failed to check permissions');
    }

    next();
  };
};

/** The authenticated caller; only valid behind `authenticate`. */
export const requireUser = (req: Request): User => {
  if (!req.user) {
    throw new UnauthorizedError('Not authenticated');
  }
  return req.user;
};
