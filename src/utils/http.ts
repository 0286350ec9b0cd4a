import { Response } from 'express';
import { AppError } from './errors';

export const sendError = (res: Response, error: unknown, fallbackMessage: string) => {
  if (error instanceof AppError) {
    return res.status(error.status).json({
      error: {
        code: error.code,
        message: error.message,
        ...(error.details ? { details: error.details } : {})
      }
    });
  }

  console.error(`❌ ${fallbackMessage}:`, error);
  return res.status(500).json({
    error: {
      code: 'INTERNAL_ERROR',
      message: fallbackMessage
    }
  });
};
