import { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { sendError } from '../utils/http';

// body-parser tags its failures with a `type`.
const bodyParserType = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'type' in error && typeof error.type === 'string') {
    return error.type;
  }
  return undefined;
};

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({
    error: {
      code: 'NOT_FOUND',
      message: 'Endpoint not found'
    }
  });
};

export const errorHandler = (error: unknown, req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    return next(error);
  }

  switch (bodyParserType(error)) {
    case 'entity.parse.failed':
      return res.status(400).json({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Malformed JSON body'
        }
      });
    case 'entity.too.large':
      return res.status(413).json({
        error: {
          code: 'PAYLOAD_TOO_LARGE',
          message: 'Request body is too large'
        }
      });
  }

  if (error instanceof multer.MulterError) {
    return res.status(400).json({
      error: {
        code: error.code === 'LIMIT_FILE_SIZE' ? 'FILE_TOO_LARGE' : 'UPLOAD_ERROR',
        message: error.message,
        ...(error.field ? { details: { field: error.field } } : {})
      }
    });
  }

  return sendError(res, error, 'Unexpected error');
};
