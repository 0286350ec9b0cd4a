import { Request, Response } from 'express';
import { z } from 'zod';
import { Services } from '../container';
import { AppError, NotFoundError } from '../utils/errors';
import { sendError } from '../utils/http';
import { parseWith } from '../utils/validation';

const downloadQuerySchema = z.object({
  token: z.string().min(1, 'token is required'),
  expires: z.coerce.number().int()
});

export const createFileController = ({ files }: Services) => {
  // Public: the signed URL is the credential.
  const download = (req: Request, res: Response) => {
    try {
      const { token, expires } = parseWith(downloadQuerySchema, req.query);
      const fileId = req.params.id;

      if (!files.verifyDownloadUrl(fileId, token, expires)) {
        throw new AppError('Download link is invalid or has expired', 'INVALID_SIGNATURE', 403);
      }

      const file = files.getFile(fileId);
      if (!file) {
        throw new NotFoundError('File not found');
      }

      res.type(file.metadata.mimeType);
      res.set('Content-Disposition', `inline; filename="${encodeURIComponent(file.metadata.originalName)}"`);
      res.send(file.buffer);
    } catch (error) {
      sendError(res, error, 'Failed to download file');
    }
  };

  return { download };
};
