import { Request, Response } from 'express';
import multer from 'multer';
import { Services } from '../container';
import { requireUser } from '../middleware/auth';
import { ContentKind, CreateContentDTO, UpdateContentDTO } from '../models/Content';
import {
  contentListQuerySchema,
  createArticleSchema,
  createNewsletterSchema,
  updateArticleSchema,
  updateNewsletterSchema
} from '../schemas';
import { SerializerContext, serializeContent, serializeContentSummary } from '../serializers/content';
import { AppError, ValidationError } from '../utils/errors';
import { sendError } from '../utils/http';
import { paginate } from '../utils/pagination';
import { parseId, parseWith } from '../utils/validation';

const DOWNLOAD_URL_TTL_SECONDS = 3600;

const parseCreateBody = (kind: ContentKind, body: unknown): { dto: CreateContentDTO; authorId?: number } => {
  switch (kind) {
    case ContentKind.ARTICLE: {
      const data = parseWith(createArticleSchema, body);
      return {
        dto: { kind, title: data.title, body: data.body, publisherId: data.publisher_id },
        authorId: data.author_id
      };
    }
    case ContentKind.NEWSLETTER: {
      const data = parseWith(createNewsletterSchema, body);
      return {
        dto: { kind, subject: data.subject, content: data.content, publisherId: data.publisher_id },
        authorId: data.author_id
      };
    }
  }
};

const parseUpdateBody = (kind: ContentKind, body: unknown): UpdateContentDTO => {
  switch (kind) {
    case ContentKind.ARTICLE: {
      const data = parseWith(updateArticleSchema, body);
      return { headline: data.title, text: data.body, publisherId: data.publisher_id };
    }
    case ContentKind.NEWSLETTER: {
      const data = parseWith(updateNewsletterSchema, body);
      return { headline: data.subject, text: data.content, publisherId: data.publisher_id };
    }
  }
};

/** Handlers for one content collection; articles and newsletters share them. */
export const createContentController = (services: Services, kind: ContentKind) => {
  const { store, files, feed, content, approvals } = services;
  const ctx: SerializerContext = { store, files };
  const label = kind === ContentKind.ARTICLE ? 'article' : 'newsletter';

  // Multer configuration
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: services.config.uploads.maxFileSize,
      files: 1
    }
  });

  const uploadMiddleware = upload.single('image');

  const list = (req: Request, res: Response) => {
    try {
      const user = requireUser(req);
      const query = parseWith(contentListQuerySchema, req.query);

      const items = feed
        .visible(store, user, kind)
        .filter((item) => query.status === undefined || item.status === query.status);

      res.json(paginate(req, items, query, (item) => serializeContentSummary(ctx, item)));
    } catch (error) {
      sendError(res, error, `Failed to list ${label}s`);
    }
  };

  const create = (req: Request, res: Response) => {
    try {
      const user = requireUser(req);
      const { dto, authorId } = parseCreateBody(kind, req.body);

      const item = store.transaction((tx) => content.create(tx, user, dto, authorId));

      res.status(201).json(serializeContent(ctx, item));
    } catch (error) {
      sendError(res, error, `Failed to create ${label}`);
    }
  };

  const detail = (req: Request, res: Response) => {
    try {
      const user = requireUser(req);
      const item = content.get(store, user, kind, parseId(req.params.id));

      res.json(serializeContent(ctx, item));
    } catch (error) {
      sendError(res, error, `Failed to fetch ${label}`);
    }
  };

  const update = (req: Request, res: Response) => {
    try {
      const user = requireUser(req);
      const id = parseId(req.params.id);
      const dto = parseUpdateBody(kind, req.body);

      const item = store.transaction((tx) => content.update(tx, user, kind, id, dto));

      res.json(serializeContent(ctx, item));
    } catch (error) {
      sendError(res, error, `Failed to update ${label}`);
    }
  };

  const remove = (req: Request, res: Response) => {
    try {
      const user = requireUser(req);
      const id = parseId(req.params.id);

      store.transaction((tx) => content.remove(tx, user, kind, id));

      res.status(204).send();
    } catch (error) {
      sendError(res, error, `Failed to delete ${label}`);
    }
  };

  const approve = (req: Request, res: Response) => {
    try {
      const user = requireUser(req);
      const id = parseId(req.params.id);

      const result = store.transaction((tx) => approvals.approve(tx, kind, id, user));

      res.json({
        ...serializeContent(ctx, result.item),
        side_effects: {
          notification_recipients: result.notificationRecipients,
          social_post_queued: result.socialPostQueued
        }
      });
    } catch (error) {
      sendError(res, error, `Failed to approve ${label}`);
    }
  };

  const reject = (req: Request, res: Response) => {
    try {
      const user = requireUser(req);
      const id = parseId(req.params.id);

      const item = store.transaction((tx) => approvals.reject(tx, kind, id, user));

      res.json(serializeContent(ctx, item));
    } catch (error) {
      sendError(res, error, `Failed to reject ${label}`);
    }
  };

  const uploadImage = async (req: Request, res: Response) => {
    try {
      const user = requireUser(req);
      const id = parseId(req.params.id);
      const file = req.file;

      if (!file) {
        throw new ValidationError('No file uploaded. Use "image" as the field name');
      }

      if (!files.validateFileType(file.mimetype)) {
        throw new AppError(`File type '${file.mimetype}' is not allowed`, 'INVALID_FILE_TYPE', 400, {
          allowedTypes: files.getAllowedMimeTypes(),
          receivedType: file.mimetype
        });
      }

      if (!files.validateFileSize(file.size)) {
        throw new AppError('File is too large', 'FILE_TOO_LARGE', 400, {
          maxSize: services.config.uploads.maxFileSize,
          receivedSize: file.size
        });
      }

      const result = await content.attachImage(store, user, kind, id, file);
      const downloadUrl = files.generateDownloadUrl(result.file.id, DOWNLOAD_URL_TTL_SECONDS);

      console.log(`✅ Image attached to ${label} ${id}: ${result.file.originalName}`);

      res.status(201).json({
        id: result.file.id,
        file_name: result.file.originalName,
        size: result.file.size,
        mime_type: result.file.mimeType,
        uploaded_by: result.file.uploadedBy,
        uploaded_at: result.file.uploadedAt.toISOString(),
        download_url: downloadUrl,
        expires_in: DOWNLOAD_URL_TTL_SECONDS,
        [label]: serializeContent(ctx, result.item)
      });
    } catch (error) {
      sendError(res, error, 'Failed to upload image');
    }
  };

  return { list, create, detail, update, remove, approve, reject, uploadMiddleware, uploadImage };
};
