import { Request, Response } from 'express';
import { Services } from '../container';
import { requireUser } from '../middleware/auth';
import { browseQuerySchema } from '../schemas';
import { SerializerContext, serializeContentSummary } from '../serializers/content';
import { sendError } from '../utils/http';
import { paginate } from '../utils/pagination';
import { parseWith } from '../utils/validation';

export const createFeedController = ({ store, files, feed }: Services) => {
  const ctx: SerializerContext = { store, files };

  const combined = (req: Request, res: Response) => {
    try {
      const result = feed.combined(store, requireUser(req));

      res.json({
        articles: result.articles.map((item) => serializeContentSummary(ctx, item)),
        newsletters: result.newsletters.map((item) => serializeContentSummary(ctx, item)),
        total_articles: result.totalArticles,
        total_newsletters: result.totalNewsletters
      });
    } catch (error) {
      sendError(res, error, 'Failed to build feed');
    }
  };

  const browse = (req: Request, res: Response) => {
    try {
      const user = requireUser(req);
      const query = parseWith(browseQuerySchema, req.query);

      const items = feed.browse(store, user, query.type);
      res.json(paginate(req, items, query, (item) => serializeContentSummary(ctx, item)));
    } catch (error) {
      sendError(res, error, 'Failed to browse content');
    }
  };

  return { combined, browse };
};
