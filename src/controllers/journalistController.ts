import { Request, Response } from 'express';
import { Services } from '../container';
import { serializeUser } from '../serializers/user';
import { sendError } from '../utils/http';
import { pageQuerySchema, paginate } from '../utils/pagination';
import { parseId, parseWith } from '../utils/validation';

export const createJournalistController = ({ store, accounts }: Services) => {
  const list = (req: Request, res: Response) => {
    try {
      const query = parseWith(pageQuerySchema, req.query);
      res.json(paginate(req, accounts.listJournalists(store), query, (journalist) => serializeUser(store, journalist)));
    } catch (error) {
      sendError(res, error, 'Failed to list journalists');
    }
  };

  const detail = (req: Request, res: Response) => {
    try {
      const journalist = accounts.getJournalist(store, parseId(req.params.id));
      res.json(serializeUser(store, journalist));
    } catch (error) {
      sendError(res, error, 'Failed to fetch journalist');
    }
  };

  return { list, detail };
};
