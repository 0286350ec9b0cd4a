import { Request, Response } from 'express';
import { Services } from '../container';
import { requireUser } from '../middleware/auth';
import { createPublisherSchema } from '../schemas';
import { serializePublisher, serializePublisherDetail } from '../serializers/publisher';
import { sendError } from '../utils/http';
import { pageQuerySchema, paginate } from '../utils/pagination';
import { parseId, parseWith } from '../utils/validation';

export const createPublisherController = ({ store, publishers }: Services) => {
  const list = (req: Request, res: Response) => {
    try {
      const query = parseWith(pageQuerySchema, req.query);
      res.json(paginate(req, publishers.list(store), query, serializePublisher));
    } catch (error) {
      sendError(res, error, 'Failed to list publishers');
    }
  };

  const create = (req: Request, res: Response) => {
    try {
      const user = requireUser(req);
      const dto = parseWith(createPublisherSchema, req.body);

      const publisher = store.transaction((tx) => publishers.create(tx, user, dto));

      res.status(201).json(serializePublisher(publisher));
    } catch (error) {
      sendError(res, error, 'Failed to create publisher');
    }
  };

  const detail = (req: Request, res: Response) => {
    try {
      res.json(serializePublisherDetail(publishers.detail(store, parseId(req.params.id))));
    } catch (error) {
      sendError(res, error, 'Failed to fetch publisher');
    }
  };

  return { list, create, detail };
};
