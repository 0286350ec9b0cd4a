import { Request, Response } from 'express';
import { Services } from '../container';
import { requireUser } from '../middleware/auth';
import { subscriptionSchema } from '../schemas';
import { serializePublisher } from '../serializers/publisher';
import { serializeUser } from '../serializers/user';
import { Action, requireReader } from '../services/permissionGuard';
import { SubscriptionChange, toSubscriptionTarget } from '../services/subscriptionIndex';
import { sendError } from '../utils/http';
import { parseWith } from '../utils/validation';

const describeChange = (change: SubscriptionChange, direction: 'add' | 'remove'): string => {
  if (change.target.type === 'publisher') {
    return direction === 'add' ? `Now subscribed to ${change.name}` : `Unsubscribed from ${change.name}`;
  }
  return direction === 'add' ? `Now following ${change.name}` : `Unfollowed ${change.name}`;
};

const serializeChange = (change: SubscriptionChange, direction: 'add' | 'remove') => ({
  message: describeChange(change, direction),
  type: change.target.type,
  id: change.target.id,
  changed: change.changed
});

export const createSubscriptionController = ({ store, subscriptions }: Services) => {
  // DELETE clients often send the ids as query parameters.
  const readTarget = (req: Request) => {
    const body = parseWith(subscriptionSchema, { ...req.query, ...req.body });
    return toSubscriptionTarget({ publisherId: body.publisher_id, journalistId: body.journalist_id });
  };

  const list = (req: Request, res: Response) => {
    try {
      const reader = requireReader(requireUser(req), Action.MANAGE_SUBSCRIPTIONS);
      const current = subscriptions.list(store, reader);

      res.json({
        publishers: current.publishers.map(serializePublisher),
        journalists: current.journalists.map((journalist) => serializeUser(store, journalist))
      });
    } catch (error) {
      sendError(res, error, 'Failed to fetch subscriptions');
    }
  };

  const subscribe = (req: Request, res: Response) => {
    try {
      const reader = requireReader(requireUser(req), Action.MANAGE_SUBSCRIPTIONS);
      const target = readTarget(req);

      const change = store.transaction((tx) => subscriptions.subscribe(tx, reader, target));

      res.status(201).json(serializeChange(change, 'add'));
    } catch (error) {
      sendError(res, error, 'Failed to subscribe');
    }
  };

  const unsubscribe = (req: Request, res: Response) => {
    try {
      const reader = requireReader(requireUser(req), Action.MANAGE_SUBSCRIPTIONS);
      const target = readTarget(req);

      const change = store.transaction((tx) => subscriptions.unsubscribe(tx, reader, target));

      res.json(serializeChange(change, 'remove'));
    } catch (error) {
      sendError(res, error, 'Failed to unsubscribe');
    }
  };

  return { list, subscribe, unsubscribe };
};
