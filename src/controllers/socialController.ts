import { Request, Response } from 'express';
import { Services } from '../container';
import { requireUser } from '../middleware/auth';
import { Editor } from '../models/User';
import { socialConnectionSchema } from '../schemas';
import { Action, requireEditor } from '../services/permissionGuard';
import { sendError } from '../utils/http';
import { parseWith } from '../utils/validation';

const serializeConnection = (editor: Editor) =>
  editor.socialConnection
    ? {
        connected: true,
        provider: editor.socialConnection.provider,
        handle: editor.socialConnection.handle,
        connected_at: editor.socialConnection.connectedAt.toISOString()
      }
    : { connected: false, provider: null, handle: null, connected_at: null };

export const createSocialController = ({ store, accounts }: Services) => {
  const show = (req: Request, res: Response) => {
    try {
      const editor = requireEditor(requireUser(req), Action.MANAGE_SOCIAL);
      res.json(serializeConnection(editor));
    } catch (error) {
      sendError(res, error, 'Failed to fetch social connection');
    }
  };

  const connect = (req: Request, res: Response) => {
    try {
      const user = requireUser(req);
      const body = parseWith(socialConnectionSchema, req.body);

      const editor = store.transaction((tx) =>
        accounts.connectSocial(tx, user, { handle: body.handle, accessToken: body.access_token })
      );

      console.log(`🔗 ${editor.username} connected social account @${editor.socialConnection?.handle}`);
      res.json(serializeConnection(editor));
    } catch (error) {
      sendError(res, error, 'Failed to connect social account');
    }
  };

  const disconnect = (req: Request, res: Response) => {
    try {
      const user = requireUser(req);
      store.transaction((tx) => accounts.disconnectSocial(tx, user));

      res.json({ message: 'Social account disconnected' });
    } catch (error) {
      sendError(res, error, 'Failed to disconnect social account');
    }
  };

  return { show, connect, disconnect };
};
