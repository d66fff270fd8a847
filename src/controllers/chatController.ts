import { Request, Response, NextFunction } from 'express';
import { actorOf } from '../middleware/auth';
import { Services } from '../services';
import { BadRequestError } from '../utils/errors';

export const createChatController = ({ engine }: Pick<Services, 'engine'>) => {
  // POST /api/chat/text
  const postText = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const actor = actorOf(req);
      const text: unknown = req.body?.text;
      if (typeof text !== 'string') throw new BadRequestError('text is required');
      res.json(await engine.handleText(actor.chatId, text));
    } catch (err) {
      next(err);
    }
  };

  // POST /api/chat/selection
  const postSelection = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const actor = actorOf(req);
      const token: unknown = req.body?.token;
      const username: unknown = req.body?.username;
      if (typeof token !== 'string') throw new BadRequestError('token is required');
      res.json(await engine.handleSelection(actor.chatId, token, {
        username: typeof username === 'string' && username ? username : undefined,
      }));
    } catch (err) {
      next(err);
    }
  };

  // GET /api/chat/session
  const getSession = (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ step: engine.getStep(actorOf(req).chatId) });
    } catch (err) {
      next(err);
    }
  };

  return { postText, postSelection, getSession };
};
