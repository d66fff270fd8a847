import { Request, Response, NextFunction } from 'express';
import { actorOf } from '../middleware/auth';
import { Services } from '../services';
import { failureToHttpError } from '../utils/errors';

export const createPublicController = ({ settings, reviews }: Pick<Services, 'settings' | 'reviews'>) => {
  // GET /api/settings
  const getSettings = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await settings.get());
    } catch (err) {
      next(err);
    }
  };

  // GET /api/reviews
  const listReviews = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await reviews.listLatest());
    } catch (err) {
      next(err);
    }
  };

  // POST /api/reviews  { text, authorName? }
  const postReview = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await reviews.create(actorOf(req), req.body?.text, req.body?.authorName);
      if (!result.ok) return next(failureToHttpError(result));
      res.status(201).json(result.review);
    } catch (err) {
      next(err);
    }
  };

  return { getSettings, listReviews, postReview };
};
