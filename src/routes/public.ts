import express from 'express';
import { createPublicController } from '../controllers/publicController';
import { RouteDeps } from './deps';

export const publicRoutes = ({ services, auth, publicLimiter }: RouteDeps) => {
  const router = express.Router();
  const pub = createPublicController(services);

  router.get('/settings', pub.getSettings);
  router.get('/reviews', pub.listReviews);
  router.post('/reviews', auth, publicLimiter, pub.postReview);

  return router;
};

export default publicRoutes;
