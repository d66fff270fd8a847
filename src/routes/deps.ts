import { RequestHandler } from 'express';
import { Guards } from '../middleware/auth';
import { Services } from '../services';

export interface RouteDeps {
  services: Services;
  auth: RequestHandler;
  guards: Guards;
  chatLimiter: RequestHandler;
  publicLimiter: RequestHandler;
}
