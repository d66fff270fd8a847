import express from 'express';
import morgan from 'morgan';
import { createAuth, createGuards } from './middleware/auth';
import errorHandler from './middleware/errorHandler';
import { LimiterOptions, createChatLimiter, createPublicLimiter } from './middleware/rateLimit';
import adminRoutes from './routes/admin';
import appointmentRoutes from './routes/appointments';
import chatRoutes from './routes/chat';
import { RouteDeps } from './routes/deps';
import publicRoutes from './routes/public';
import staffRoutes from './routes/staff';
import { Services } from './services';
import { NotFoundError } from './utils/errors';

export interface AppOptions {
  jwtSecret: string;
  chatLimit?: LimiterOptions;
  publicLimit?: LimiterOptions;
}

export function createApp(services: Services, options: AppOptions) {
  const app = express();

  // Basic security settings
  app.set('trust proxy', 1); // Trust only the first proxy
  app.disable('x-powered-by');

  // Security headers middleware
  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    next();
  });

  // Logging middleware
  if (process.env.NODE_ENV !== 'test') app.use(morgan('dev'));
  app.use(express.json());

  const deps: RouteDeps = {
    services,
    auth: createAuth(options.jwtSecret),
    guards: createGuards(services.store),
    chatLimiter: createChatLimiter(options.chatLimit),
    publicLimiter: createPublicLimiter(options.publicLimit),
  };

  app.get('/', (_req, res) => {
    res.send('Salon booking backend running');
  });

  app.use('/api/chat', chatRoutes(deps));
  app.use('/api/appointments', appointmentRoutes(deps));
  app.use('/api/staff', staffRoutes(deps));
  app.use('/api/admin', adminRoutes(deps));
  app.use('/api', publicRoutes(deps));

  app.use((_req, _res, next) => next(new NotFoundError('Route not found')));
  app.use(errorHandler);

  return app;
}

export default createApp;
