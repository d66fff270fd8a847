import express from 'express';
import { createChatController } from '../controllers/chatController';
import { RouteDeps } from './deps';

export const chatRoutes = ({ services, auth, chatLimiter }: RouteDeps) => {
  const router = express.Router();
  const chat = createChatController(services);

  // POST /api/chat/text  { text }
  router.post('/text', auth, chatLimiter, chat.postText);
  // POST /api/chat/selection  { token, username? }
  router.post('/selection', auth, chatLimiter, chat.postSelection);
  router.get('/session', auth, chat.getSession);

  return router;
};

export default chatRoutes;
