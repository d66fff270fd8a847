import rateLimit, { Options } from 'express-rate-limit';

// Common options for all rate limiters
const commonOptions: Partial<Options> = {
  standardHeaders: true,
  legacyHeaders: false,
  // Authenticated chats are limited per chat id, anything else per IP
  keyGenerator: (req) => (req.actor ? `chat:${req.actor.chatId}` : `ip:${req.ip ?? 'unknown'}`),
  handler: (_req, res) => {
    res.status(429).json({
      message: 'Too many requests, please slow down'
    });
  }
};

export interface LimiterOptions {
  windowMs?: number;
  max?: number;
}

// Chat input limiter; mounted after auth so the key is the chat id
export const createChatLimiter = ({ windowMs = 60 * 1000, max = 60 }: LimiterOptions = {}) => rateLimit({
  ...commonOptions,
  windowMs,
  max,
});

// Public, unauthenticated writes
export const createPublicLimiter = ({ windowMs = 15 * 60 * 1000, max = 100 }: LimiterOptions = {}) => rateLimit({
  ...commonOptions,
  windowMs,
  max,
});
