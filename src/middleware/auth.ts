import { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { SchedulingStore } from '../repositories/SchedulingStore';
import { Actor } from '../types/scheduling';
import { ForbiddenError, UnauthorizedError } from '../utils/errors';
import { parseChatId } from '../utils/validation';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      actor?: Actor;
    }
  }
}

// Tokens are issued to the chat transport and carry the acting chat id: { chatId }
export const createAuth = (secret: string): RequestHandler => (req: Request, _res: Response, next: NextFunction) => {
  const token = req.header('Authorization')?.replace('Bearer ', '');
  if (!token) return next(new UnauthorizedError());
  try {
    const decoded = jwt.verify(token, secret);
    const chatId = typeof decoded === 'object' ? parseChatId(decoded.chatId) : null;
    if (chatId === null) return next(new UnauthorizedError());
    req.actor = { chatId };
    next();
  } catch (err) {
    next(new UnauthorizedError(err instanceof jwt.TokenExpiredError ? 'Token expired' : undefined));
  }
};

export const signActorToken = (chatId: number, secret: string, expiresInSeconds = 7 * 24 * 60 * 60) =>
  jwt.sign({ chatId }, secret, { expiresIn: expiresInSeconds });

// The chat transport itself, as opposed to a chat acting through it: { role: 'transport' }
export const signTransportToken = (secret: string) => jwt.sign({ role: 'transport' }, secret);

export function isTransportToken(token: string, secret: string): boolean {
  try {
    const decoded = jwt.verify(token, secret);
    return typeof decoded === 'object' && decoded.role === 'transport';
  } catch (err) {
    console.warn('Rejected transport token:', err instanceof Error ? err.message : err);
    return false;
  }
}

export function actorOf(req: Request): Actor {
  if (!req.actor) throw new UnauthorizedError();
  return req.actor;
}

// Role checks read the persisted flags on every request, so a revoked role takes effect immediately
export const createGuards = (store: SchedulingStore) => {
  const isAdmin = async (chatId: number) => Boolean((await store.findStaff(chatId))?.isAdmin);

  const requireAdmin: RequestHandler = async (req, _res, next) => {
    try {
      const actor = actorOf(req);
      if (!(await isAdmin(actor.chatId))) return next(new ForbiddenError());
      next();
    } catch (err) {
      next(err);
    }
  };

  // The staff member named by the route parameter, or any admin
  const requireSelfOrAdmin = (param = 'staffId'): RequestHandler => async (req, _res, next) => {
    try {
      const actor = actorOf(req);
      if (parseChatId(req.params[param]) === actor.chatId) {
        const member = await store.findStaff(actor.chatId);
        if (member?.isStaff || member?.isAdmin) return next();
      }
      if (await isAdmin(actor.chatId)) return next();
      next(new ForbiddenError());
    } catch (err) {
      next(err);
    }
  };

  return { requireAdmin, requireSelfOrAdmin };
};

export type Guards = ReturnType<typeof createGuards>;
