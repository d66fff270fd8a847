import { Request, Response, NextFunction } from 'express';
import { HttpError } from '../utils/errors';
import { handleSaveError } from '../utils/handleSaveError';

// Centralized error handler for Express
export default function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction) {
  if (!err) return next();
  if (res.headersSent) return next(err);

  if (err instanceof HttpError) {
    return res.status(err.status).json({ message: err.message, error: err.name });
  }

  // Body parser rejects malformed JSON with a 400 status of its own
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    return res.status(400).json({ message: 'Malformed JSON body' });
  }

  // Handle Mongo duplicate-key errors consistently
  if (handleSaveError(err, res)) return;

  console.error('Unhandled error:', err instanceof Error ? (err.stack || err.message) : err);
  return res.status(500).json({ message: 'Internal Server Error' });
}
