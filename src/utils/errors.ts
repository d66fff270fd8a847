import { FailureKind } from '../types/scheduling';

// Errors carrying an HTTP status; rendered by middleware/errorHandler
export class HttpError extends Error {
  constructor(public status: number, message: string) {
    super(message);
    this.name = 'HttpError';
  }
}

export class BadRequestError extends HttpError {
  constructor(message = 'Bad request') {
    super(400, message);
    this.name = 'BadRequestError';
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message = 'Please authenticate') {
    super(401, message);
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = 'Access denied') {
    super(403, message);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'Not found') {
    super(404, message);
    this.name = 'NotFoundError';
  }
}

const STATUS_BY_FAILURE: Record<FailureKind, number> = {
  ValidationError: 400,
  AccessDenied: 403,
  NotFound: 404,
  SlotUnavailable: 409,
  InvalidTransition: 409,
};

export function failureToHttpError(failure: { error: FailureKind; message: string }): HttpError {
  const err = new HttpError(STATUS_BY_FAILURE[failure.error], failure.message);
  err.name = failure.error;
  return err;
}
