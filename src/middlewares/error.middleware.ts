// src/middlewares/error.middleware.ts
import { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { AppError, ValidationError } from '../utils/errors';

/**
 * Forward async rejections to the error handler.
 */
export const asyncHandler = (
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler => (req, res, next) => {
  handler(req, res, next).catch(next);
};

export const notFound: RequestHandler = (req, res) => {
  res.status(404).json({ message: 'Route not found', path: req.originalUrl });
};

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  if (err instanceof ValidationError) {
    return res.status(err.statusCode).json({ message: err.message, error: err.code, errors: err.errors });
  }

  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      console.error(`${req.method} ${req.originalUrl} failed:`, err.message);
    }
    return res.status(err.statusCode).json({ message: err.message, error: err.code });
  }

  // body-parser rejects malformed JSON with a 400 of its own
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    return res.status(400).json({ message: 'Malformed JSON body', error: 'ValidationError' });
  }

  console.error(err instanceof Error ? err.stack : err);
  return res.status(500).json({ message: 'Server Error' });
};
