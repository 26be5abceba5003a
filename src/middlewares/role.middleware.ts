// src/middlewares/role.middleware.ts
import { RequestHandler } from 'express';
import { isAuthenticatedRequest } from '../types/request.types';
import { ForbiddenError, UnauthenticatedError } from '../utils/errors';

/**
 * Only emails listed in ADMIN_EMAILS get through. Mount after the auth middleware.
 */
export const isAdmin = (adminEmails: readonly string[]): RequestHandler => (req, res, next) => {
  if (!isAuthenticatedRequest(req)) {
    return next(new UnauthenticatedError());
  }
  if (!adminEmails.includes(req.auth.email)) {
    return next(new ForbiddenError('Forbidden - Admin access required'));
  }
  next();
};
