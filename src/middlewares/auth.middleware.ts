// src/middlewares/auth.middleware.ts
import { Request, RequestHandler } from 'express';
import { TokenService } from '../services/token.service';
import { isAuthenticatedRequest } from '../types/request.types';
import { UnauthenticatedError } from '../utils/errors';

/**
 * Require `Authorization: Bearer <token>`. The token subject becomes
 * `req.auth.email`, the only identity handlers may act as.
 */
export const createAuthMiddleware = (tokens: TokenService): RequestHandler => (req, res, next) => {
  try {
    const email = tokens.authenticate(req.header('authorization'));
    req.auth = { email };
    next();
  } catch (err) {
    next(err);
  }
};

/**
 * The authenticated email; throws when the route was not protected.
 */
export const getActor = (req: Request): string => {
  if (!isAuthenticatedRequest(req)) {
    throw new UnauthenticatedError();
  }
  return req.auth.email;
};
