import { Request } from 'express';

export interface AuthContext {
  email: string;
}

declare global {
  namespace Express {
    interface Request {
      /** Set by the auth middleware once the bearer token checks out. */
      auth?: AuthContext;
    }
  }
}

/**
 * For handlers mounted behind the auth middleware
 */
export interface AuthenticatedRequest extends Request {
  auth: AuthContext;
}

/**
 * Type guard to check if request has passed authentication
 */
export function isAuthenticatedRequest(req: Request): req is AuthenticatedRequest {
  return req.auth !== undefined;
}
