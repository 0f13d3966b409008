import { Request, Response, NextFunction, RequestHandler } from 'express';
import type { CredentialService } from '../services/credentials';
import type { UserRecord } from '../stores/types';
import { UnauthorizedError } from '../utils/errors';

export interface AuthenticatedRequest extends Request {
  user?: UserRecord;
}

function bearerCredential(req: Request): string {
  const authHeader = req.header('Authorization');
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    throw new UnauthorizedError('Missing or invalid Authorization header');
  }
  return authHeader.substring(7).trim();
}

/**
 * Accepts `Authorization: Bearer <access token | API key>`.
 */
export function requireUser(credentials: CredentialService): RequestHandler {
  return async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
    try {
      req.user = await credentials.authenticate(bearerCredential(req));
      next();
    } catch (err) {
      if (err instanceof UnauthorizedError) res.setHeader('WWW-Authenticate', 'Bearer');
      next(err);
    }
  };
}

export function requireAdmin(credentials: CredentialService): RequestHandler[] {
  return [
    requireUser(credentials),
    (req: AuthenticatedRequest, _res: Response, next: NextFunction) => {
      try {
        credentials.authorizeAdmin(currentUser(req));
        next();
      } catch (err) {
        next(err);
      }
    },
  ];
}

/** The user resolved by {@link requireUser}. */
export function currentUser(req: AuthenticatedRequest): UserRecord {
  if (!req.user) throw new UnauthorizedError();
  return req.user;
}
