import { Request, Response, NextFunction } from 'express';
import * as functions from 'firebase-functions';
import type { UserDomainService } from '../services/domain/users/UserDomainService';
import type { UserProfileRecord } from '../services/repositories/users/UserRepository';
import type { SessionClaims, TokenService } from '../services/tokenService';
import { NotFoundError, UnauthorizedError } from '../utils/apiErrors';
import { sendApiError } from './errorHandler';

export interface AuthRequest extends Request {
  user?: SessionClaims;
  profile?: UserProfileRecord;
}

export function extractBearerToken(header: string | undefined): string | null {
  if (!header || !header.startsWith('Bearer ')) {
    return null;
  }

  const token = header.slice('Bearer '.length).trim();
  return token.length > 0 ? token : null;
}

/**
 * Middleware to verify the session token and attach its claims to `req.user`
 */
export function createRequireAuth(tokenService: TokenService) {
  return function requireAuth(req: AuthRequest, res: Response, next: NextFunction): void {
    const token = extractBearerToken(req.headers.authorization);

    if (!token) {
      sendApiError(res, new UnauthorizedError('Missing or invalid authorization header'));
      return;
    }

    const result = tokenService.verify(token);

    if (result.status === 'expired') {
      sendApiError(res, new UnauthorizedError('Token expired'));
      return;
    }

    if (result.status === 'malformed') {
      functions.logger.warn(`[auth] Rejected malformed token on ${req.method} ${req.path}`);
      sendApiError(res, new UnauthorizedError('Invalid token'));
      return;
    }

    req.user = result.claims;
    next();
  };
}

/**
 * Resolves the token subject to a stored profile (`req.profile`).
 * Must run after requireAuth.
 */
export function createLoadCurrentUser(userService: UserDomainService) {
  return async function loadCurrentUser(
    req: AuthRequest,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    if (!req.user) {
      sendApiError(res, new UnauthorizedError());
      return;
    }

    try {
      const profile = await userService.getByProviderId(req.user.sub);
      if (!profile) {
        sendApiError(res, new NotFoundError('User not found'));
        return;
      }

      req.profile = profile;
      next();
    } catch (error) {
      functions.logger.error('[auth] Error loading current user:', error);
      next(error);
    }
  };
}
