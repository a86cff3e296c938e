import { Router, Request, Response } from 'express';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import type { AppContext } from '../context';
import { createLoadCurrentUser, createRequireAuth, AuthRequest } from '../middlewares/auth';
import { sendApiError } from '../middlewares/errorHandler';
import { HANDSHAKE_TTL_MS, handshakeStateSchema } from '../services/oauthHandshake';
import type { HandshakeState } from '../services/oauthHandshake';
import type {
  UserProfileRecord,
  UserProfileUpdate,
} from '../services/repositories/users/UserRepository';
import { toIsoString } from '../services/repositories/common/timestamps';
import { NotFoundError, UnauthorizedError, ValidationError } from '../utils/apiErrors';
import { sanitizePlainText, sanitizeSingleLine } from '../utils/inputSanitization';

export const HANDSHAKE_COOKIE = 'oauth_handshake';
export const CALLBACK_PATH = '/google';

const NAME_MAX_LENGTH = 100;
const ABOUT_ME_MAX_LENGTH = 2000;

// Validation schemas
const updateProfileSchema = z.object({
  name: z.string().max(NAME_MAX_LENGTH).optional(),
  about_me: z.string().max(ABOUT_ME_MAX_LENGTH).optional(),
  age: z.number().int().min(0).max(150).nullable().optional(),
});

export function toUserProfileResponse(user: UserProfileRecord) {
  return {
    id: user.id,
    google_id: user.google_id,
    email: user.email,
    name: user.name,
    picture: user.picture,
    about_me: user.about_me,
    age: user.age,
    created_at: toIsoString(user.created_at),
    last_login: toIsoString(user.last_login),
  };
}

const queryString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.length > 0 ? value : undefined;

function readHandshakeCookie(value: unknown): HandshakeState | null {
  const parsed = handshakeStateSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/**
 * Derived from the request unless OAUTH_REDIRECT_URI is set; deployments
 * behind a path prefix the app cannot see must set it.
 */
function resolveRedirectUri(req: Request, configured?: string): string {
  if (configured) {
    return configured;
  }
  return `${req.protocol}://${req.get('host')}${req.baseUrl ?? ''}${CALLBACK_PATH}`;
}

export function createAuthRouter(context: AppContext): Router {
  const authRouter = Router();
  const requireAuth = createRequireAuth(context.tokenService);
  const loadCurrentUser = createLoadCurrentUser(context.services.userService);
  const { config, handshakeService } = context;

  // Origin-wide: host path prefixes (cloudfunctions.net) never show up in req.baseUrl
  const cookieOptions = {
    signed: true,
    httpOnly: true,
    sameSite: 'lax' as const,
    secure: config.isProduction,
    path: '/',
  };

  /**
   * GET /api/auth/login/google
   * Starts the OAuth handshake and sends the browser to the consent screen
   */
  authRouter.get('/login/google', (req: Request, res: Response) => {
    try {
      const redirectUri = resolveRedirectUri(req, config.google.redirectUri);
      const { authorizationUrl, handshake } = handshakeService.begin(redirectUri);

      res.cookie(HANDSHAKE_COOKIE, handshake, {
        ...cookieOptions,
        maxAge: HANDSHAKE_TTL_MS,
      });
      res.redirect(307, authorizationUrl);
    } catch (error) {
      functions.logger.error('[auth] Error starting login:', error);
      res.status(500).json({
        code: 'server_error',
        message: 'Failed to start login',
      });
    }
  });

  /**
   * GET /api/auth/google
   * Provider callback; always answers with a redirect to the front end
   */
  authRouter.get(CALLBACK_PATH, async (req: Request, res: Response) => {
    const handshake = readHandshakeCookie(req.signedCookies?.[HANDSHAKE_COOKIE]);
    res.clearCookie(HANDSHAKE_COOKIE, cookieOptions);

    try {
      const outcome = await handshakeService.complete({
        code: queryString(req.query.code),
        state: queryString(req.query.state),
        error: queryString(req.query.error),
        errorDescription: queryString(req.query.error_description),
        handshake,
        redirectUri: resolveRedirectUri(req, config.google.redirectUri),
      });

      res.redirect(307, outcome.redirectUrl);
    } catch (error) {
      functions.logger.error('[auth] Error completing login:', error);
      const fallback = new URL(`${config.frontendUrl}/auth/error`);
      fallback.searchParams.set('message', 'Authentication failed, please try again');
      res.redirect(307, fallback.toString());
    }
  });

  /**
   * GET /api/auth/me
   * Returns the signed-in user's profile
   */
  authRouter.get('/me', requireAuth, loadCurrentUser, (req: AuthRequest, res: Response) => {
    if (!req.profile) {
      sendApiError(res, new UnauthorizedError());
      return;
    }
    res.json(toUserProfileResponse(req.profile));
  });

  /**
   * PUT /api/auth/profile
   * Partial update of name, about_me and age
   */
  authRouter.put(
    '/profile',
    requireAuth,
    loadCurrentUser,
    async (req: AuthRequest, res: Response) => {
      const current = req.profile;
      if (!current) {
        sendApiError(res, new UnauthorizedError());
        return;
      }

      try {
        const payload = updateProfileSchema.parse(req.body ?? {});
        const updates: UserProfileUpdate = {};

        if (payload.name !== undefined) {
          const name = sanitizeSingleLine(payload.name, NAME_MAX_LENGTH);
          if (!name) {
            sendApiError(res, new ValidationError('Name cannot be empty'));
            return;
          }
          updates.name = name;
        }

        if (payload.about_me !== undefined) {
          updates.about_me = sanitizePlainText(payload.about_me, ABOUT_ME_MAX_LENGTH);
        }

        if (payload.age !== undefined) {
          updates.age = payload.age;
        }

        if (Object.keys(updates).length === 0) {
          res.json(toUserProfileResponse(current));
          return;
        }

        const updated = await context.services.userService.updateProfile(
          current.google_id,
          updates,
        );
        if (!updated) {
          sendApiError(res, new NotFoundError('User not found'));
          return;
        }

        functions.logger.info(`[auth] Updated profile for user ${current.google_id}`, {
          fields: Object.keys(updates),
        });

        res.json(toUserProfileResponse(updated));
      } catch (error) {
        if (sendApiError(res, error)) {
          return;
        }

        functions.logger.error('[auth] Error updating profile:', error);
        res.status(500).json({
          code: 'server_error',
          message: 'Failed to update user profile',
        });
      }
    },
  );

  /**
   * POST /api/auth/logout
   * Stateless: the token stays valid until it expires
   */
  authRouter.post('/logout', requireAuth, (req: AuthRequest, res: Response) => {
    functions.logger.info(`[auth] User ${req.user?.sub ?? 'unknown'} logged out`);
    res.json({ message: 'Logged out successfully' });
  });

  return authRouter;
}
