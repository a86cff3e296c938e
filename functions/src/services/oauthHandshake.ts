import { randomBytes } from 'crypto';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import type { UserDomainService } from './domain/users/UserDomainService';
import { IdentityProviderError } from './oauth/types';
import type { IdentityProvider } from './oauth/types';
import type { UserProfileRecord } from './repositories/users/UserRepository';
import type { TokenService } from './tokenService';

// TTL: 10 minutes in milliseconds
export const HANDSHAKE_TTL_MS = 10 * 60 * 1000;

export const handshakeStateSchema = z.object({
  state: z.string().min(1),
  nonce: z.string().min(1),
});

export type HandshakeState = z.infer<typeof handshakeStateSchema>;

export type HandshakeStart = {
  authorizationUrl: string;
  handshake: HandshakeState;
};

export type HandshakeCallbackParams = {
  code?: string;
  state?: string;
  error?: string;
  errorDescription?: string;
  handshake: HandshakeState | null;
  redirectUri: string;
};

export type HandshakeOutcome =
  | { status: 'authenticated'; redirectUrl: string; user: UserProfileRecord }
  | { status: 'failed'; redirectUrl: string; message: string };

export type OAuthHandshakeServiceOptions = {
  provider: IdentityProvider;
  userService: UserDomainService;
  tokenService: TokenService;
  frontendUrl: string;
  generateSecret?: () => string;
};

class HandshakeFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HandshakeFailure';
  }
}

const generateSecureValue = () => randomBytes(32).toString('base64url');

/**
 * Two-request login: `begin` sends the browser to the provider and hands back
 * the state to persist; `complete` turns the provider callback into a
 * front-end redirect carrying either a session token or an error message.
 * `complete` never throws.
 */
export class OAuthHandshakeService {
  private readonly generateSecret: () => string;

  constructor(private readonly options: OAuthHandshakeServiceOptions) {
    this.generateSecret = options.generateSecret ?? generateSecureValue;
  }

  begin(redirectUri: string): HandshakeStart {
    const handshake: HandshakeState = {
      state: this.generateSecret(),
      nonce: this.generateSecret(),
    };

    return {
      authorizationUrl: this.options.provider.buildAuthorizationUrl({
        state: handshake.state,
        nonce: handshake.nonce,
        redirectUri,
      }),
      handshake,
    };
  }

  async complete(params: HandshakeCallbackParams): Promise<HandshakeOutcome> {
    try {
      const user = await this.authenticate(params);
      const token = this.options.tokenService.issue({
        subject: user.google_id,
        email: user.email,
        name: user.name,
      });

      functions.logger.info(`[auth] User ${user.google_id} signed in via ${this.options.provider.name}`);

      return {
        status: 'authenticated',
        redirectUrl: this.frontendUrl('/auth/callback', { token }),
        user,
      };
    } catch (error) {
      const message = this.describeFailure(error);
      return {
        status: 'failed',
        redirectUrl: this.frontendUrl('/auth/error', { message }),
        message,
      };
    }
  }

  private async authenticate(params: HandshakeCallbackParams): Promise<UserProfileRecord> {
    if (params.error) {
      throw new HandshakeFailure(
        `Provider returned an error: ${params.errorDescription ?? params.error}`,
      );
    }

    if (!params.handshake) {
      throw new HandshakeFailure('Login session expired or missing, please try again');
    }

    if (!params.state || params.state !== params.handshake.state) {
      throw new HandshakeFailure('CSRF warning: state does not match the login request');
    }

    if (!params.code) {
      throw new HandshakeFailure('Missing authorization code');
    }

    const claims = await this.options.provider.exchangeCode({
      code: params.code,
      nonce: params.handshake.nonce,
      redirectUri: params.redirectUri,
    });

    if (!claims.subject || !claims.email || !claims.name) {
      throw new HandshakeFailure('Failed to get user info from Google');
    }

    return this.options.userService.recordLogin({
      subject: claims.subject,
      email: claims.email,
      name: claims.name,
      picture: claims.picture,
    });
  }

  private describeFailure(error: unknown): string {
    if (error instanceof HandshakeFailure || error instanceof IdentityProviderError) {
      functions.logger.warn(`[auth] Login handshake failed: ${error.message}`);
      return error.message;
    }

    functions.logger.error('[auth] Unexpected error completing login:', error);
    return 'Authentication failed, please try again';
  }

  private frontendUrl(path: string, query: Record<string, string>): string {
    const url = new URL(`${this.options.frontendUrl}${path}`);
    Object.entries(query).forEach(([key, value]) => url.searchParams.set(key, value));
    return url.toString();
  }
}
