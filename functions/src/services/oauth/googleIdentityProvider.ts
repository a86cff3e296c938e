import axios from 'axios';
import type { AxiosInstance } from 'axios';
import * as functions from 'firebase-functions';
import { OAuth2Client } from 'google-auth-library';
import { z } from 'zod';
import type { ProviderMetadata } from './providerMetadata';
import { IdentityProviderError } from './types';
import type {
  AuthorizationUrlParams,
  CodeExchangeParams,
  IdentityClaims,
  IdentityProvider,
} from './types';

const tokenResponseSchema = z.object({
  access_token: z.string().optional(),
  id_token: z.string().optional(),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
});

const userInfoSchema = z.object({
  sub: z.string(),
  email: z.string().optional(),
  name: z.string().optional(),
  picture: z.string().optional(),
  email_verified: z.boolean().optional(),
});

type IdTokenVerifier = Pick<OAuth2Client, 'verifyIdToken'>;

export type GoogleIdentityProviderOptions = {
  clientId: string;
  clientSecret: string;
  metadata: ProviderMetadata;
  scopes?: string[];
  http?: Pick<AxiosInstance, 'get' | 'post'>;
  verifier?: IdTokenVerifier;
};

/**
 * Authorization-code flow against Google's OpenID Connect endpoints.
 * Endpoints come from the discovery document; ID tokens are verified
 * with google-auth-library against Google's signing keys.
 */
export class GoogleIdentityProvider implements IdentityProvider {
  readonly name = 'google';

  private readonly http: Pick<AxiosInstance, 'get' | 'post'>;
  private readonly verifier: IdTokenVerifier;
  private readonly scopes: string[];

  constructor(private readonly options: GoogleIdentityProviderOptions) {
    this.http = options.http ?? axios.create({ timeout: 10000 });
    this.verifier = options.verifier ?? new OAuth2Client({ clientId: options.clientId });
    this.scopes = options.scopes ?? ['openid', 'email', 'profile'];
  }

  get authorizationEndpoint(): string {
    return this.options.metadata.authorization_endpoint;
  }

  buildAuthorizationUrl(params: AuthorizationUrlParams): string {
    const url = new URL(this.options.metadata.authorization_endpoint);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('client_id', this.options.clientId);
    url.searchParams.set('redirect_uri', params.redirectUri);
    url.searchParams.set('scope', this.scopes.join(' '));
    url.searchParams.set('state', params.state);
    url.searchParams.set('nonce', params.nonce);
    return url.toString();
  }

  async exchangeCode(params: CodeExchangeParams): Promise<IdentityClaims> {
    const tokens = await this.requestTokens(params);

    if (!tokens.id_token) {
      throw new IdentityProviderError('Provider response did not include an ID token');
    }

    const ticket = await this.verifier.verifyIdToken({
      idToken: tokens.id_token,
      audience: this.options.clientId,
    });
    const payload = ticket.getPayload();
    if (!payload) {
      throw new IdentityProviderError('Failed to get user info from Google');
    }

    if (payload.nonce !== params.nonce) {
      throw new IdentityProviderError('ID token nonce does not match login request');
    }

    const claims: IdentityClaims = {
      subject: payload.sub,
      email: payload.email,
      name: payload.name,
      picture: payload.picture,
      emailVerified: payload.email_verified,
    };

    if ((!claims.email || !claims.name) && tokens.access_token) {
      return this.mergeUserInfo(claims, tokens.access_token);
    }

    return claims;
  }

  private async requestTokens(params: CodeExchangeParams) {
    const body = new URLSearchParams({
      grant_type: 'authorization_code',
      code: params.code,
      redirect_uri: params.redirectUri,
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret,
    });

    try {
      const response = await this.http.post<unknown>(this.options.metadata.token_endpoint, body, {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      });
      const parsed = tokenResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new IdentityProviderError('Unexpected token response from provider');
      }
      return parsed.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        functions.logger.warn('[oauth] Token exchange failed', {
          status: error.response?.status,
          data: error.response?.data,
        });
        throw new IdentityProviderError('Failed to exchange authorization code');
      }
      throw error;
    }
  }

  private async mergeUserInfo(claims: IdentityClaims, accessToken: string): Promise<IdentityClaims> {
    const endpoint = this.options.metadata.userinfo_endpoint;
    if (!endpoint) {
      return claims;
    }

    const response = await this.http.get<unknown>(endpoint, {
      headers: { Authorization: `Bearer ${accessToken}` },
    });
    const parsed = userInfoSchema.safeParse(response.data);
    if (!parsed.success || parsed.data.sub !== claims.subject) {
      return claims;
    }

    return {
      subject: claims.subject,
      email: claims.email ?? parsed.data.email,
      name: claims.name ?? parsed.data.name,
      picture: claims.picture ?? parsed.data.picture,
      emailVerified: claims.emailVerified ?? parsed.data.email_verified,
    };
  }
}
