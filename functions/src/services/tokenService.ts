import jwt from 'jsonwebtoken';
import { z } from 'zod';

export const SESSION_TOKEN_TTL_SECONDS = 24 * 60 * 60;

const SIGNING_ALGORITHM = 'HS256' as const;

const sessionClaimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string(),
  name: z.string(),
  // iat is informational; exp is what verification enforces
  iat: z.number().int().optional(),
  exp: z.number().int(),
});

export type SessionClaims = z.infer<typeof sessionClaimsSchema>;

export type SessionIdentity = {
  subject: string;
  email: string;
  name: string;
};

export type TokenVerificationResult =
  | { status: 'valid'; claims: SessionClaims }
  | { status: 'expired' }
  | { status: 'malformed' };

export type TokenServiceOptions = {
  secret: string;
  ttlSeconds?: number;
  /** Current time in epoch milliseconds */
  now?: () => number;
};

/**
 * Issues and verifies stateless session tokens (HS256 JWT).
 * Tokens are never stored; they become invalid when `exp` passes.
 */
export class TokenService {
  private readonly ttlSeconds: number;
  private readonly now: () => number;

  constructor(private readonly options: TokenServiceOptions) {
    if (!options.secret) {
      throw new Error('TokenService requires a signing secret');
    }
    this.ttlSeconds = options.ttlSeconds ?? SESSION_TOKEN_TTL_SECONDS;
    this.now = options.now ?? Date.now;
  }

  issue(identity: SessionIdentity): string {
    const issuedAt = Math.floor(this.now() / 1000);
    const claims: SessionClaims = {
      sub: identity.subject,
      email: identity.email,
      name: identity.name,
      iat: issuedAt,
      exp: issuedAt + this.ttlSeconds,
    };

    return jwt.sign(claims, this.options.secret, { algorithm: SIGNING_ALGORITHM });
  }

  verify(token: string): TokenVerificationResult {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.options.secret, {
        algorithms: [SIGNING_ALGORITHM],
        clockTimestamp: Math.floor(this.now() / 1000),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        return { status: 'expired' };
      }
      if (error instanceof jwt.JsonWebTokenError) {
        return { status: 'malformed' };
      }
      throw error;
    }

    const parsed = sessionClaimsSchema.safeParse(decoded);
    if (!parsed.success) {
      return { status: 'malformed' };
    }

    return { status: 'valid', claims: parsed.data };
  }
}
