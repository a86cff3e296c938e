import { z } from 'zod';

/**
 * Configuration for the sign-in API
 * Reads from environment variables (process.env)
 *
 * Required environment variables:
 * - SECRET_KEY: Signs session tokens and the OAuth handshake cookie
 * - GOOGLE_CLIENT_ID / GOOGLE_CLIENT_SECRET: OAuth client registered with Google
 *
 * Optional:
 * - FRONTEND_URL: Where the browser lands after login (default http://localhost:3000)
 * - GOOGLE_DISCOVERY_URL: OpenID configuration document of the provider
 * - OAUTH_REDIRECT_URI: Callback URL registered with the provider; derived from the request if unset
 * - FIRESTORE_PROJECT_ID / FIRESTORE_DATABASE_ID: Document store location
 * - ALLOWED_ORIGINS: Comma-separated list of allowed CORS origins, or "*"
 * - RESET_PROFILE_ON_LOGIN: Set to "true" to clear about_me/age on every login
 * - SENTRY_DSN: Enables error tracking
 * - PORT: Listener port for the standalone server
 */

export const DEFAULT_DISCOVERY_URL = 'https://accounts.google.com/.well-known/openid-configuration';

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly missing: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

const REQUIRED_ENV_VARS = ['SECRET_KEY', 'GOOGLE_CLIENT_ID', 'GOOGLE_CLIENT_SECRET'] as const;

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const envSchema = z.object({
  SECRET_KEY: z.string().min(1),
  GOOGLE_CLIENT_ID: z.string().min(1),
  GOOGLE_CLIENT_SECRET: z.string().min(1),
  FRONTEND_URL: optionalString.pipe(z.string().url().optional()),
  GOOGLE_DISCOVERY_URL: optionalString.pipe(z.string().url().optional()),
  OAUTH_REDIRECT_URI: optionalString.pipe(z.string().url().optional()),
  FIRESTORE_PROJECT_ID: optionalString,
  FIRESTORE_DATABASE_ID: optionalString,
  ALLOWED_ORIGINS: optionalString,
  RESET_PROFILE_ON_LOGIN: optionalString,
  SENTRY_DSN: optionalString,
  PORT: optionalString.pipe(z.coerce.number().int().positive().optional()),
  NODE_ENV: optionalString,
});

export type CorsOrigins = '*' | string[];

export type AppConfig = {
  nodeEnv: string;
  isProduction: boolean;
  port: number;
  secretKey: string;
  frontendUrl: string;
  corsAllowedOrigins: CorsOrigins;
  google: {
    clientId: string;
    clientSecret: string;
    discoveryUrl: string;
    redirectUri?: string;
    scopes: string[];
  };
  firestore: {
    projectId?: string;
    databaseId: string;
  };
  auth: {
    resetProfileOnLogin: boolean;
  };
  sentryDsn?: string;
};

function parseOrigins(value: string | undefined): CorsOrigins {
  if (value === '*') {
    return '*';
  }
  return value
    ? value.split(',').map((origin) => origin.trim()).filter(Boolean)
    : [];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const missing = REQUIRED_ENV_VARS.filter((key) => !env[key]?.trim());
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required environment variables: ${missing.join(', ')}`,
      [...missing],
    );
  }

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new ConfigError(`Invalid environment variables: ${fields}`);
  }

  const values = parsed.data;
  const nodeEnv = values.NODE_ENV ?? 'development';

  return {
    nodeEnv,
    isProduction: nodeEnv === 'production',
    port: values.PORT ?? 8000,
    secretKey: values.SECRET_KEY,
    // Trailing slashes would produce "//auth/callback" in redirects
    frontendUrl: (values.FRONTEND_URL ?? 'http://localhost:3000').replace(/\/+$/, ''),
    corsAllowedOrigins: parseOrigins(values.ALLOWED_ORIGINS),
    google: {
      clientId: values.GOOGLE_CLIENT_ID,
      clientSecret: values.GOOGLE_CLIENT_SECRET,
      discoveryUrl: values.GOOGLE_DISCOVERY_URL ?? DEFAULT_DISCOVERY_URL,
      redirectUri: values.OAUTH_REDIRECT_URI,
      scopes: ['openid', 'email', 'profile'],
    },
    firestore: {
      projectId: values.FIRESTORE_PROJECT_ID,
      databaseId: values.FIRESTORE_DATABASE_ID ?? '(default)',
    },
    auth: {
      resetProfileOnLogin: values.RESET_PROFILE_ON_LOGIN?.toLowerCase() === 'true',
    },
    sentryDsn: values.SENTRY_DSN,
  };
}
