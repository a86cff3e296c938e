import axios from 'axios';
import type { AxiosInstance } from 'axios';
import * as functions from 'firebase-functions';
import { z } from 'zod';

const providerMetadataSchema = z.object({
  issuer: z.string().url(),
  authorization_endpoint: z.string().url(),
  token_endpoint: z.string().url(),
  userinfo_endpoint: z.string().url().optional(),
  jwks_uri: z.string().url(),
});

/** Subset of the OpenID Connect discovery document this service relies on */
export type ProviderMetadata = z.infer<typeof providerMetadataSchema>;

/**
 * Fetch the provider's well-known configuration once at start-up.
 * The result is immutable for the lifetime of the process.
 */
export async function loadProviderMetadata(
  discoveryUrl: string,
  http: Pick<AxiosInstance, 'get'> = axios,
): Promise<ProviderMetadata> {
  const response = await http.get<unknown>(discoveryUrl, { timeout: 10000 });
  const parsed = providerMetadataSchema.safeParse(response.data);

  if (!parsed.success) {
    throw new Error(
      `Discovery document at ${discoveryUrl} is missing required endpoints: ${parsed.error.issues
        .map((issue) => issue.path.join('.'))
        .join(', ')}`,
    );
  }

  functions.logger.info(`[oauth] Loaded provider metadata from ${discoveryUrl}`, {
    issuer: parsed.data.issuer,
  });

  return Object.freeze(parsed.data);
}
