import type { Firestore } from 'firebase-admin/firestore';
import type { AppConfig } from './config';
import { createDomainServiceContainer } from './services/domain/serviceContainer';
import type { DomainServiceContainer } from './services/domain/serviceContainer';
import { GoogleIdentityProvider } from './services/oauth/googleIdentityProvider';
import type { ProviderMetadata } from './services/oauth/providerMetadata';
import type { IdentityProvider } from './services/oauth/types';
import { OAuthHandshakeService } from './services/oauthHandshake';
import { TokenService } from './services/tokenService';

/**
 * Everything a request handler may depend on. Built once at start-up and
 * handed to each router factory; nothing here is a module-level singleton.
 */
export type AppContext = {
  config: AppConfig;
  services: DomainServiceContainer;
  tokenService: TokenService;
  identityProvider: IdentityProvider;
  handshakeService: OAuthHandshakeService;
};

export type CreateAppContextOptions = {
  config: AppConfig;
  db: Firestore;
  providerMetadata?: ProviderMetadata;
  identityProvider?: IdentityProvider;
  services?: DomainServiceContainer;
  tokenService?: TokenService;
};

export function createAppContext(options: CreateAppContextOptions): AppContext {
  const { config } = options;

  const services =
    options.services ??
    createDomainServiceContainer({
      db: options.db,
      userServiceOptions: { resetProfileOnLogin: config.auth.resetProfileOnLogin },
    });

  const tokenService = options.tokenService ?? new TokenService({ secret: config.secretKey });

  let identityProvider = options.identityProvider;
  if (!identityProvider) {
    if (!options.providerMetadata) {
      throw new Error('Provider metadata is required to create the Google identity provider');
    }
    identityProvider = new GoogleIdentityProvider({
      clientId: config.google.clientId,
      clientSecret: config.google.clientSecret,
      metadata: options.providerMetadata,
      scopes: config.google.scopes,
    });
  }

  return {
    config,
    services,
    tokenService,
    identityProvider,
    handshakeService: new OAuthHandshakeService({
      provider: identityProvider,
      userService: services.userService,
      tokenService,
      frontendUrl: config.frontendUrl,
    }),
  };
}
