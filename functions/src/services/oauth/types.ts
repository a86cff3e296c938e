export type IdentityClaims = {
  subject: string;
  email?: string;
  name?: string;
  picture?: string;
  emailVerified?: boolean;
};

export type AuthorizationUrlParams = {
  state: string;
  nonce: string;
  redirectUri: string;
};

export type CodeExchangeParams = {
  code: string;
  nonce: string;
  redirectUri: string;
};

export interface IdentityProvider {
  readonly name: string;
  /** Host of the consent screen the browser is sent to */
  readonly authorizationEndpoint: string;
  buildAuthorizationUrl(params: AuthorizationUrlParams): string;
  exchangeCode(params: CodeExchangeParams): Promise<IdentityClaims>;
}

export class IdentityProviderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IdentityProviderError';
  }
}
