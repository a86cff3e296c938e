import { loadProviderMetadata } from '../providerMetadata';

const discoveryDocument = {
  issuer: 'https://accounts.google.com',
  authorization_endpoint: 'https://accounts.google.com/o/oauth2/v2/auth',
  token_endpoint: 'https://oauth2.googleapis.com/token',
  userinfo_endpoint: 'https://openidconnect.googleapis.com/v1/userinfo',
  jwks_uri: 'https://www.googleapis.com/oauth2/v3/certs',
  response_types_supported: ['code'],
};

describe('loadProviderMetadata', () => {
  it('returns the endpoints from the discovery document', async () => {
    const get = jest.fn().mockResolvedValue({ data: discoveryDocument });

    const metadata = await loadProviderMetadata('https://accounts.google.com/.well-known/openid-configuration', { get });

    expect(get).toHaveBeenCalledWith('https://accounts.google.com/.well-known/openid-configuration', {
      timeout: 10000,
    });
    expect(metadata).toEqual({
      issuer: 'https://accounts.google.com',
      authorization_endpoint: 'https://accounts.google.com/o/oauth2/v2/auth',
      token_endpoint: 'https://oauth2.googleapis.com/token',
      userinfo_endpoint: 'https://openidconnect.googleapis.com/v1/userinfo',
      jwks_uri: 'https://www.googleapis.com/oauth2/v3/certs',
    });
    expect(Object.isFrozen(metadata)).toBe(true);
  });

  it('rejects documents without the required endpoints', async () => {
    const get = jest.fn().mockResolvedValue({
      data: { issuer: 'https://accounts.google.com', jwks_uri: 'https://www.googleapis.com/oauth2/v3/certs' },
    });

    await expect(loadProviderMetadata('https://idp.example.test/config', { get })).rejects.toThrow(
      'Discovery document at https://idp.example.test/config is missing required endpoints: authorization_endpoint, token_endpoint',
    );
  });

  it('propagates fetch failures', async () => {
    const get = jest.fn().mockRejectedValue(new Error('getaddrinfo ENOTFOUND'));

    await expect(loadProviderMetadata('https://idp.example.test/config', { get })).rejects.toThrow(
      'getaddrinfo ENOTFOUND',
    );
  });
});
