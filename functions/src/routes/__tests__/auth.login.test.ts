import { createTestContext } from '../../__tests__/helpers/context';
import { createRequest, runRoute } from '../../__tests__/helpers/http';
import { createAuthRouter, HANDSHAKE_COOKIE } from '../auth';

const CALLBACK_URI = 'https://api.example.test/api/auth/google';

describe('auth login routes', () => {
  it('redirects to the consent screen and stores the handshake in a signed cookie', async () => {
    const { context } = createTestContext();
    const router = createAuthRouter(context);

    const res = await runRoute(router, 'get', '/login/google', createRequest());

    expect(res.redirectStatus).toBe(307);
    const consentUrl = new URL(res.redirectUrl ?? '');
    expect(consentUrl.host).toBe('accounts.google.com');
    expect(consentUrl.searchParams.get('redirect_uri')).toBe(CALLBACK_URI);

    expect(res.cookies).toHaveLength(1);
    const [cookie] = res.cookies;
    expect(cookie.name).toBe(HANDSHAKE_COOKIE);
    expect(cookie.value).toEqual({
      state: consentUrl.searchParams.get('state'),
      nonce: consentUrl.searchParams.get('nonce'),
    });
    expect(cookie.options).toEqual({
      signed: true,
      httpOnly: true,
      sameSite: 'lax',
      secure: false,
      path: '/',
      maxAge: 10 * 60 * 1000,
    });
  });

  it('uses the configured redirect URI when one is set', async () => {
    const { context } = createTestContext({
      config: {
        google: {
          clientId: 'test-client-id',
          clientSecret: 'test-client-secret',
          discoveryUrl: 'https://accounts.google.com/.well-known/openid-configuration',
          redirectUri: 'https://login.example.test/callback',
          scopes: ['openid', 'email', 'profile'],
        },
      },
    });

    const res = await runRoute(createAuthRouter(context), 'get', '/login/google', createRequest());

    expect(new URL(res.redirectUrl ?? '').searchParams.get('redirect_uri')).toBe(
      'https://login.example.test/callback',
    );
  });

  it('completes the callback with a token redirect and clears the cookie', async () => {
    const { context, provider, tokenService } = createTestContext();
    const router = createAuthRouter(context);

    const res = await runRoute(
      router,
      'get',
      '/google',
      createRequest({
        query: { code: 'auth-code-1', state: 'state-1' },
        signedCookies: { [HANDSHAKE_COOKIE]: { state: 'state-1', nonce: 'nonce-1' } },
      }),
    );

    expect(provider.exchangeCode).toHaveBeenCalledWith({
      code: 'auth-code-1',
      nonce: 'nonce-1',
      redirectUri: CALLBACK_URI,
    });
    expect(res.redirectStatus).toBe(307);
    const redirect = new URL(res.redirectUrl ?? '');
    expect(`${redirect.origin}${redirect.pathname}`).toBe('https://app.example.test/auth/callback');
    expect(tokenService.verify(redirect.searchParams.get('token') ?? '').status).toBe('valid');

    expect(res.clearedCookies).toEqual([
      {
        name: HANDSHAKE_COOKIE,
        value: undefined,
        options: { signed: true, httpOnly: true, sameSite: 'lax', secure: false, path: '/' },
      },
    ]);
  });

  it('redirects to the error page when the signed cookie was tampered with', async () => {
    const { context, provider } = createTestContext();

    const res = await runRoute(
      createAuthRouter(context),
      'get',
      '/google',
      createRequest({
        query: { code: 'auth-code-1', state: 'state-1' },
        signedCookies: { [HANDSHAKE_COOKIE]: false },
      }),
    );

    expect(provider.exchangeCode).not.toHaveBeenCalled();
    expect(res.redirectStatus).toBe(307);
    expect(res.redirectUrl).toBe(
      'https://app.example.test/auth/error?message=Login+session+expired+or+missing%2C+please+try+again',
    );
  });

  it('passes the provider error description to the front end', async () => {
    const { context } = createTestContext();

    const res = await runRoute(
      createAuthRouter(context),
      'get',
      '/google',
      createRequest({
        query: { error: 'access_denied', error_description: 'User denied access' },
        signedCookies: { [HANDSHAKE_COOKIE]: { state: 'state-1', nonce: 'nonce-1' } },
      }),
    );

    expect(res.redirectUrl).toBe(
      'https://app.example.test/auth/error?message=Provider+returned+an+error%3A+User+denied+access',
    );
  });
});
