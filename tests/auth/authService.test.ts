import { describe, expect, it } from 'vitest';
import { AuthService, GRAPH_DEFAULT_SCOPE } from '../../src/auth/authService.js';
import { InMemoryTokenCache } from '../../src/auth/tokenCache.js';
import { AuthError } from '../../src/errors/index.js';
import { createFetcher, createJsonResponse } from '../helpers/http.js';

const config = {
  tenantId: 'tenant',
  clientId: 'client',
  clientSecret: 'test-secret'
};

describe('AuthService', () => {
  it('requests client credential tokens and caches them', async () => {
    let callCount = 0;
    let seenUrl = '';
    let seenBody = '';
    const fetcher = createFetcher(async (input, init) => {
      callCount += 1;
      seenUrl = String(input);
      seenBody = String(init?.body);
      return createJsonResponse({ access_token: 'app-token', expires_in: 3600 });
    });

    const authService = new AuthService({ config, cache: new InMemoryTokenCache(), fetcher });

    const token1 = await authService.acquireAppToken();
    const token2 = await authService.acquireAppToken([GRAPH_DEFAULT_SCOPE]);

    expect(token1.token).toBe('app-token');
    expect(token2.token).toBe('app-token');
    expect(callCount).toBe(1);
    expect(seenUrl).toBe('https://login.microsoftonline.com/tenant/oauth2/v2.0/token');
    const params = new URLSearchParams(seenBody);
    expect(params.get('grant_type')).toBe('client_credentials');
    expect(params.get('scope')).toBe(GRAPH_DEFAULT_SCOPE);
    expect(params.get('client_secret')).toBe('test-secret');
  });

  it('shares one request between concurrent callers', async () => {
    let callCount = 0;
    const fetcher = createFetcher(async () => {
      callCount += 1;
      return createJsonResponse({ access_token: 'shared', expires_in: 3600 });
    });
    const authService = new AuthService({ config, cache: new InMemoryTokenCache(), fetcher });

    const [first, second] = await Promise.all([authService.acquireAppToken(), authService.acquireAppToken()]);

    expect(first.token).toBe('shared');
    expect(second.token).toBe('shared');
    expect(callCount).toBe(1);
  });

  it('subtracts clock skew from the token lifetime', async () => {
    const fetcher = createFetcher(async () => createJsonResponse({ access_token: 'token', expires_in: 3600 }));
    const authService = new AuthService({
      config,
      cache: new InMemoryTokenCache(),
      fetcher,
      clockSkewSeconds: 100,
      now: () => 1_000_000
    });

    const token = await authService.acquireAppToken();

    expect(token.expiresAt.getTime()).toBe(1_000_000 + 3500 * 1000);
  });

  it('throws AuthError on failed token response', async () => {
    const fetcher = createFetcher(async () =>
      createJsonResponse({ error: 'invalid_client', error_description: 'bad secret' }, 401)
    );
    const authService = new AuthService({ config, cache: new InMemoryTokenCache(), fetcher });

    const pending = authService.acquireAppToken();
    await expect(pending).rejects.toThrow(AuthError);
    await expect(pending).rejects.toThrow('invalid_client: bad secret');
  });

  it('rejects responses without a token', async () => {
    const fetcher = createFetcher(async () => createJsonResponse({ token_type: 'Bearer' }));
    const authService = new AuthService({ config, cache: new InMemoryTokenCache(), fetcher });

    await expect(authService.tokenProvider()()).rejects.toThrow('Token response missing access token or expiry.');
  });
});

describe('InMemoryTokenCache', () => {
  it('evicts expired tokens on read regardless of scope order', () => {
    let now = 0;
    const cache = new InMemoryTokenCache(() => now);
    const token = { token: 'abc', expiresAt: new Date(1000) };

    cache.set({ tenantId: 't', clientId: 'c', scopes: ['b', 'a'] }, token);
    expect(cache.get({ tenantId: 't', clientId: 'c', scopes: ['a', 'b'] })).toBe(token);

    now = 1000;
    expect(cache.get({ tenantId: 't', clientId: 'c', scopes: ['a', 'b'] })).toBeUndefined();
  });
});
