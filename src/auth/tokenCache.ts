import type { AccessToken, TokenCache, TokenCacheKey } from './types.js';

export const tokenCacheKeyToString = (key: TokenCacheKey): string =>
  [key.tenantId, key.clientId, [...key.scopes].sort().join(' ')].join('|');

/** Process-local token cache; expired entries are evicted on read. */
export class InMemoryTokenCache implements TokenCache {
  private readonly tokens = new Map<string, AccessToken>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  get(key: TokenCacheKey): AccessToken | undefined {
    const id = tokenCacheKeyToString(key);
    const token = this.tokens.get(id);
    if (token && token.expiresAt.getTime() > this.now()) {
      return token;
    }
    this.tokens.delete(id);
    return undefined;
  }

  set(key: TokenCacheKey, token: AccessToken): void {
    this.tokens.set(tokenCacheKeyToString(key), token);
  }
}
