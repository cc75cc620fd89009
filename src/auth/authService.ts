import { AuthError } from '../errors/index.js';
import { tokenCacheKeyToString } from './tokenCache.js';
import type { AccessToken, AuthConfig, TokenCache, TokenCacheKey } from './types.js';

export const GRAPH_DEFAULT_SCOPE = 'https://graph.microsoft.com/.default';
const DEFAULT_AUTHORITY_HOST = 'https://login.microsoftonline.com';

export interface AuthServiceOptions {
  config: AuthConfig;
  cache: TokenCache;
  fetcher?: typeof fetch;
  /** Seconds shaved off the token lifetime so it is renewed before expiry. */
  clockSkewSeconds?: number;
  now?: () => number;
}

interface TokenResponse {
  access_token?: string;
  expires_in?: number;
  error?: string;
  error_description?: string;
}

const describeTokenError = (payload: TokenResponse, status: number): string => {
  if (!payload.error) {
    return `Token request failed (${status})`;
  }
  return payload.error_description ? `${payload.error}: ${payload.error_description}` : payload.error;
};

/**
 * App-only tokens from the client credentials grant. Concurrent callers
 * asking for the same scopes share one token request.
 */
export class AuthService {
  private readonly config: AuthConfig;
  private readonly cache: TokenCache;
  private readonly fetcher: typeof fetch;
  private readonly clockSkewSeconds: number;
  private readonly now: () => number;
  private readonly inFlight = new Map<string, Promise<AccessToken>>();

  constructor(options: AuthServiceOptions) {
    this.config = options.config;
    this.cache = options.cache;
    this.fetcher = options.fetcher ?? fetch;
    this.clockSkewSeconds = options.clockSkewSeconds ?? 60;
    this.now = options.now ?? Date.now;
  }

  async acquireAppToken(scopes: string[] = [GRAPH_DEFAULT_SCOPE]): Promise<AccessToken> {
    const key: TokenCacheKey = { tenantId: this.config.tenantId, clientId: this.config.clientId, scopes };
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const id = tokenCacheKeyToString(key);
    let pending = this.inFlight.get(id);
    if (!pending) {
      pending = this.requestToken(key).finally(() => {
        this.inFlight.delete(id);
      });
      this.inFlight.set(id, pending);
    }
    return pending;
  }

  tokenProvider(scopes?: string[]): () => Promise<string> {
    return async () => (await this.acquireAppToken(scopes)).token;
  }

  private async requestToken(key: TokenCacheKey): Promise<AccessToken> {
    const host = (this.config.authorityHost ?? DEFAULT_AUTHORITY_HOST).replace(/\/$/, '');
    const body = new URLSearchParams({
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
      grant_type: 'client_credentials',
      scope: key.scopes.join(' ')
    });

    const response = await this.fetcher(`${host}/${this.config.tenantId}/oauth2/v2.0/token`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body
    });

    const payload = (await response.json().catch(() => ({}))) as TokenResponse;
    if (!response.ok) {
      throw new AuthError(describeTokenError(payload, response.status));
    }
    if (!payload.access_token || !payload.expires_in) {
      throw new AuthError('Token response missing access token or expiry.');
    }

    const lifetimeSeconds = Math.max(payload.expires_in - this.clockSkewSeconds, 0);
    const token: AccessToken = {
      token: payload.access_token,
      expiresAt: new Date(this.now() + lifetimeSeconds * 1000)
    };
    this.cache.set(key, token);
    return token;
  }
}
