import type { GraphConfig } from '../config/appConfig.js';

/** App registration used for the client credentials grant. */
export type AuthConfig = Pick<GraphConfig, 'tenantId' | 'clientId' | 'clientSecret'> & {
  authorityHost?: string;
};

export interface AccessToken {
  token: string;
  expiresAt: Date;
}

export interface TokenCacheKey {
  tenantId: string;
  clientId: string;
  scopes: string[];
}

export interface TokenCache {
  get(key: TokenCacheKey): AccessToken | undefined;
  set(key: TokenCacheKey, token: AccessToken): void;
}
