/**
 * OAuth2 Token Response
 */
export interface TokenResponse {
  access_token: string;
  expires_in: number;
  token_type: string;
  refresh_token?: string;
}

export type TokenKind = 'two-legged' | 'three-legged';

/**
 * Cached Token with expiry
 */
export interface CachedToken {
  accessToken: string;
  expiresAt: number; // Unix timestamp (ms)
  kind: TokenKind;
}

/**
 * token_cache.json 的內容
 * expires_at 為 epoch 秒數
 */
export interface PersistedTokenRecord {
  access_token: string;
  expires_at: number;
}

/**
 * 沒有有效快取時的處理方式
 * - interactive：開瀏覽器並等待 callback
 * - non-interactive：直接失敗（伺服器／排程環境）
 */
export type AuthStrategy = 'interactive' | 'non-interactive';

/**
 * 解析完成、在啟動時固定下來的認證設定
 */
export interface AuthSettings {
  clientId: string;
  clientSecret: string;
  baseUrl: string;
  tokenEndpoint: string;
  authorizeEndpoint: string;
  twoLeggedScope: string;
  threeLeggedScope: string;
  callbackHost: string;
  callbackPort: number;
  redirectUri: string;
  tokenCacheFile: string;
  strategy: AuthStrategy;
}

export interface TokenStatus {
  strategy: AuthStrategy;
  twoLegged: {
    cached: boolean;
    expiresAt: string | null;
  };
  threeLegged: {
    cached: boolean;
    usable: boolean;
    expiresAt: string | null;
    cacheFile: string;
  };
  redirectUri: string;
}
