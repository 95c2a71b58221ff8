/**
 * Error types
 * 認證流程與 APS API 的錯誤分類
 *
 * 每個 AuthError 對目前這次 token 取得都是終止性的，不會自動重試；
 * 由呼叫端決定要中止整個 pipeline 還是降級執行。
 */

import type { TokenKind } from '../types/auth.js';

export type AuthErrorCode =
  | 'NETWORK_FAILURE'
  | 'AUTH_PROVIDER_ERROR'
  | 'LISTENER_BIND_FAILURE'
  | 'AUTHORIZATION_TIMEOUT'
  | 'AUTHORIZATION_DENIED'
  | 'AUTHORIZATION_ABORTED'
  | 'TOKEN_EXCHANGE_FAILED'
  | 'NON_INTERACTIVE_NO_CACHE'
  | 'MISSING_CREDENTIALS';

export abstract class AuthError extends Error {
  abstract readonly code: AuthErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * 連線失敗或請求逾時（token endpoint 的 30 秒 timeout 也歸在這裡）
 */
export class NetworkError extends AuthError {
  readonly code = 'NETWORK_FAILURE';

  constructor(public readonly url: string, message: string, options?: { cause?: unknown }) {
    super(`Request to ${url} failed: ${message}`, options);
  }
}

/**
 * OAuth provider 回應非 2xx
 */
export class AuthProviderError extends AuthError {
  readonly code = 'AUTH_PROVIDER_ERROR';

  constructor(
    public readonly statusCode: number,
    public readonly responseBody: string,
    options?: { cause?: unknown }
  ) {
    super(`OAuth provider returned ${statusCode}: ${responseBody}`, options);
  }
}

export class ListenerBindError extends AuthError {
  readonly code = 'LISTENER_BIND_FAILURE';

  constructor(public readonly port: number, reason: string, options?: { cause?: unknown }) {
    super(
      `Cannot start the OAuth callback listener on port ${port} (${reason}). ` +
        `Free port ${port}; it must match the redirect URI registered with the APS app.`,
      options
    );
  }
}

export class AuthorizationTimeoutError extends AuthError {
  readonly code = 'AUTHORIZATION_TIMEOUT';

  constructor(public readonly timeoutMs: number) {
    super(`Authorization timed out: no code received within ${Math.round(timeoutMs / 1000)}s`);
  }
}

/**
 * 使用者在同意頁面拒絕，或 provider 以 ?error= 重導回來
 */
export class AuthorizationDeniedError extends AuthError {
  readonly code = 'AUTHORIZATION_DENIED';

  constructor(public readonly providerError: string, public readonly description?: string) {
    super(`Authorization was denied by the provider: ${description ?? providerError}`);
  }
}

export class AuthorizationAbortedError extends AuthError {
  readonly code = 'AUTHORIZATION_ABORTED';

  constructor() {
    super('Authorization was cancelled before a code was received');
  }
}

export class TokenExchangeError extends AuthError {
  readonly code = 'TOKEN_EXCHANGE_FAILED';

  constructor(public readonly detail: string, options?: { cause?: unknown }) {
    super(`Token exchange failed: ${detail}`, options);
  }
}

export class NonInteractiveNoCacheError extends AuthError {
  readonly code = 'NON_INTERACTIVE_NO_CACHE';

  constructor(public readonly cachePath: string) {
    super(
      `No cached 3-legged token available at ${cachePath}. ` +
        'Run interactive authorization first: accbi auth login'
    );
  }
}

export class MissingCredentialsError extends AuthError {
  readonly code = 'MISSING_CREDENTIALS';

  constructor() {
    super('APS_CLIENT_ID and APS_CLIENT_SECRET must be set (environment or accbi config set)');
  }
}

/**
 * 設定值不合法（例如 port 超出範圍）
 */
export class ConfigError extends Error {
  public readonly code = 'INVALID_CONFIG';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Structured error thrown by APS API calls. Carries status code + body for rich error context. */
export class ApsApiError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly method: string,
    public readonly path: string,
    public readonly responseBody: string,
    /** 這次請求使用的 token；401 時被清除的是對應的快取 */
    public readonly tokenKind: TokenKind = 'three-legged',
  ) {
    super(`APS API ${method} ${path} failed (${statusCode}): ${responseBody}`);
    this.name = 'ApsApiError';
  }
}
