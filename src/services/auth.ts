/**
 * Auth Service
 * 2-legged (client credentials) token - 取得與記憶體快取
 */

import { loggers } from '../lib/logger.js';
import { systemClock, type Clock } from '../lib/clock.js';
import { isUsable, TWO_LEGGED_MARGIN_MS } from '../lib/token-validity.js';
import type { CachedToken } from '../types/auth.js';
import type { TokenEndpointClient } from './token-endpoint.js';

export const DEFAULT_TWO_LEGGED_SCOPE = 'account:read data:read';

export interface TwoLeggedOptions {
  scope?: string;
  clock?: Clock;
}

export class TwoLeggedTokenProvider {
  private endpoint: TokenEndpointClient;
  private scope: string;
  private clock: Clock;
  private cachedToken: CachedToken | null = null;

  // 單一飛行請求：快取失效時並發的呼叫共用同一個 token 請求
  private inFlightTokenPromise: Promise<string> | null = null;

  constructor(endpoint: TokenEndpointClient, options: TwoLeggedOptions = {}) {
    this.endpoint = endpoint;
    this.scope = options.scope?.trim() || DEFAULT_TWO_LEGGED_SCOPE;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * 取得有效的 Access Token
   * - 快取有效：直接返回，不發網路請求
   * - 有請求進行中：等待進行中的請求
   * - 快取無效：發起新請求
   *
   * 失敗時拋出 AuthProviderError / NetworkError
   */
  async getToken(): Promise<string> {
    if (this.cachedToken && this.isTokenValid()) {
      return this.cachedToken.accessToken;
    }

    if (this.inFlightTokenPromise) {
      return this.inFlightTokenPromise;
    }

    this.inFlightTokenPromise = this.requestToken();

    try {
      return await this.inFlightTokenPromise;
    } finally {
      this.inFlightTokenPromise = null;
    }
  }

  /**
   * 與 getToken 相同，但失敗時回傳 null
   * 給可以容忍缺少 token 的呼叫端（例如使用者名稱解析）
   */
  async tryGetToken(): Promise<string | null> {
    try {
      return await this.getToken();
    } catch (error) {
      loggers.auth.warn('2-legged token unavailable', {
        reason: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private async requestToken(): Promise<string> {
    const requestId = loggers.auth.pushRequestId();
    try {
      return await this.fetchAndCache();
    } finally {
      loggers.auth.popRequestId(requestId);
    }
  }

  private async fetchAndCache(): Promise<string> {
    const requestedAt = this.clock.now();
    const response = await this.endpoint.requestClientCredentials(this.scope);

    // 後到的寫入覆蓋先前的結果
    this.cachedToken = {
      accessToken: response.access_token,
      expiresAt: requestedAt + response.expires_in * 1000,
      kind: 'two-legged',
    };

    loggers.auth.debug('2-legged token cached', {
      expiresAt: new Date(this.cachedToken.expiresAt).toISOString(),
    });

    return this.cachedToken.accessToken;
  }

  isTokenValid(): boolean {
    return isUsable(this.cachedToken, this.clock.now(), TWO_LEGGED_MARGIN_MS);
  }

  getCachedToken(): CachedToken | null {
    return this.cachedToken ? { ...this.cachedToken } : null;
  }

  clearCache(): void {
    this.cachedToken = null;
  }
}
