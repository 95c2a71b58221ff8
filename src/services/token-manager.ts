/**
 * Token Manager
 * 擁有兩組獨立的 token 快取（2-legged 記憶體、3-legged 磁碟），
 * 是 pipeline 其他階段取得 token 的唯一入口。
 */

import { TwoLeggedTokenProvider } from './auth.js';
import { ThreeLeggedTokenProvider, type GetTokenOptions, type ThreeLeggedOptions } from './three-legged-auth.js';
import { PersistedTokenStore } from './token-store.js';
import { TokenEndpointClient } from './token-endpoint.js';
import { MissingCredentialsError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { systemClock, type Clock } from '../lib/clock.js';
import { PERSISTED_MARGIN_MS, isUsable } from '../lib/token-validity.js';
import type { AuthSettings, TokenKind, TokenStatus } from '../types/auth.js';

/**
 * 測試或特殊環境可替換的協作者
 */
export type TokenManagerDeps = Pick<
  ThreeLeggedOptions,
  'openBrowser' | 'prompt' | 'sleep' | 'waitTimeoutMs' | 'pollIntervalMs' | 'progressIntervalMs'
> & {
  clock?: Clock;
};

export class TokenManager {
  private readonly settings: AuthSettings;
  private readonly clock: Clock;
  private readonly store: PersistedTokenStore;
  private readonly twoLegged: TwoLeggedTokenProvider;
  private readonly threeLegged: ThreeLeggedTokenProvider;

  constructor(settings: AuthSettings, deps: TokenManagerDeps = {}) {
    if (!settings.clientId || !settings.clientSecret) {
      throw new MissingCredentialsError();
    }

    this.settings = settings;
    this.clock = deps.clock ?? systemClock;

    const endpoint = new TokenEndpointClient({
      tokenEndpoint: settings.tokenEndpoint,
      clientId: settings.clientId,
      clientSecret: settings.clientSecret,
    });

    this.store = new PersistedTokenStore(settings.tokenCacheFile, { clock: this.clock });
    this.twoLegged = new TwoLeggedTokenProvider(endpoint, {
      scope: settings.twoLeggedScope,
      clock: this.clock,
    });
    this.threeLegged = new ThreeLeggedTokenProvider(this.store, endpoint, {
      clientId: settings.clientId,
      authorizeEndpoint: settings.authorizeEndpoint,
      redirectUri: settings.redirectUri,
      callbackPort: settings.callbackPort,
      callbackHost: settings.callbackHost,
      scope: settings.threeLeggedScope,
      strategy: settings.strategy,
      clock: this.clock,
      ...deps,
    });
  }

  /**
   * 2-legged token；失敗回傳 null
   */
  async getTwoLeggedToken(): Promise<string | null> {
    return this.twoLegged.tryGetToken();
  }

  /**
   * 2-legged token；後續呼叫必須要有 token 時使用，失敗即拋出
   */
  async requireTwoLeggedToken(): Promise<string> {
    return this.twoLegged.getToken();
  }

  async getThreeLeggedToken(options: GetTokenOptions = {}): Promise<string> {
    return this.threeLegged.getToken(options);
  }

  /**
   * 下游 API 回 401 時呼叫：刪除磁碟快取，下次執行強制重新授權
   */
  invalidateThreeLeggedToken(): boolean {
    const deleted = this.store.delete();
    loggers.auth.warn('3-legged token invalidated', { file: this.store.getPath(), deleted });
    return deleted;
  }

  clearTwoLeggedToken(): void {
    this.twoLegged.clearCache();
  }

  /**
   * 快取中 token 的剩餘秒數（沒有快取時為 0）
   */
  getTokenExpiresIn(kind: TokenKind): number {
    let expiresAt: number | null;
    if (kind === 'two-legged') {
      expiresAt = this.twoLegged.getCachedToken()?.expiresAt ?? null;
    } else {
      const record = this.store.read();
      expiresAt = record ? record.expires_at * 1000 : null;
    }
    if (expiresAt === null) {
      return 0;
    }
    return Math.max(0, Math.floor((expiresAt - this.clock.now()) / 1000));
  }

  getStatus(): TokenStatus {
    const twoLegged = this.twoLegged.getCachedToken();
    const record = this.store.read();
    const threeLeggedExpiresAt = record ? record.expires_at * 1000 : null;

    return {
      strategy: this.settings.strategy,
      twoLegged: {
        cached: this.twoLegged.isTokenValid(),
        expiresAt: twoLegged ? new Date(twoLegged.expiresAt).toISOString() : null,
      },
      threeLegged: {
        cached: record !== null,
        usable:
          threeLeggedExpiresAt !== null &&
          isUsable({ expiresAt: threeLeggedExpiresAt }, this.clock.now(), PERSISTED_MARGIN_MS),
        expiresAt: threeLeggedExpiresAt === null ? null : new Date(threeLeggedExpiresAt).toISOString(),
        cacheFile: this.store.getPath(),
      },
      redirectUri: this.settings.redirectUri,
    };
  }

  getSettings(): AuthSettings {
    return this.settings;
  }
}
