/**
 * Three-Legged Auth Service
 * 3-legged (authorization code) token - 磁碟快取 + 本機 callback listener
 *
 * 流程：
 *   1. 讀取 token_cache.json，有效就直接回傳（不連網、不開 listener）
 *   2. non-interactive 模式下沒有快取 → NonInteractiveNoCacheError
 *   3. 在固定 port 綁定 callback listener（失敗 → ListenerBindError）
 *   4. 印出授權網址並嘗試開啟瀏覽器，每秒檢查一次 session，最多等 120 秒
 *   5. 逾時 → AuthorizationTimeoutError
 *   6. 停止 listener 後用 code 換 token，成功即寫入快取
 */

import { AuthorizationSession, type AuthorizationOutcome } from './authorization-session.js';
import { CallbackListener, DEFAULT_CALLBACK_HOST } from './callback-listener.js';
import type { PersistedTokenStore } from './token-store.js';
import type { TokenEndpointClient } from './token-endpoint.js';
import { openBrowser as defaultOpenBrowser, type BrowserOpener } from '../lib/browser.js';
import { sleep as defaultSleep, systemClock, type Clock, type Sleep } from '../lib/clock.js';
import {
  AuthProviderError,
  AuthorizationAbortedError,
  AuthorizationDeniedError,
  AuthorizationTimeoutError,
  NetworkError,
  NonInteractiveNoCacheError,
  TokenExchangeError,
} from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import type { AuthStrategy, CachedToken, TokenResponse } from '../types/auth.js';

export const DEFAULT_CALLBACK_PORT = 8080;
export const DEFAULT_THREE_LEGGED_SCOPE = 'data:read';

export const AUTHORIZATION_WAIT = {
  TIMEOUT_MS: 120 * 1000,
  POLL_INTERVAL_MS: 1000,
  PROGRESS_INTERVAL_MS: 15 * 1000,
};

// 寫入快取時預先扣掉 60 秒
const PERSIST_EXPIRY_BUFFER_MS = 60 * 1000;

export interface ThreeLeggedOptions {
  clientId: string;
  authorizeEndpoint: string;
  redirectUri: string;
  callbackPort?: number;
  callbackHost?: string;
  scope?: string;
  strategy?: AuthStrategy;
  waitTimeoutMs?: number;
  pollIntervalMs?: number;
  progressIntervalMs?: number;
  openBrowser?: BrowserOpener;
  /** 給終端機使用者看的訊息（預設寫到 stderr） */
  prompt?: (message: string) => void;
  clock?: Clock;
  sleep?: Sleep;
}

export interface GetTokenOptions {
  signal?: AbortSignal;
}

const writePrompt = (message: string): void => {
  process.stderr.write(`${message}\n`);
};

export class ThreeLeggedTokenProvider {
  private readonly store: PersistedTokenStore;
  private readonly endpoint: TokenEndpointClient;
  private readonly clientId: string;
  private readonly authorizeEndpoint: string;
  private readonly redirectUri: string;
  private readonly callbackPort: number;
  private readonly callbackHost: string;
  private readonly scope: string;
  private readonly strategy: AuthStrategy;
  private readonly waitTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly progressIntervalMs: number;
  private readonly openBrowser: BrowserOpener;
  private readonly prompt: (message: string) => void;
  private readonly clock: Clock;
  private readonly sleep: Sleep;

  // 每個 process 同一時間只有一個授權流程
  private inFlight: Promise<string> | null = null;

  constructor(store: PersistedTokenStore, endpoint: TokenEndpointClient, options: ThreeLeggedOptions) {
    this.store = store;
    this.endpoint = endpoint;
    this.clientId = options.clientId;
    this.authorizeEndpoint = options.authorizeEndpoint;
    this.redirectUri = options.redirectUri;
    this.callbackPort = options.callbackPort ?? DEFAULT_CALLBACK_PORT;
    this.callbackHost = options.callbackHost ?? DEFAULT_CALLBACK_HOST;
    this.scope = options.scope?.trim() || DEFAULT_THREE_LEGGED_SCOPE;
    this.strategy = options.strategy ?? 'interactive';
    this.waitTimeoutMs = options.waitTimeoutMs ?? AUTHORIZATION_WAIT.TIMEOUT_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? AUTHORIZATION_WAIT.POLL_INTERVAL_MS;
    this.progressIntervalMs = options.progressIntervalMs ?? AUTHORIZATION_WAIT.PROGRESS_INTERVAL_MS;
    this.openBrowser = options.openBrowser ?? defaultOpenBrowser;
    this.prompt = options.prompt ?? writePrompt;
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * 取得 3-legged token；失敗一律拋出，不會回傳已知無效的 token
   */
  async getToken(options: GetTokenOptions = {}): Promise<string> {
    // 永遠先讀磁碟快取
    const cached = this.store.load();
    if (cached) {
      loggers.auth.debug('Using cached 3-legged token', {
        expiresAt: new Date(cached.expiresAt).toISOString(),
      });
      return cached.accessToken;
    }

    if (this.strategy === 'non-interactive') {
      throw new NonInteractiveNoCacheError(this.store.getPath());
    }

    if (this.inFlight) {
      return this.inFlight;
    }

    this.inFlight = this.authorize(options.signal);
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  /**
   * 組出 provider 的授權網址
   */
  buildAuthorizationUrl(): string {
    const url = new URL(this.authorizeEndpoint);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('client_id', this.clientId);
    url.searchParams.set('redirect_uri', this.redirectUri);
    url.searchParams.set('scope', this.scope);
    return url.toString();
  }

  private async authorize(signal?: AbortSignal): Promise<string> {
    // 同一個 requestId 串起等待與換 token 的日誌
    const requestId = loggers.auth.pushRequestId();
    try {
      return await this.runAuthorization(signal);
    } finally {
      loggers.auth.popRequestId(requestId);
    }
  }

  private async runAuthorization(signal?: AbortSignal): Promise<string> {
    const session = new AuthorizationSession();
    const listener = new CallbackListener(session, {
      port: this.callbackPort,
      host: this.callbackHost,
    });

    await listener.start();

    let outcome: AuthorizationOutcome | null;
    try {
      const authUrl = this.buildAuthorizationUrl();
      this.prompt('Authentication required. Open this URL in your browser to authorize:');
      this.prompt(`  ${authUrl}`);
      await this.tryOpenBrowser(authUrl);

      this.prompt(`Waiting for authorization (max ${Math.round(this.waitTimeoutMs / 1000)}s)...`);
      outcome = await this.waitForOutcome(session, signal);
    } finally {
      await listener.stop();
    }

    if (!outcome) {
      loggers.auth.warn('Authorization timed out', { timeoutMs: this.waitTimeoutMs });
      throw new AuthorizationTimeoutError(this.waitTimeoutMs);
    }

    if (outcome.type === 'denied') {
      throw new AuthorizationDeniedError(outcome.error, outcome.description);
    }

    this.prompt('Authorization code received.');
    return this.exchange(outcome.code);
  }

  private async tryOpenBrowser(url: string): Promise<void> {
    try {
      await this.openBrowser(url);
    } catch (error) {
      loggers.auth.warn('Could not open browser automatically', {
        reason: error instanceof Error ? error.message : String(error),
      });
      this.prompt('Could not open a browser automatically; open the URL above manually.');
    }
  }

  /**
   * 每 pollIntervalMs 檢查一次 session，直到取得結果、逾時或被取消
   * 逾時回傳 null
   */
  private async waitForOutcome(
    session: AuthorizationSession,
    signal?: AbortSignal
  ): Promise<AuthorizationOutcome | null> {
    const startedAt = this.clock.now();
    let reportedBuckets = 0;

    for (;;) {
      const outcome = session.outcome;
      if (outcome) {
        return outcome;
      }
      if (signal?.aborted) {
        throw new AuthorizationAbortedError();
      }

      const elapsed = this.clock.now() - startedAt;
      if (elapsed >= this.waitTimeoutMs) {
        return null;
      }

      await this.sleep(Math.min(this.pollIntervalMs, this.waitTimeoutMs - elapsed));

      const waited = this.clock.now() - startedAt;
      const buckets = Math.floor(waited / this.progressIntervalMs);
      if (buckets > reportedBuckets && waited < this.waitTimeoutMs && !session.isSettled()) {
        reportedBuckets = buckets;
        this.prompt(`  Still waiting... (${Math.round(waited / 1000)}s)`);
        loggers.auth.debug('Waiting for authorization code', {
          elapsedMs: waited,
          listenerActive: session.isListenerActive,
        });
      }
    }
  }

  private async exchange(code: string): Promise<string> {
    const exchangedAt = this.clock.now();

    let response: TokenResponse;
    try {
      response = await this.endpoint.exchangeAuthorizationCode(code, this.redirectUri);
    } catch (error) {
      if (error instanceof AuthProviderError) {
        throw new TokenExchangeError(`${error.statusCode} ${error.responseBody}`, { cause: error });
      }
      if (error instanceof NetworkError) {
        throw new TokenExchangeError(error.message, { cause: error });
      }
      throw error;
    }

    const token: CachedToken = {
      accessToken: response.access_token,
      expiresAt: exchangedAt + response.expires_in * 1000 - PERSIST_EXPIRY_BUFFER_MS,
      kind: 'three-legged',
    };
    this.store.save(token);

    this.prompt(`Access token obtained (valid for ${Math.floor(response.expires_in / 60)} minutes).`);
    return token.accessToken;
  }
}
