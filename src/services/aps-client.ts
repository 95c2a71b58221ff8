/**
 * APS API Client
 * 帶 bearer token 呼叫 APS REST API（單次請求，不做分頁、不重試）
 *
 * 401 的處理（呼叫端契約）：
 *   - 3-legged：刪除磁碟上的 token 快取，下次執行強制重新授權
 *   - 2-legged：清除記憶體快取
 */

import { ofetch, FetchError } from 'ofetch';
import { ApsApiError, NetworkError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import type { TokenKind } from '../types/auth.js';
import type { TokenManager } from './token-manager.js';
import { describeBody } from './token-endpoint.js';

export const API_REQUEST_TIMEOUT_MS = 30 * 1000;

export type QueryValue = string | number | boolean | string[] | undefined;

export interface ApsRequestOptions {
  /** 使用哪一種 token (default: three-legged) */
  auth?: TokenKind;
  query?: Record<string, QueryValue>;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export class ApsClient {
  private readonly tokens: TokenManager;
  private readonly baseUrl: string;

  constructor(tokens: TokenManager, baseUrl: string = tokens.getSettings().baseUrl) {
    this.tokens = tokens;
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  /**
   * 組出完整 URL；絕對網址只允許 APS 本身的 host，避免把 token 送到別處
   */
  resolveUrl(path: string, query?: Record<string, QueryValue>): URL {
    const isAbsolute = /^https?:\/\//.test(path);
    const url = new URL(isAbsolute ? path : `${this.baseUrl}/${path.replace(/^\//, '')}`);

    if (isAbsolute) {
      const allowed = new URL(this.baseUrl);
      if (url.host !== allowed.host) {
        throw new Error(
          `Refusing to send APS token to foreign host '${url.host}'. ` +
            `Only requests to '${allowed.host}' are allowed. Use a relative path instead.`
        );
      }
    }

    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value === undefined) continue;
        if (Array.isArray(value)) {
          value.forEach((item) => url.searchParams.append(key, item));
        } else {
          url.searchParams.set(key, String(value));
        }
      }
    }

    return url;
  }

  async get<T>(path: string, options: ApsRequestOptions = {}): Promise<T> {
    const kind = options.auth ?? 'three-legged';
    const url = this.resolveUrl(path, options.query);
    const token = kind === 'three-legged'
      ? await this.tokens.getThreeLeggedToken({ signal: options.signal })
      : await this.tokens.requireTwoLeggedToken();

    const startTime = Date.now();
    try {
      const result = await ofetch<T>(url.toString(), {
        method: 'GET',
        headers: {
          Authorization: `Bearer ${token}`,
          ...options.headers,
        },
        timeout: API_REQUEST_TIMEOUT_MS,
        retry: 0,
        signal: options.signal,
      });

      loggers.api.debug('API request completed', {
        method: 'GET',
        url: url.pathname,
        duration: Date.now() - startTime,
      });
      return result;
    } catch (error) {
      throw this.handleError(error, kind, url);
    }
  }

  private handleError(error: unknown, kind: TokenKind, url: URL): Error {
    if (!(error instanceof FetchError)) {
      return error instanceof Error ? new NetworkError(url.pathname, error.message, { cause: error }) : new NetworkError(url.pathname, String(error));
    }

    const status = error.statusCode ?? error.status;
    if (!status) {
      return new NetworkError(url.pathname, error.message, { cause: error });
    }

    if (status === 401) {
      // token 通過了期限檢查卻被拒絕（例如已被撤銷）
      if (kind === 'three-legged') {
        this.tokens.invalidateThreeLeggedToken();
      } else {
        this.tokens.clearTwoLeggedToken();
      }
    }

    loggers.api.warn('API request failed', {
      method: 'GET',
      url: url.pathname,
      statusCode: status,
    });

    return new ApsApiError(status, 'GET', url.pathname, describeBody(error.data, error.statusText ?? ''), kind);
  }
}
